import { describe, it, expect } from "vitest";
import { buildShellCommand, buildSshCommand, execute, redactCommand } from "../backend/transport/transport.js";

describe("transport command building", () => {
  it("wraps a command for SSH with password injection", () => {
    const line = buildSshCommand({ user: "u", host: "h", password: "p" }, "X");
    expect(line).toBe(`sshpass -p 'p' ssh -o StrictHostKeyChecking=no -o LogLevel=QUIET 'u@h' "X"`);
    expect(line).toContain("sshpass -p 'p'");
    expect(line).toContain("u@h");
    expect(line).toContain("StrictHostKeyChecking=no");
  });

  it("omits sshpass without a password", () => {
    expect(buildSshCommand({ user: "operator", host: "studio-pc" }, "OTADCommand.exe get_device_count")).toBe(
      `ssh -o StrictHostKeyChecking=no -o LogLevel=QUIET 'operator@studio-pc' "OTADCommand.exe get_device_count"`
    );
  });

  it("escapes single quotes in the password", () => {
    expect(buildSshCommand({ user: "u", host: "h", password: "it's" }, "X")).toBe(
      `sshpass -p 'it'\\''s' ssh -o StrictHostKeyChecking=no -o LogLevel=QUIET 'u@h' "X"`
    );
  });

  it("quotes the destination so shell metacharacters stay literal", () => {
    expect(buildSshCommand({ user: "op;rm -rf ~", host: "h$(id)" }, "X")).toBe(
      `ssh -o StrictHostKeyChecking=no -o LogLevel=QUIET 'op;rm -rf ~@h$(id)' "X"`
    );
    expect(buildSshCommand({ user: "o'k", host: "h" }, "X")).toBe(
      `ssh -o StrictHostKeyChecking=no -o LogLevel=QUIET 'o'\\''k@h' "X"`
    );
  });

  it("leaves local commands untouched", () => {
    expect(buildShellCommand("OTADCommand.exe get_device_count")).toBe("OTADCommand.exe get_device_count");
  });

  it("masks the password for logging", () => {
    const target = { user: "u", host: "h", password: "test-secret" };
    expect(redactCommand(buildShellCommand("X", target), target)).toBe(
      `sshpass -p '***' ssh -o StrictHostKeyChecking=no -o LogLevel=QUIET 'u@h' "X"`
    );
  });
});

describe("execute", () => {
  it("returns stdout of a local command with CRLF intact", () => {
    expect(execute("printf '12\\r\\n'")).toBe("12\r\n");
  });

  it("decodes non-ASCII bytes as latin1", () => {
    expect(execute("printf '\\351'")).toBe("\u00e9");
  });

  it("returns stdout even when the command exits non-zero", () => {
    expect(execute("printf 'partial'; exit 3")).toBe("partial");
  });
});
