import { describe, it, expect } from "vitest";
import { parseConfig } from "../config.js";

const PATH = "/etc/turntable/config.json";

describe("parseConfig", () => {
  it("accepts the minimal configuration", () => {
    expect(parseConfig({ transport: "stdio", logLevel: "info" }, PATH)).toEqual({
      transport: "stdio",
      logLevel: "info",
      otadCommand: undefined,
      ssh: undefined,
      propertyRead: undefined,
    });
  });

  it("reads the SSH target and attempt cap", () => {
    const config = parseConfig(
      {
        transport: "stdio",
        logLevel: "debug",
        otadCommand: " C:\\Ortery\\OTADCommand.exe ",
        ssh: { host: "studio-pc", user: "operator", password: "test-secret" },
        propertyRead: { maxAttempts: 10 },
      },
      PATH
    );
    expect(config.otadCommand).toBe("C:\\Ortery\\OTADCommand.exe");
    expect(config.ssh).toEqual({ host: "studio-pc", user: "operator", password: "test-secret" });
    expect(Object.isFrozen(config.ssh)).toBe(true);
    expect(config.propertyRead).toEqual({ maxAttempts: 10 });
  });

  it("treats an empty password as absent", () => {
    const config = parseConfig(
      { transport: "stdio", logLevel: "info", ssh: { host: "h", user: "u", password: "" } },
      PATH
    );
    expect(config.ssh?.password).toBeUndefined();
  });

  it.each([
    [{ transport: "http", logLevel: "info" }, "Invalid config.transport"],
    [{ transport: "stdio", logLevel: "verbose" }, "Invalid config.logLevel"],
    [{ transport: "stdio", logLevel: "info", otadCommand: "" }, "Invalid config.otadCommand"],
    [{ transport: "stdio", logLevel: "info", ssh: { user: "u" } }, "Invalid config.ssh.host"],
    [{ transport: "stdio", logLevel: "info", ssh: { host: "h", user: "u", password: 1 } }, "Invalid config.ssh.password"],
    [{ transport: "stdio", logLevel: "info", propertyRead: { maxAttempts: 0 } }, "Invalid config.propertyRead.maxAttempts"],
    [[], "Invalid config: expected JSON object"],
  ])("rejects %j", (raw, message) => {
    expect(() => parseConfig(raw, PATH)).toThrow(message);
  });
});
