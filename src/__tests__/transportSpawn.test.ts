import { describe, it, expect, vi } from "vitest";

vi.mock("node:child_process", () => ({
  spawnSync: vi.fn(() => ({
    pid: 0,
    output: [],
    stdout: null,
    stderr: null,
    status: null,
    signal: null,
    error: new Error("spawn /bin/sh ENOENT"),
  })),
}));

import { TransportError, execute } from "../backend/transport/transport.js";

function catchTransport(fn: () => unknown): TransportError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TransportError) return err;
    throw err;
  }
  throw new Error("expected a TransportError");
}

describe("execute when the shell cannot be spawned", () => {
  it("throws a TransportError whose command has the password masked", () => {
    const err = catchTransport(() =>
      execute("OTADCommand.exe get_device_count", { user: "u", host: "h", password: "test-secret" })
    );
    expect(err.kind).toBe("failed");
    expect(err.message).toBe("Failed to run command: spawn /bin/sh ENOENT");
    expect(err.details.command).toBe(
      `sshpass -p '***' ssh -o StrictHostKeyChecking=no -o LogLevel=QUIET 'u@h' "OTADCommand.exe get_device_count"`
    );
    expect(err.details.error).toBe("Error: spawn /bin/sh ENOENT");
  });
});
