import { describe, it, expect, vi } from "vitest";
import { OtadClient } from "../backend/ortery/otadCommand.js";
import { TransportError, type CommandRunner } from "../backend/transport/transport.js";
import { Logger } from "../logger.js";
import { turntableAbout } from "../tools/about.js";
import { deviceLockKey, type TurntableToolContext } from "../tools/context.js";
import {
  turntableDevicesCommands,
  turntableDevicesCount,
  turntableDevicesGet,
} from "../tools/devices.js";
import { turntablePropertiesGet, turntablePropertiesSetMany } from "../tools/properties.js";
import { toolErrFromException } from "../tools/result.js";
import { turntableCommandsSend, turntableRotate, turntableRotateDegrees } from "../tools/turntable.js";
import { KeyedLock } from "../utils.js";

function contextFor(runner: CommandRunner, propertyReadMaxAttempts?: number): TurntableToolContext {
  const logger = new Logger("error");
  return {
    client: new OtadClient({ runner, logger, propertyReadMaxAttempts }),
    lock: new KeyedLock(),
    logger,
  };
}

function scripted(...outputs: string[]) {
  const queue = [...outputs];
  return vi.fn<CommandRunner>(() => queue.shift() ?? "");
}

describe("turntable tools", () => {
  it("wraps the device count in the success envelope", async () => {
    const result = await turntableDevicesCount(contextFor(scripted("1\r\n")));
    expect(result.isError).toBeUndefined();
    expect(result.structuredContent).toEqual({ ok: true, data: { count: 1 } });
    expect(result.content).toEqual([
      { type: "text", text: JSON.stringify({ ok: true, data: { count: 1 } }, null, 2) },
    ]);
  });

  it("returns device info in snake_case", async () => {
    const result = await turntableDevicesGet(contextFor(scripted("Product Name : Photobench E\r\nDevice ID : 3\r\n")), {
      device_index: 0,
    });
    expect(result.structuredContent).toEqual({
      ok: true,
      data: { device: { device_index: 0, product_name: "Photobench E", device_id: 3 } },
    });
  });

  it("keeps the failure kind for an offline device", async () => {
    const result = await turntableDevicesGet(
      contextFor(scripted("get_device_info :  command exec fail ( error code : 0x0040001)\r\n")),
      { device_index: 5 }
    );
    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: {
        code: "NOT_FOUND",
        tool: "turntable_devices_get",
        retryable: true,
        details: { kind: "invalid_device", operation: "get_device_info", device_index: 5, code: "0x0040001" },
      },
    });
  });

  it("serializes unknown descriptors without name or description", async () => {
    const result = await turntableDevicesCommands(contextFor(scripted("13058\r\n4242\r\n")), { device_index: 0 });
    expect(result.structuredContent).toEqual({
      ok: true,
      data: {
        commands: [
          {
            known: true,
            value: 13058,
            name: "otadDEVICE_COMMAND_TURNTABLE_RELEASE",
            description: "Release the motor of turntable",
          },
          { known: false, value: 4242 },
        ],
      },
    });
  });

  it("reports an exhausted property read as TIMEOUT", async () => {
    const result = await turntablePropertiesGet(contextFor(scripted(), 2), { device_index: 0, property_id: 16641 });
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "TIMEOUT", retryable: true, details: { kind: "retry_exhausted", attempts: 2 } },
    });
  });

  it("returns the property value", async () => {
    const result = await turntablePropertiesGet(contextFor(scripted("", "7\r\n")), { device_index: 1, property_id: 16641 });
    expect(result.structuredContent).toEqual({
      ok: true,
      data: { device_index: 1, property_id: 16641, value: 7 },
    });
  });

  it("reports out-of-range input as INVALID_ARGUMENT", async () => {
    const runner = scripted();
    const result = await turntableRotate(contextFor(runner), { device_index: 0, speed: 3, direction: 0, step: 10 });
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "INVALID_ARGUMENT", retryable: false, details: { kind: "validation", operation: "turntable" } },
    });
    expect(runner).not.toHaveBeenCalled();
  });

  it("reports an oversized property set as INVALID_ARGUMENT", async () => {
    const ids = Array.from({ length: 21 }, (_, i) => i);
    const result = await turntablePropertiesSetMany(contextFor(scripted()), { device_index: 0, property_ids: ids, value: 1 });
    expect(result.structuredContent).toMatchObject({ ok: false, error: { code: "INVALID_ARGUMENT" } });
  });

  it("maps both unsupported sentinels to UNSUPPORTED", async () => {
    const unsupported = await turntableCommandsSend(
      contextFor(scripted("send_command :  command exec fail ( error code : 0x004000a)\r\n")),
      { device_index: 0, command_id: 1 }
    );
    const notOnDevice = await turntableCommandsSend(
      contextFor(scripted("send_command :  command exec fail ( error code : 0x0040005)\r\n")),
      { device_index: 0, command_id: 1 }
    );
    expect(unsupported.structuredContent).toMatchObject({
      error: { code: "UNSUPPORTED", details: { kind: "operation_unsupported", command_id: 1 } },
    });
    expect(notOnDevice.structuredContent).toMatchObject({
      error: { code: "UNSUPPORTED", details: { kind: "not_supported_by_device" } },
    });
  });

  it("acknowledges a rotation by degrees", async () => {
    const runner = scripted("3600\r\n", "");
    const result = await turntableRotateDegrees(contextFor(runner), {
      device_index: 0,
      speed: 1,
      direction: 1,
      degrees: 45,
    });
    expect(result.structuredContent).toEqual({ ok: true, data: { acknowledged: true } });
    expect(runner).toHaveBeenLastCalledWith("OTADCommand.exe turntable 0 1 1 450", undefined);
  });

  it("reports a shell that cannot start as UNAVAILABLE", async () => {
    const runner = vi.fn<CommandRunner>(() => {
      throw new TransportError("Failed to run command: spawn /bin/sh ENOENT", { command: "OTADCommand.exe get_device_count" });
    });
    const result = await turntableDevicesCount(contextFor(runner));
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "UNAVAILABLE", retryable: true, details: { kind: "failed" } },
    });
  });

  it("maps anything else to INTERNAL", () => {
    const result = toolErrFromException("turntable_rotate", new Error("boom"));
    expect(result.structuredContent).toEqual({
      ok: false,
      error: { code: "INTERNAL", tool: "turntable_rotate", message: "boom", retryable: false },
    });
  });

  it("runs calls for the same device one at a time", async () => {
    const ctx = contextFor(scripted("", "", ""));
    const order: string[] = [];
    const first = ctx.lock.withLock(deviceLockKey(0), async () => {
      order.push("first:start");
      await Promise.resolve();
      order.push("first:end");
    });
    const second = turntableRotate(ctx, { device_index: 0, speed: 0, direction: 0, step: 1 }).then(() => {
      order.push("rotate");
    });
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "rotate"]);
  });
});

describe("turntableAbout", () => {
  it("echoes the effective configuration", () => {
    const result = turntableAbout({
      serverName: "turntable",
      serverVersion: "0.1.0",
      transport: "stdio",
      logLevel: "info",
      otadCommand: "OTADCommand.exe",
      remoteHost: "operator@studio-pc",
    });
    expect(result.structuredContent).toMatchObject({
      ok: true,
      data: {
        schema_version: 1,
        toolkit: { name: "turntable", remote_host: "operator@studio-pc", otad_command: "OTADCommand.exe" },
      },
    });
  });
});
