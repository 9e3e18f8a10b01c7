import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { COMMAND_IDS, PROPERTY_IDS } from "../backend/ortery/descriptors.js";
import { MAX_PROPERTIES_PER_SET, MAX_ROTATION_STEPS } from "../backend/ortery/otadCommand.js";
import { toolOk } from "./result.js";

export interface TurntableAboutContext {
  serverName: string;
  serverVersion: string;
  transport: string;
  logLevel: string;
  otadCommand: string;
  /** `user@host` when commands run over SSH, otherwise null. */
  remoteHost: string | null;
}

export const TOOL_NAMES = {
  about: "turntable_mcp_about",
  devices_count: "turntable_devices_count",
  devices_get: "turntable_devices_get",
  devices_commands: "turntable_devices_commands",
  devices_properties: "turntable_devices_properties",
  properties_get: "turntable_properties_get",
  properties_set: "turntable_properties_set",
  properties_set_many: "turntable_properties_set_many",
  commands_send: "turntable_commands_send",
  rotate: "turntable_rotate",
  rotate_degrees: "turntable_rotate_degrees",
} as const;

/**
 * Return a compact operational contract: what the tools do, the id tables
 * worth knowing, and how failures are reported.
 */
export function turntableAbout(ctx: TurntableAboutContext): CallToolResult {
  return toolOk({
    schema_version: 1,
    toolkit: {
      name: ctx.serverName,
      version: ctx.serverVersion,
      transport: ctx.transport,
      log_level: ctx.logLevel,
      otad_command: ctx.otadCommand,
      remote_host: ctx.remoteHost,
    },
    tools: TOOL_NAMES,
    concepts: {
      device_index:
        "0-based index assigned by OTADCommand.exe. Valid indexes are 0..count-1 where count comes from turntable_devices_count.",
      rotation: {
        speed: { low: 0, normal: 1, high: 2 },
        direction: { clockwise: 0, counter_clockwise: 1 },
        max_step: MAX_ROTATION_STEPS,
        degrees:
          "turntable_rotate_degrees reads property 16643 (total steps per revolution) and turns trunc(degrees * total / 360) steps.",
      },
      well_known_ids: {
        commands: COMMAND_IDS,
        properties: PROPERTY_IDS,
      },
      set_many_limit: MAX_PROPERTIES_PER_SET,
    },
    workflows: [
      `${TOOL_NAMES.devices_count} -> ${TOOL_NAMES.devices_get} to pick a device_index`,
      `${TOOL_NAMES.devices_commands} / ${TOOL_NAMES.devices_properties} to see what the device supports`,
      `${TOOL_NAMES.rotate_degrees} then ${TOOL_NAMES.commands_send} (12803) to turn and fire the shutter`,
    ],
    failure_modes: {
      NOT_FOUND: "details.kind=invalid_device: bad index or device offline (vendor code 0x0040001)",
      UNSUPPORTED:
        "details.kind=operation_unsupported (0x004000a) or not_supported_by_device (0x0040005)",
      PROTOCOL: "details.kind=parse_failure: vendor output did not match the expected format",
      INVALID_ARGUMENT: "details.kind=validation: arguments outside documented bounds; nothing was sent",
      TIMEOUT: "details.kind=retry_exhausted: property read kept returning no output",
      UNAVAILABLE: "the shell (or ssh) could not be started",
    },
  });
}
