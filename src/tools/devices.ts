import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { DescriptorLookup } from "../backend/ortery/descriptors.js";
import { deviceLockKey, HOST_LOCK_KEY, runLocked, type TurntableToolContext } from "./context.js";

/**
 * Wire shape of a descriptor. Unknown ids carry only `known` and `value`.
 */
export function descriptorToWire(d: DescriptorLookup): Record<string, unknown> {
  if (!d.known) {
    return { known: false, value: d.value };
  }
  return { known: true, value: d.value, name: d.name, description: d.description };
}

/**
 * Count the devices attached to the turntable host.
 */
export function turntableDevicesCount(ctx: TurntableToolContext): Promise<CallToolResult> {
  return runLocked(ctx, "turntable_devices_count", HOST_LOCK_KEY, () => ({
    count: ctx.client.getDeviceCount(),
  }));
}

/**
 * Product name and device id for one device index.
 */
export function turntableDevicesGet(
  ctx: TurntableToolContext,
  args: { device_index: number }
): Promise<CallToolResult> {
  return runLocked(ctx, "turntable_devices_get", deviceLockKey(args.device_index), () => {
    const info = ctx.client.getDeviceInfo(args.device_index);
    return {
      device: {
        device_index: args.device_index,
        product_name: info.productName,
        device_id: info.deviceId,
      },
    };
  });
}

export function turntableDevicesCommands(
  ctx: TurntableToolContext,
  args: { device_index: number }
): Promise<CallToolResult> {
  return runLocked(ctx, "turntable_devices_commands", deviceLockKey(args.device_index), () => ({
    commands: ctx.client.getCommandDescriptors(args.device_index).map(descriptorToWire),
  }));
}

export function turntableDevicesProperties(
  ctx: TurntableToolContext,
  args: { device_index: number }
): Promise<CallToolResult> {
  return runLocked(ctx, "turntable_devices_properties", deviceLockKey(args.device_index), () => ({
    properties: ctx.client.getPropertyDescriptors(args.device_index).map(descriptorToWire),
  }));
}
