import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { deviceLockKey, runLocked, type TurntableToolContext } from "./context.js";

/**
 * Read one property. Empty replies from the vendor tool are polled up to the
 * configured attempt count before the tool reports TIMEOUT.
 */
export function turntablePropertiesGet(
  ctx: TurntableToolContext,
  args: { device_index: number; property_id: number }
): Promise<CallToolResult> {
  return runLocked(ctx, "turntable_properties_get", deviceLockKey(args.device_index), () => ({
    device_index: args.device_index,
    property_id: args.property_id,
    value: ctx.client.getPropertyValue(args.device_index, args.property_id),
  }));
}

export function turntablePropertiesSet(
  ctx: TurntableToolContext,
  args: { device_index: number; property_id: number; value: number }
): Promise<CallToolResult> {
  return runLocked(ctx, "turntable_properties_set", deviceLockKey(args.device_index), () => ({
    acknowledged: ctx.client.setPropertyValue(args.device_index, args.property_id, args.value),
  }));
}

/**
 * Set several properties (1-20) to one shared value in a single invocation.
 */
export function turntablePropertiesSetMany(
  ctx: TurntableToolContext,
  args: { device_index: number; property_ids: number[]; value: number }
): Promise<CallToolResult> {
  return runLocked(ctx, "turntable_properties_set_many", deviceLockKey(args.device_index), () => ({
    acknowledged: ctx.client.setPropertiesValues(args.device_index, args.property_ids, args.value),
  }));
}
