import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { deviceLockKey, runLocked, type TurntableToolContext } from "./context.js";

export function turntableCommandsSend(
  ctx: TurntableToolContext,
  args: { device_index: number; command_id: number }
): Promise<CallToolResult> {
  return runLocked(ctx, "turntable_commands_send", deviceLockKey(args.device_index), () => ({
    acknowledged: ctx.client.sendCommand(args.device_index, args.command_id),
  }));
}

export function turntableRotate(
  ctx: TurntableToolContext,
  args: { device_index: number; speed: number; direction: number; step: number }
): Promise<CallToolResult> {
  return runLocked(ctx, "turntable_rotate", deviceLockKey(args.device_index), () => ({
    acknowledged: ctx.client.rotate(args.device_index, args.speed, args.direction, args.step),
  }));
}

/**
 * Rotate by an angle. The total-steps property read and the rotation happen
 * inside one synchronous client call, so nothing runs between them.
 */
export function turntableRotateDegrees(
  ctx: TurntableToolContext,
  args: { device_index: number; speed: number; direction: number; degrees: number }
): Promise<CallToolResult> {
  return runLocked(ctx, "turntable_rotate_degrees", deviceLockKey(args.device_index), () => ({
    acknowledged: ctx.client.rotateDegrees(args.device_index, args.speed, args.direction, args.degrees),
  }));
}
