import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { OtadClient } from "../backend/ortery/otadCommand.js";
import type { Logger } from "../logger.js";
import type { KeyedLock } from "../utils.js";
import { toolErrFromException, toolOk } from "./result.js";

/**
 * Everything a tool handler needs: the vendor client, the per-device lock and
 * the process logger.
 */
export interface TurntableToolContext {
  client: OtadClient;
  lock: KeyedLock;
  logger: Logger;
}

/** Lock key for calls that do not address a single device. */
export const HOST_LOCK_KEY = "host";

export function deviceLockKey(deviceIndex: number): string {
  return `device:${deviceIndex}`;
}

/**
 * Run a blocking client call under `lockKey` and wrap the outcome in the
 * standard envelope.
 *
 * Client calls block on `spawnSync`, so two calls never overlap today; the
 * lock only starts to matter once the transport turns asynchronous.
 */
export async function runLocked<T extends Record<string, unknown>>(
  ctx: TurntableToolContext,
  tool: string,
  lockKey: string,
  fn: () => T
): Promise<CallToolResult> {
  try {
    const data = await ctx.lock.withLock(lockKey, async () => fn());
    return toolOk(data);
  } catch (err) {
    ctx.logger.debug(`${tool} failed`, { error: err instanceof Error ? err.message : String(err) });
    return toolErrFromException(tool, err);
  }
}
