import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { OrteryError, type OrteryErrorKind } from "../backend/ortery/errors.js";
import { TransportError } from "../backend/transport/transport.js";

/**
 * Machine-readable error codes for turntable tool responses.
 *
 * Keep this list stable once clients depend on it.
 */
export type TurntableToolErrorCode =
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "UNSUPPORTED"
  | "PROTOCOL"
  | "UNAVAILABLE"
  | "TIMEOUT"
  | "INTERNAL";

/**
 * Standard machine-readable error envelope for all turntable tools.
 */
export interface TurntableToolError {
  /** Stable error code for programmatic branching. */
  code: TurntableToolErrorCode;
  /** Human-readable message (safe for operator display). */
  message: string;
  /** Tool name that produced the error (e.g., `turntable_rotate`). */
  tool: string;
  /** Whether retrying the exact same request may succeed. */
  retryable?: boolean;
  /** Structured details; `kind` carries the command-layer failure kind. */
  details?: Record<string, unknown>;
  /** Actionable suggestion for the AI/operator on how to resolve this error. */
  suggestion?: string;
}

export interface TurntableToolOk<T> extends Record<string, unknown> {
  ok: true;
  data: T;
}

export interface TurntableToolFail extends Record<string, unknown> {
  ok: false;
  error: TurntableToolError;
}

/**
 * Build a successful MCP tool response with both:
 * - `structuredContent` (primary; validated when outputSchema is present)
 * - `content[].text` JSON (fallback for clients that only read text)
 */
export function toolOk<T extends Record<string, unknown>>(data: T): CallToolResult {
  const structuredContent: TurntableToolOk<T> = { ok: true, data };
  return {
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}

/**
 * Build an error MCP tool response. `isError=true` makes MCP clients treat
 * it as a tool failure.
 */
export function toolErr(error: TurntableToolError): CallToolResult {
  const structuredContent: TurntableToolFail = { ok: false, error };
  return {
    isError: true,
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}

interface KindMapping {
  code: TurntableToolErrorCode;
  retryable: boolean;
  suggestion?: string;
}

const KIND_MAPPING: Record<OrteryErrorKind, KindMapping> = {
  invalid_device: {
    code: "NOT_FOUND",
    retryable: true,
    suggestion: "Check device_index against turntable_devices_count and that the turntable is powered and connected",
  },
  operation_unsupported: {
    code: "UNSUPPORTED",
    retryable: false,
    suggestion: "List supported ids with turntable_devices_commands or turntable_devices_properties",
  },
  not_supported_by_device: {
    code: "UNSUPPORTED",
    retryable: false,
    suggestion: "This device model does not implement the id; list supported ids for this device",
  },
  parse_failure: {
    code: "PROTOCOL",
    retryable: false,
    suggestion: "Check the installed OTADCommand.exe version; details.output holds the raw reply",
  },
  validation: {
    code: "INVALID_ARGUMENT",
    retryable: false,
  },
  retry_exhausted: {
    code: "TIMEOUT",
    retryable: true,
    suggestion: "The device kept returning no value; retry, or raise config.propertyRead.maxAttempts",
  },
};

/**
 * Map a command-layer exception to the standard error envelope.
 *
 * The failure kind survives in `details.kind` so clients can branch on more
 * than the coarse code.
 */
export function toolErrFromException(tool: string, err: unknown): CallToolResult {
  if (err instanceof OrteryError) {
    const mapping = KIND_MAPPING[err.kind];
    return toolErr({
      code: mapping.code,
      tool,
      message: err.message,
      retryable: mapping.retryable,
      details: {
        kind: err.kind,
        operation: err.operation,
        ...(err.deviceIndex === undefined ? {} : { device_index: err.deviceIndex }),
        ...err.details,
      },
      suggestion: mapping.suggestion,
    });
  }
  if (err instanceof TransportError) {
    return toolErr({
      code: "UNAVAILABLE",
      tool,
      message: err.message,
      retryable: true,
      details: { kind: err.kind, ...err.details },
      suggestion: "Ensure the shell can start ssh/sshpass (remote) or OTADCommand.exe (local)",
    });
  }
  const msg = err instanceof Error ? err.message : String(err);
  return toolErr({ code: "INTERNAL", tool, message: msg, retryable: false });
}
