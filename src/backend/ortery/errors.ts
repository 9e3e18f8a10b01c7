/**
 * Failure kinds raised by the vendor command layer.
 *
 * - `invalid_device`: bad device index, or the device is offline (`0x0040001`)
 * - `operation_unsupported`: the tool does not support this property/command (`0x004000a`)
 * - `not_supported_by_device`: supported by the tool, not by this device (`0x0040005`)
 * - `parse_failure`: output matched neither a sentinel nor the expected shape
 * - `validation`: arguments rejected before invoking the tool
 * - `retry_exhausted`: the tool kept printing nothing for a polled read
 */
export type OrteryErrorKind =
  | "invalid_device"
  | "operation_unsupported"
  | "not_supported_by_device"
  | "parse_failure"
  | "validation"
  | "retry_exhausted";

/**
 * Vendor operation names, exactly as passed on the `OTADCommand.exe` command line.
 */
export type OtadOperation =
  | "get_device_count"
  | "get_device_info"
  | "get_command_desc"
  | "get_property_desc"
  | "get_property_data"
  | "set_property_data"
  | "set_properties_data"
  | "send_command"
  | "turntable";

/**
 * The single failure type of the command layer. Switch on `kind`.
 */
export class OrteryError extends Error {
  public readonly kind: OrteryErrorKind;
  public readonly operation: OtadOperation;
  public readonly deviceIndex?: number;
  public readonly details: Record<string, unknown>;

  public constructor(
    kind: OrteryErrorKind,
    operation: OtadOperation,
    message: string,
    options?: { deviceIndex?: number; details?: Record<string, unknown> }
  ) {
    super(message);
    this.name = "OrteryError";
    this.kind = kind;
    this.operation = operation;
    this.deviceIndex = options?.deviceIndex;
    this.details = options?.details ?? {};
  }
}

/** Error codes embedded in the vendor tool's failure sentences. */
export const ERROR_CODES = {
  invalidDevice: "0x0040001",
  operationUnsupported: "0x004000a",
  notSupportedByDevice: "0x0040005",
} as const;

export type OtadErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

const KIND_BY_CODE: Record<OtadErrorCode, OrteryErrorKind> = {
  [ERROR_CODES.invalidDevice]: "invalid_device",
  [ERROR_CODES.operationUnsupported]: "operation_unsupported",
  [ERROR_CODES.notSupportedByDevice]: "not_supported_by_device",
};

const MESSAGE_BY_KIND: Partial<Record<OrteryErrorKind, string>> = {
  invalid_device: "Invalid device index, or the device is offline",
  operation_unsupported: "Operation is not supported for this property or command",
  not_supported_by_device: "Property or command is not supported by this device",
};

/**
 * The exact text the vendor tool prints when `operation` fails with `code`.
 */
export function sentinelText(operation: OtadOperation, code: OtadErrorCode): string {
  return `${operation} :  command exec fail ( error code : ${code})\r\n`;
}

/**
 * Match raw output against the failure sentences an operation can produce.
 *
 * @param codes - Codes this operation is known to report, checked in order.
 * @returns The classified error, or `null` when the output is not a sentinel.
 */
export function classifySentinel(
  operation: OtadOperation,
  output: string,
  codes: readonly OtadErrorCode[],
  context: { deviceIndex?: number; details?: Record<string, unknown> }
): OrteryError | null {
  for (const code of codes) {
    if (output === sentinelText(operation, code)) {
      const kind = KIND_BY_CODE[code];
      return new OrteryError(kind, operation, `${operation}: ${MESSAGE_BY_KIND[kind] ?? kind} (${code})`, {
        deviceIndex: context.deviceIndex,
        details: { ...context.details, code },
      });
    }
  }
  return null;
}
