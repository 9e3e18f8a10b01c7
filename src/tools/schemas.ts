import { z } from "zod/v4";
import { MAX_PROPERTIES_PER_SET, MAX_ROTATION_STEPS } from "../backend/ortery/otadCommand.js";

/**
 * Shared Zod schemas for turntable MCP tool inputs and outputs.
 *
 * Bounds mirror the checks in the command layer, so out-of-range input is
 * rejected before a handler runs.
 */

/**
 * Accept either the expected type or a JSON string that parses to it. Some
 * MCP clients serialize array/object parameters as strings.
 *
 * @param schema - The Zod schema to wrap
 * @param fieldName - Optional field name for debug logging
 */
export function withJsonStringFallback<T extends z.ZodTypeAny>(schema: T, fieldName?: string) {
  return z.preprocess((val) => {
    if (typeof val !== "string") {
      return val;
    }
    try {
      const parsed: unknown = JSON.parse(val);
      if (process.env.TURNTABLE_DEBUG_JSON_FALLBACK) {
        console.warn(
          `[turntable] JSON string fallback triggered${fieldName ? ` for '${fieldName}'` : ""}: ` +
            `received string, parsed to ${typeof parsed}`
        );
      }
      return parsed;
    } catch {
      // Leave the string as-is so Zod reports the type mismatch.
      return val;
    }
  }, schema);
}

export const zNonEmptyString = z
  .string()
  .min(1, "Must be a non-empty string")
  .describe("A non-empty string.");

export const zDeviceIndex = z
  .number()
  .int()
  .min(0)
  .describe("0-based device index assigned by OTADCommand.exe (see `turntable_devices_count`).");

export const zPropertyId = z
  .number()
  .int()
  .describe("Numeric property id (e.g., 16643 = total steps per revolution).");

export const zPropertyValue = z.number().int().describe("Integer property value.");

export const zPropertyIds = z
  .array(zPropertyId)
  .min(1)
  .max(MAX_PROPERTIES_PER_SET)
  .describe(`Property ids to set (1 to ${MAX_PROPERTIES_PER_SET}).`);

export const zCommandId = z
  .number()
  .int()
  .describe("Numeric command id (e.g., 13057 = stop the turntable, 12803 = shutter release).");

export const zRotationSpeed = z
  .number()
  .int()
  .min(0)
  .max(2)
  .describe("Rotation speed: 0 low, 1 normal, 2 high.");

export const zRotationDirection = z
  .number()
  .int()
  .min(0)
  .max(1)
  .describe("Rotation direction: 0 clockwise, 1 counter-clockwise.");

export const zRotationStep = z
  .number()
  .int()
  .min(0)
  .max(MAX_ROTATION_STEPS)
  .describe(`Motor steps to turn (0 to ${MAX_ROTATION_STEPS}).`);

export const zRotationDegrees = z
  .number()
  .min(0)
  .describe("Angle to turn, in degrees; converted using the device's total steps per revolution.");

export const zJsonObject = z
  .record(z.string(), z.unknown())
  .describe("A JSON object (string keys).");

/**
 * Standardized tool result envelopes (success + error), used as
 * `structuredContent` so clients need not parse `content[].text`.
 */
export const zToolErrorCode = z
  .enum(["INVALID_ARGUMENT", "NOT_FOUND", "UNSUPPORTED", "PROTOCOL", "UNAVAILABLE", "TIMEOUT", "INTERNAL"])
  .describe("Stable machine-readable error code.");

export const zToolError = z
  .object({
    code: zToolErrorCode,
    message: zNonEmptyString.describe("Human-readable error message."),
    tool: zNonEmptyString.describe("Tool name that produced this error."),
    retryable: z.boolean().optional().describe("Whether a retry may succeed."),
    details: zJsonObject
      .optional()
      .describe("Structured details; `kind` is the command-layer failure kind (e.g., invalid_device)."),
    suggestion: zNonEmptyString.optional().describe("Actionable suggestion on how to resolve."),
  })
  .describe("Standard turntable tool error envelope.");

/**
 * Object-shaped output envelope. The MCP SDK validates output schemas as
 * objects, so this is not a union.
 */
export function zToolResult<T extends z.ZodTypeAny>(dataSchema: T) {
  return z
    .object({
      ok: z.boolean().describe("True on success; false on failure."),
      data: dataSchema.optional().describe("Success payload when ok=true."),
      error: zToolError.optional().describe("Error payload when ok=false."),
    })
    .passthrough()
    .describe("Standard turntable tool result envelope.");
}

export const zDescriptor = z
  .object({
    known: z.boolean().describe("False when the id is missing from the built-in tables."),
    value: z.number().int().describe("Numeric id."),
    name: z.string().optional().describe("Vendor constant name (known ids only)."),
    description: z.string().optional().describe("Human description (known ids only)."),
  })
  .describe("Command or property descriptor.");

export const zAcknowledged = z.object({
  acknowledged: z.boolean().describe("True when the vendor tool accepted the request."),
});

/**
 * Tool output schemas (public contract).
 */
export const zOutMcpAbout = zToolResult(
  z
    .object({
      schema_version: z.number().int().positive(),
      toolkit: z
        .object({
          name: zNonEmptyString,
          version: zNonEmptyString,
          transport: zNonEmptyString,
          log_level: zNonEmptyString,
          otad_command: zNonEmptyString,
          remote_host: z.string().nullable(),
        })
        .passthrough(),
    })
    .passthrough()
);

export const zOutDevicesCount = zToolResult(
  z.object({
    count: z.number().int().min(0).describe("Number of attached devices."),
  })
);

export const zOutDevicesGet = zToolResult(
  z.object({
    device: z.object({
      device_index: zDeviceIndex,
      product_name: z.string(),
      device_id: z.number().int(),
    }),
  })
);

export const zOutDevicesCommands = zToolResult(
  z.object({
    commands: z.array(zDescriptor),
  })
);

export const zOutDevicesProperties = zToolResult(
  z.object({
    properties: z.array(zDescriptor),
  })
);

export const zOutPropertiesGet = zToolResult(
  z.object({
    device_index: zDeviceIndex,
    property_id: zPropertyId,
    value: z.number().int(),
  })
);

export const zOutAcknowledged = zToolResult(zAcknowledged);
