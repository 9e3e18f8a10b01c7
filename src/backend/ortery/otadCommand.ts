import { Logger } from "../../logger.js";
import { execute, redactCommand, buildShellCommand, type CommandRunner, type ConnectionTarget } from "../transport/transport.js";
import { lookupCommand, lookupProperty, PROPERTY_IDS, type DescriptorLookup } from "./descriptors.js";
import { classifySentinel, ERROR_CODES, OrteryError, type OtadErrorCode, type OtadOperation } from "./errors.js";

export const DEFAULT_OTAD_EXECUTABLE = "OTADCommand.exe";
export const DEFAULT_PROPERTY_READ_MAX_ATTEMPTS = 50;

/** Maximum number of property ids `set_properties_data` accepts at once. */
export const MAX_PROPERTIES_PER_SET = 20;

/** Upper bound for a single rotation, in motor steps (665535, not 65535). */
export const MAX_ROTATION_STEPS = 665535;

export const ROTATION_SPEED = {
  low: 0,
  normal: 1,
  high: 2,
} as const;

export const ROTATION_DIRECTION = {
  clockwise: 0,
  counterClockwise: 1,
} as const;

export interface DeviceInfo {
  productName: string;
  deviceId: number;
}

export interface OtadClientOptions {
  /** Vendor executable; a bare name is resolved by the (remote) shell's PATH. */
  executable?: string;
  /** When set, every command runs over SSH on this host. */
  target?: ConnectionTarget;
  /** Defaults to the synchronous shell {@link execute}. */
  runner?: CommandRunner;
  logger?: Logger;
  /** Attempts for a property read that keeps returning empty output. */
  propertyReadMaxAttempts?: number;
}

const ALL_CODES: readonly OtadErrorCode[] = [
  ERROR_CODES.invalidDevice,
  ERROR_CODES.operationUnsupported,
  ERROR_CODES.notSupportedByDevice,
];
const INVALID_DEVICE_ONLY: readonly OtadErrorCode[] = [ERROR_CODES.invalidDevice];

const DEVICE_COUNT_RE = /^(\d+)\r\n$/;
const DEVICE_INFO_RE = /^Product Name : ([A-Za-z0-9 ]+)\r\nDevice ID : ([0-9]+)\r\n/;
const ID_LINE_RE = /(\d+)\r\n/g;
const PROPERTY_VALUE_RE = /^(\d+)/;

/**
 * Client for `OTADCommand.exe`.
 *
 * Each method issues one vendor invocation (property reads may repeat it),
 * checks the output against the operation's failure sentences and parses the
 * expected fixed-format reply. Anything else is a `parse_failure`.
 *
 * Calls block until the vendor tool exits. The client holds no mutable state,
 * but the tool itself is not known to be reentrant: callers serialize access
 * per device.
 */
export class OtadClient {
  private readonly executable: string;
  private readonly target?: ConnectionTarget;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly propertyReadMaxAttempts: number;

  public constructor(options: OtadClientOptions = {}) {
    this.executable = options.executable ?? DEFAULT_OTAD_EXECUTABLE;
    this.target = options.target;
    this.runner = options.runner ?? execute;
    this.logger = options.logger ?? new Logger("warn");
    this.propertyReadMaxAttempts = options.propertyReadMaxAttempts ?? DEFAULT_PROPERTY_READ_MAX_ATTEMPTS;
    if (!Number.isInteger(this.propertyReadMaxAttempts) || this.propertyReadMaxAttempts < 1) {
      throw new RangeError(`propertyReadMaxAttempts must be a positive integer, got ${this.propertyReadMaxAttempts}`);
    }
  }

  /** Number of devices attached to the host. */
  public getDeviceCount(): number {
    const { command, output } = this.run("get_device_count", []);
    const m = DEVICE_COUNT_RE.exec(output);
    if (!m) {
      throw this.unexpectedOutput("get_device_count", command, output);
    }
    return Number(m[1]);
  }

  public getDeviceInfo(deviceIndex: number): DeviceInfo {
    requireDeviceIndex("get_device_info", deviceIndex);
    const { command, output } = this.run("get_device_info", [deviceIndex]);
    this.throwIfSentinel("get_device_info", output, INVALID_DEVICE_ONLY, deviceIndex, command);

    const m = DEVICE_INFO_RE.exec(output);
    if (!m) {
      throw this.unexpectedOutput("get_device_info", command, output, deviceIndex);
    }
    return { productName: m[1], deviceId: Number(m[2]) };
  }

  /** Commands the device accepts, in the order the tool lists them. */
  public getCommandDescriptors(deviceIndex: number): DescriptorLookup[] {
    requireDeviceIndex("get_command_desc", deviceIndex);
    return this.listIds("get_command_desc", deviceIndex).map(lookupCommand);
  }

  /** Properties the device exposes, in the order the tool lists them. */
  public getPropertyDescriptors(deviceIndex: number): DescriptorLookup[] {
    requireDeviceIndex("get_property_desc", deviceIndex);
    return this.listIds("get_property_desc", deviceIndex).map(lookupProperty);
  }

  /**
   * Read a property value.
   *
   * The tool sometimes prints nothing while the value is not ready yet; the
   * read is then re-issued, up to the configured attempt count.
   */
  public getPropertyValue(deviceIndex: number, propertyId: number): number {
    requireDeviceIndex("get_property_data", deviceIndex);
    requireInteger("get_property_data", "propertyId", propertyId, deviceIndex);

    for (let attempt = 1; attempt <= this.propertyReadMaxAttempts; attempt++) {
      const { command, output } = this.run("get_property_data", [deviceIndex, propertyId]);
      if (output === "") {
        this.logger.debug("get_property_data returned no output; retrying", {
          device_index: deviceIndex,
          property_id: propertyId,
          attempt,
        });
        continue;
      }
      this.throwIfSentinel("get_property_data", output, ALL_CODES, deviceIndex, command, { property_id: propertyId });

      const m = PROPERTY_VALUE_RE.exec(output);
      if (!m) {
        throw this.unexpectedOutput("get_property_data", command, output, deviceIndex);
      }
      return Number(m[1]);
    }

    const err = new OrteryError(
      "retry_exhausted",
      "get_property_data",
      `get_property_data: no output after ${this.propertyReadMaxAttempts} attempts`,
      {
        deviceIndex,
        details: { property_id: propertyId, attempts: this.propertyReadMaxAttempts },
      }
    );
    this.logger.warn(err.message, { device_index: deviceIndex, property_id: propertyId });
    throw err;
  }

  public setPropertyValue(deviceIndex: number, propertyId: number, value: number): boolean {
    requireDeviceIndex("set_property_data", deviceIndex);
    requireInteger("set_property_data", "propertyId", propertyId, deviceIndex);
    requireInteger("set_property_data", "value", value, deviceIndex);

    const { command, output } = this.run("set_property_data", [deviceIndex, propertyId, value]);
    this.throwIfSentinel("set_property_data", output, ALL_CODES, deviceIndex, command, {
      property_id: propertyId,
      value,
    });
    return true;
  }

  /** Set up to {@link MAX_PROPERTIES_PER_SET} properties to the same value. */
  public setPropertiesValues(deviceIndex: number, propertyIds: readonly number[], value: number): boolean {
    requireDeviceIndex("set_properties_data", deviceIndex);
    if (propertyIds.length === 0) {
      throw validationError("set_properties_data", "At least one property must be specified", deviceIndex);
    }
    if (propertyIds.length > MAX_PROPERTIES_PER_SET) {
      throw validationError(
        "set_properties_data",
        `At most ${MAX_PROPERTIES_PER_SET} properties can be set at a time (got ${propertyIds.length})`,
        deviceIndex
      );
    }
    for (const id of propertyIds) {
      requireInteger("set_properties_data", "propertyIds[]", id, deviceIndex);
    }
    requireInteger("set_properties_data", "value", value, deviceIndex);

    // The shared value precedes the property list on the command line.
    const { command, output } = this.run("set_properties_data", [deviceIndex, value, ...propertyIds]);
    this.throwIfSentinel("set_properties_data", output, ALL_CODES, deviceIndex, command, {
      property_ids: [...propertyIds],
      value,
    });
    return true;
  }

  public sendCommand(deviceIndex: number, commandId: number): boolean {
    requireDeviceIndex("send_command", deviceIndex);
    requireInteger("send_command", "commandId", commandId, deviceIndex);

    const { command, output } = this.run("send_command", [deviceIndex, commandId]);
    this.throwIfSentinel("send_command", output, ALL_CODES, deviceIndex, command, { command_id: commandId });
    return true;
  }

  /**
   * Turn the turntable by `step` motor steps.
   *
   * @param speed - 0 low, 1 normal, 2 high
   * @param direction - 0 clockwise, 1 counter-clockwise
   */
  public rotate(deviceIndex: number, speed: number, direction: number, step: number): boolean {
    requireRotation(deviceIndex, speed, direction);
    if (!Number.isInteger(step) || step < 0 || step > MAX_ROTATION_STEPS) {
      throw validationError("turntable", `step must be an integer in [0, ${MAX_ROTATION_STEPS}] (got ${step})`, deviceIndex);
    }

    const { command, output } = this.run("turntable", [deviceIndex, speed, direction, step]);
    this.throwIfSentinel("turntable", output, INVALID_DEVICE_ONLY, deviceIndex, command);
    return true;
  }

  /**
   * Turn the turntable by an angle, converted with the device's reported
   * steps per revolution.
   */
  public rotateDegrees(deviceIndex: number, speed: number, direction: number, degrees: number): boolean {
    requireRotation(deviceIndex, speed, direction);
    if (!Number.isFinite(degrees) || degrees < 0) {
      throw validationError("turntable", `degrees must be a finite, non-negative number (got ${degrees})`, deviceIndex);
    }
    const totalSteps = this.getPropertyValue(deviceIndex, PROPERTY_IDS.turntableTotalSteps);
    const step = Math.trunc((degrees * totalSteps) / 360);
    this.logger.debug("Converted rotation angle to steps", {
      device_index: deviceIndex,
      degrees,
      total_steps: totalSteps,
      step,
    });
    return this.rotate(deviceIndex, speed, direction, step);
  }

  private run(operation: OtadOperation, args: readonly number[]): { command: string; output: string } {
    const command = [this.executable, operation, ...args.map(String)].join(" ");
    this.logger.debug(`Executing ${operation}`, {
      command: redactCommand(buildShellCommand(command, this.target), this.target),
    });
    const output = this.runner(command, this.target);
    this.logger.debug(`${operation} output`, { output });
    return { command, output };
  }

  private listIds(operation: "get_command_desc" | "get_property_desc", deviceIndex: number): number[] {
    const { command, output } = this.run(operation, [deviceIndex]);
    this.throwIfSentinel(operation, output, INVALID_DEVICE_ONLY, deviceIndex, command);
    return Array.from(output.matchAll(ID_LINE_RE), (m) => Number(m[1]));
  }

  private throwIfSentinel(
    operation: OtadOperation,
    output: string,
    codes: readonly OtadErrorCode[],
    deviceIndex: number,
    command: string,
    extra?: Record<string, unknown>
  ): void {
    const err = classifySentinel(operation, output, codes, {
      deviceIndex,
      details: { device_index: deviceIndex, command, ...extra },
    });
    if (err) {
      this.logger.warn(err.message, { kind: err.kind, device_index: deviceIndex });
      throw err;
    }
  }

  private unexpectedOutput(operation: OtadOperation, command: string, output: string, deviceIndex?: number): OrteryError {
    const err = new OrteryError("parse_failure", operation, `${operation}: unexpected output from vendor tool`, {
      deviceIndex,
      details: { command, output },
    });
    this.logger.warn(err.message, { output });
    return err;
  }
}

function validationError(operation: OtadOperation, message: string, deviceIndex?: number): OrteryError {
  return new OrteryError("validation", operation, `${operation}: ${message}`, { deviceIndex });
}

function requireInteger(operation: OtadOperation, field: string, value: number, deviceIndex?: number): void {
  if (!Number.isInteger(value)) {
    throw validationError(operation, `${field} must be an integer (got ${value})`, deviceIndex);
  }
}

function requireDeviceIndex(operation: OtadOperation, deviceIndex: number): void {
  if (!Number.isInteger(deviceIndex) || deviceIndex < 0) {
    throw validationError(operation, `deviceIndex must be a non-negative integer (got ${deviceIndex})`);
  }
}

/** Device index, speed and direction checks shared by both rotation calls. */
function requireRotation(deviceIndex: number, speed: number, direction: number): void {
  requireDeviceIndex("turntable", deviceIndex);
  if (speed !== ROTATION_SPEED.low && speed !== ROTATION_SPEED.normal && speed !== ROTATION_SPEED.high) {
    throw validationError("turntable", `speed must be 0, 1 or 2 (got ${speed})`, deviceIndex);
  }
  if (direction !== ROTATION_DIRECTION.clockwise && direction !== ROTATION_DIRECTION.counterClockwise) {
    throw validationError("turntable", `direction must be 0 or 1 (got ${direction})`, deviceIndex);
  }
}
