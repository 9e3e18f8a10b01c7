import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type { ConnectionTarget } from "./backend/transport/transport.js";
import type { LogLevel } from "./logger.js";
import { isNonEmptyString, isRecord } from "./utils.js";

/** Module-level config cache to avoid redundant fs.readFileSync calls. */
let cachedConfig: TurntableConfig | null = null;

export type TurntableTransport = "stdio";

export interface TurntableConfig {
  /**
   * MCP transport mode.
   *
   * Currently only `stdio` is supported.
   */
  transport: TurntableTransport;

  /** Logging verbosity for the host process. */
  logLevel: LogLevel;

  /**
   * Vendor executable to invoke (e.g., `C:\\Ortery\\OTADCommand.exe`).
   *
   * Defaults to `OTADCommand.exe`, resolved through PATH on the host that runs it.
   */
  otadCommand?: string;

  /**
   * Run every vendor command over SSH on the Windows host that owns the
   * turntable. Omit to run locally.
   */
  ssh?: ConnectionTarget;

  /** Bound on the empty-output polling of property reads. */
  propertyRead?: {
    maxAttempts: number;
  };
}

/**
 * Get the project root directory by resolving from this file's location.
 * Works regardless of the process's current working directory.
 */
function getProjectRootDir(): string {
  const thisFile = fileURLToPath(import.meta.url);
  const thisDir = path.dirname(thisFile);
  // This file is dist/config.js (or src/config.ts under test), so project root is one level up
  return path.resolve(thisDir, "..");
}

function parseSsh(value: unknown, configPath: string): ConnectionTarget | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new Error(`Invalid config.ssh: expected object at ${configPath}`);
  }
  const { host, user, password } = value;
  if (!isNonEmptyString(host)) {
    throw new Error(`Invalid config.ssh.host: expected non-empty string at ${configPath}`);
  }
  if (!isNonEmptyString(user)) {
    throw new Error(`Invalid config.ssh.user: expected non-empty string at ${configPath}`);
  }
  if (password !== undefined && typeof password !== "string") {
    throw new Error(`Invalid config.ssh.password: expected string at ${configPath}`);
  }
  return Object.freeze({
    host: host.trim(),
    user: user.trim(),
    password: typeof password === "string" && password.length > 0 ? password : undefined,
  });
}

/**
 * Validate an already-parsed configuration object.
 *
 * @param configPath - Used in error messages only.
 * @throws If any field is missing or malformed.
 */
export function parseConfig(parsed: unknown, configPath: string): TurntableConfig {
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config: expected JSON object at ${configPath}`);
  }

  const transport = parsed.transport;
  const logLevel = parsed.logLevel;
  const rawOtadCommand = parsed.otadCommand;
  const propertyRead = parsed.propertyRead;

  if (transport !== "stdio") {
    throw new Error(
      `Invalid config.transport: expected \"stdio\" at ${configPath}`
    );
  }
  if (logLevel !== "debug" && logLevel !== "info" && logLevel !== "warn" && logLevel !== "error") {
    throw new Error(
      `Invalid config.logLevel: expected debug|info|warn|error at ${configPath}`
    );
  }
  let otadCommand: string | undefined;
  if (rawOtadCommand !== undefined) {
    if (!isNonEmptyString(rawOtadCommand)) {
      throw new Error(`Invalid config.otadCommand: expected non-empty string at ${configPath}`);
    }
    otadCommand = rawOtadCommand.trim();
  }

  let maxAttempts: number | undefined;
  if (propertyRead !== undefined) {
    if (!isRecord(propertyRead)) {
      throw new Error(`Invalid config.propertyRead: expected object at ${configPath}`);
    }
    const attempts = propertyRead.maxAttempts;
    if (typeof attempts !== "number" || !Number.isInteger(attempts) || attempts < 1) {
      throw new Error(`Invalid config.propertyRead.maxAttempts: expected positive integer at ${configPath}`);
    }
    maxAttempts = attempts;
  }

  return {
    transport,
    logLevel,
    otadCommand,
    ssh: parseSsh(parsed.ssh, configPath),
    propertyRead: maxAttempts === undefined ? undefined : { maxAttempts },
  };
}

/**
 * Load turntable MCP runtime configuration from `config.json`.
 *
 * Precedence:
 * - `TURNTABLE_CONFIG_PATH` env var (absolute path)
 * - `<projectRoot>/config.json` (project root detected via import.meta.url)
 *
 * @throws If the config file is missing or malformed.
 */
export function loadConfig(): TurntableConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const projectRoot = getProjectRootDir();
  const configPath = process.env.TURNTABLE_CONFIG_PATH
    ? path.resolve(process.env.TURNTABLE_CONFIG_PATH)
    : path.join(projectRoot, "config.json");

  const raw = fs.readFileSync(configPath, "utf-8");
  cachedConfig = parseConfig(JSON.parse(raw), configPath);
  return cachedConfig;
}
