import { spawnSync } from "node:child_process";

/**
 * Remote execution descriptor for the Windows host that owns the turntable.
 */
export interface ConnectionTarget {
  readonly host: string;
  readonly user: string;
  /** Cleartext password, injected through `sshpass` when present. */
  readonly password?: string;
}

/**
 * A structured error representing a failure to start the shell at all.
 *
 * Output that merely looks wrong is not a transport failure; the layer above
 * classifies text, not exit codes.
 */
export class TransportError extends Error {
  public readonly kind: "failed";
  public readonly details: Record<string, unknown>;

  public constructor(message: string, details: Record<string, unknown>) {
    super(message);
    this.name = "TransportError";
    this.kind = "failed";
    this.details = details;
  }
}

/**
 * Runs a complete command line and returns its stdout.
 *
 * The production implementation is {@link execute}; tests substitute a
 * scripted runner.
 */
export type CommandRunner = (commandText: string, target?: ConnectionTarget) => string;

/** Quote a value for a POSIX shell using single quotes. */
function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * Wrap `commandText` so it runs on `target.host` as `target.user`.
 *
 * Host key checking is disabled and ssh's own logging silenced so that the
 * captured stdout is exactly what the remote command printed. The
 * destination is single-quoted so config values reach ssh as one word.
 */
export function buildSshCommand(target: ConnectionTarget, commandText: string): string {
  const passwordPrefix = target.password ? `sshpass -p ${shellQuote(target.password)} ` : "";
  return (
    `${passwordPrefix}ssh -o StrictHostKeyChecking=no -o LogLevel=QUIET ` +
    `${shellQuote(`${target.user}@${target.host}`)} "${commandText}"`
  );
}

/**
 * Produce the final shell line for `commandText`, local or remote.
 */
export function buildShellCommand(commandText: string, target?: ConnectionTarget): string {
  return target ? buildSshCommand(target, commandText) : commandText;
}

/**
 * Replace the password in a shell line so it can be logged or reported.
 */
export function redactCommand(shellCommand: string, target?: ConnectionTarget): string {
  if (!target?.password) return shellCommand;
  return shellCommand.split(shellQuote(target.password)).join("'***'");
}

/**
 * Execute a command through the shell and return stdout.
 *
 * Blocking, single attempt. stdout is decoded as latin1 so any byte the
 * vendor tool emits survives decoding.
 *
 * @throws TransportError if the shell could not be spawned.
 */
export const execute: CommandRunner = (commandText, target) => {
  const shellCommand = buildShellCommand(commandText, target);
  const res = spawnSync(shellCommand, {
    shell: true,
    encoding: "latin1",
    windowsHide: true,
  });
  if (res.error) {
    throw new TransportError(`Failed to run command: ${res.error.message}`, {
      command: redactCommand(shellCommand, target),
      error: String(res.error),
    });
  }
  return String(res.stdout ?? "");
};
