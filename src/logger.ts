/**
 * ANSI-colored terminal logger for turntable-mcp.
 *
 * Everything goes to stderr; stdout carries MCP traffic.
 */

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  magenta: "\x1b[35m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  blue: "\x1b[34m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
} as const;

/** Log level type (matches config.json `logLevel`). */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_TAG: Record<LogLevel, string> = {
  debug: `${ANSI.dim}${ANSI.blue}[DEBUG]${ANSI.reset}`,
  info: `${ANSI.cyan}[INFO ]${ANSI.reset}`,
  warn: `${ANSI.yellow}[WARN ]${ANSI.reset}`,
  error: `${ANSI.red}[ERROR]${ANSI.reset}`,
};

function renderBanner(): string {
  return [
    `${ANSI.magenta}${ANSI.bold}`,
    "     ___________",
    "    (___________)   turntable-mcp",
    "     |    o    |",
    "   __|_________|__",
    `${ANSI.reset}`,
  ].join("\n");
}

/** Strip ANSI escape codes to measure display width. */
export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Render lines inside a double-line box with the title centered on the top
 * border. The box is as wide as the longest visible line plus one space of
 * padding on each side.
 */
export function renderBox(title: string, content: string[], color: string = ANSI.cyan): string {
  const titleText = ` ${title} `;
  const widest = Math.max(0, ...content.map((line) => stripAnsi(line).length));
  const innerWidth = Math.max(widest + 2, titleText.length);
  const leftPad = Math.floor((innerWidth - titleText.length) / 2);
  const rightPad = innerWidth - titleText.length - leftPad;

  const top = `${color}╔${"═".repeat(leftPad)}${ANSI.bold}${titleText}${ANSI.reset}${color}${"═".repeat(rightPad)}╗${ANSI.reset}`;
  const body = content.map((line) => {
    const padding = " ".repeat(Math.max(0, innerWidth - stripAnsi(line).length - 2));
    return `${color}║${ANSI.reset} ${line}${padding} ${color}║${ANSI.reset}`;
  });
  const bottom = `${color}╚${"═".repeat(innerWidth)}╝${ANSI.reset}`;

  return [top, ...body, bottom].join("\n");
}

function formatTimestamp(now: Date = new Date()): string {
  const hms = [now.getHours(), now.getMinutes(), now.getSeconds()]
    .map((n) => String(n).padStart(2, "0"))
    .join(":");
  const ms = String(now.getMilliseconds()).padStart(3, "0");
  return `${ANSI.dim}${ANSI.gray}${hms}.${ms}${ANSI.reset}`;
}

/**
 * Logger instance with configurable minimum level.
 */
export class Logger {
  private readonly minLevel: LogLevel;

  constructor(minLevel: LogLevel = "info") {
    this.minLevel = minLevel;
  }

  /**
   * Print the startup banner with the effective configuration.
   */
  printBanner(info: { transport: string; otadCommand: string; remote: string }): void {
    const configLines = [
      `${ANSI.cyan}transport${ANSI.reset}  ${ANSI.white}${info.transport}${ANSI.reset}`,
      `${ANSI.cyan}vendor${ANSI.reset}     ${ANSI.white}${info.otadCommand}${ANSI.reset}`,
      `${ANSI.cyan}host${ANSI.reset}       ${ANSI.dim}${info.remote}${ANSI.reset}`,
    ];
    const output = [
      "",
      renderBanner(),
      "",
      renderBox("CONFIGURATION", configLines, ANSI.magenta),
      "",
      `  ${ANSI.green}${ANSI.bold}◆${ANSI.reset} ${ANSI.green}Server ready${ANSI.reset} ${ANSI.dim}(listening on stdio)${ANSI.reset}`,
      "",
    ];
    process.stderr.write(output.join("\n"));
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const parts = [formatTimestamp(), LEVEL_TAG[level], message];
    if (meta && Object.keys(meta).length > 0) {
      parts.push(`${ANSI.dim}${JSON.stringify(meta)}${ANSI.reset}`);
    }

    process.stderr.write(parts.join(" ") + "\n");
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }
}
