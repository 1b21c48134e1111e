import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? "info";

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const lower = value.toLowerCase();
  return lower === "debug" || lower === "info" || lower === "warn" || lower === "error"
    ? lower
    : undefined;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatTimestamp(): string {
  const now = new Date();
  return chalk.gray(
    `[${now.toLocaleTimeString("en-US", { hour12: false })}]`
  );
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function write(level: LogLevel, tag: string, scope: string | undefined, message: string, args: unknown[]): void {
  if (!shouldLog(level)) return;
  const prefix = scope ? [formatTimestamp(), tag, chalk.cyan(`[${scope}]`)] : [formatTimestamp(), tag];
  if (level === "error") {
    console.error(...prefix, message, ...args);
  } else {
    console.log(...prefix, message, ...args);
  }
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    write("debug", chalk.magenta("[DEBUG]"), undefined, message, args);
  },

  info(message: string, ...args: unknown[]): void {
    write("info", chalk.blue("[INFO]"), undefined, message, args);
  },

  warn(message: string, ...args: unknown[]): void {
    write("warn", chalk.yellow("[WARN]"), undefined, message, args);
  },

  error(message: string, ...args: unknown[]): void {
    write("error", chalk.red("[ERROR]"), undefined, message, args);
  },

  success(message: string, ...args: unknown[]): void {
    console.log(formatTimestamp(), chalk.green("[OK]"), message, ...args);
  },

  // Plain output without formatting (for CLI output)
  print(message: string): void {
    console.log(message);
  },

  /**
   * Logger that tags every line with a component name
   */
  scoped(scope: string): Logger {
    return {
      debug: (message, ...args) => write("debug", chalk.magenta("[DEBUG]"), scope, message, args),
      info: (message, ...args) => write("info", chalk.blue("[INFO]"), scope, message, args),
      warn: (message, ...args) => write("warn", chalk.yellow("[WARN]"), scope, message, args),
      error: (message, ...args) => write("error", chalk.red("[ERROR]"), scope, message, args),
    };
  },
};
