/**
 * Console logger.
 *
 * Writes one formatted line per entry to a log function (default:
 * console.error, so stdout stays free for command output). Levels below the
 * configured threshold are dropped.
 */

import pc from "picocolors";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** Custom log function (default: console.error) */
  log?: (message: string) => void;
  /** Prefix for all messages */
  prefix?: string;
  /** Force colors on/off (default: stderr is a TTY and NO_COLOR is unset) */
  color?: boolean;
}

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  isDebug: () => boolean;
  /** Create a child logger with prefix */
  child: (prefix: string) => Logger;
}

/** Format timestamp as HH:MM:SS.mmm */
function formatTimestamp(): string {
  const now = new Date();
  return now.toTimeString().slice(0, 8) + "." + now.getMilliseconds().toString().padStart(3, "0");
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const {
    level = "info",
    log = (line: string) => console.error(line),
    prefix = "",
    color = !!process.stderr.isTTY && !process.env.NO_COLOR,
  } = config;
  const colors = pc.createColors(color);
  const threshold = LOG_LEVELS.indexOf(level);

  const levelColors: Record<LogLevel, (text: string) => string> = {
    debug: colors.gray,
    info: colors.cyan,
    warn: colors.yellow,
    error: colors.red,
  };

  const write = (entryLevel: LogLevel, message: string, args: unknown[]) => {
    if (LOG_LEVELS.indexOf(entryLevel) < threshold) return;
    const levelStr = levelColors[entryLevel](entryLevel.toUpperCase().padEnd(5));
    const prefixStr = prefix ? `[${prefix}] ` : "";
    const argsStr = args.length > 0 ? " " + args.map(formatArg).join(" ") : "";
    log(`${colors.dim(formatTimestamp())} ${levelStr} ${prefixStr}${message}${argsStr}`);
  };

  return {
    debug: (message, ...args) => write("debug", message, args),
    info: (message, ...args) => write("info", message, args),
    warn: (message, ...args) => write("warn", message, args),
    error: (message, ...args) => write("error", message, args),
    isDebug: () => threshold === 0,
    child: (childPrefix: string) => {
      const newPrefix = prefix ? `${prefix}:${childPrefix}` : childPrefix;
      return createLogger({ level, log, prefix: newPrefix, color });
    },
  };
}

export function createSilentLogger(): Logger {
  const noop = () => {};
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    isDebug: () => false,
    child: () => createSilentLogger(),
  };
}

function formatArg(arg: unknown): string {
  if (arg === null || arg === undefined) return String(arg);
  if (arg instanceof Error) return arg.message;
  if (typeof arg === "object") {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}
