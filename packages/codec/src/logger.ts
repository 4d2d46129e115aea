export type LogLevel = "debug" | "info" | "warn" | "error";

/** Leveled sink for codec and registry diagnostics. `meta` carries structured fields. */
export interface CodecLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const NOOP_LOGGER: CodecLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export interface ConsoleLoggerOptions {
  /** Tag printed in brackets before every message (default: "scale-kit"). */
  prefix?: string;
  /** Least severe level that is printed (default: "info"). */
  level?: LogLevel;
  /** Where lines go (default: the global console). */
  sink?: Pick<Console, LogLevel>;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): CodecLogger {
  const { prefix = "scale-kit", level: minLevel = "info", sink = console } = options;
  const emit = (level: LogLevel) => (message: string, meta?: Record<string, unknown>) => {
    if (!shouldLog(level, minLevel)) return;
    if (meta === undefined) {
      sink[level](`[${prefix}] ${message}`);
    } else {
      sink[level](`[${prefix}] ${message}`, meta);
    }
  };
  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
