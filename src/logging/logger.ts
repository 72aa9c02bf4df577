/**
 * Subsystem-prefixed console logging.
 *
 * Every line reads `[Subsystem] message key=value ...` and goes through the
 * matching console method, so stdout/stderr capture stays the only sink.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type Logger = {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function renderValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === "string") return /\s/.test(value) ? JSON.stringify(value) : value;
  if (value === undefined) return "undefined";
  return JSON.stringify(value) ?? String(value);
}

export function formatLine(subsystem: string, message: string, fields?: LogFields): string {
  const rendered = fields
    ? Object.entries(fields)
        .map(([k, v]) => `${k}=${renderValue(v)}`)
        .join(" ")
    : "";
  return rendered ? `[${subsystem}] ${message} ${rendered}` : `[${subsystem}] ${message}`;
}

export function createLogger(subsystem: string): Logger {
  const emit = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const line = formatLine(subsystem, message, fields);
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.error(line);
    }
  };

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
  };
}
