// Everything goes to stderr: stdout belongs to the stdio transport.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = (process.env.LOG_LEVEL && parseLogLevel(process.env.LOG_LEVEL)) || "info";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Accepts both our names and the DEBUG/INFO/WARNING/ERROR/CRITICAL spelling. */
export function parseLogLevel(value: string): LogLevel | undefined {
  switch (value.trim().toLowerCase()) {
    case "debug": return "debug";
    case "info": return "info";
    case "warn":
    case "warning": return "warn";
    case "error":
    case "critical": return "error";
    default: return undefined;
  }
}

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    console.error(`${new Date().toISOString()} - ${scope} - ${level.toUpperCase()} - ${message}`);
  };
  return {
    debug: (m) => write("debug", m),
    info: (m) => write("info", m),
    warn: (m) => write("warn", m),
    error: (m) => write("error", m),
  };
}
