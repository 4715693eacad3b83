export type LogLevel = "quiet" | "info" | "verbose";

export type Logger = {
  info(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  child(scope: string): Logger;
};

const RANK: Record<LogLevel, number> = { quiet: 0, info: 1, verbose: 2 };

export function parseLogLevel(raw: string | undefined, nodeEnv?: string): LogLevel {
  const v = String(raw || "").trim().toLowerCase();
  if (v === "quiet" || v === "info" || v === "verbose") return v;
  if (v === "debug") return "verbose";
  return nodeEnv === "development" ? "verbose" : "quiet";
}

function format(scope: string, message: string, fields?: Record<string, unknown>): string {
  const suffix = fields && Object.keys(fields).length ? ` ${JSON.stringify(fields)}` : "";
  return `[${scope}] ${message}${suffix}`;
}

// Warnings and errors are never gated: they carry replica failures operators must see.
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  return {
    info(message, fields) {
      if (RANK[level] >= RANK.info) console.log(format(scope, message, fields));
    },
    debug(message, fields) {
      if (RANK[level] >= RANK.verbose) console.log(format(scope, message, fields));
    },
    warn(message, fields) {
      console.warn(format(scope, message, fields));
    },
    error(message, fields) {
      console.error(format(scope, message, fields));
    },
    child(child) {
      return createLogger(`${scope}:${child}`, level);
    }
  };
}

export const silentLogger: Logger = {
  info() {},
  debug() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  }
};
