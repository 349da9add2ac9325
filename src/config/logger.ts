export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const MAX_STRING_CHARS = 500;
const SECRET_KEY_PARTS = ["secret", "apikey", "authorization", "servicerole", "password"];
const CONTACT_KEY_PARTS = ["email", "phone"];

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface CreateLoggerOptions {
  minLevel?: LogLevel;
  scope?: string;
  write?: (line: string) => void;
  now?: () => Date;
}

/**
 * Structured JSON-lines logger. Secrets are replaced outright; candidate
 * contact fields are masked so screening logs carry no raw PII.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const minRank = LEVEL_RANK[options.minLevel ?? "debug"];
  const write = options.write ?? ((line: string) => process.stdout.write(line));
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (LEVEL_RANK[level] < minRank) {
      return;
    }
    const entry: LogMeta = {
      timestamp: now().toISOString(),
      level,
      message,
    };
    if (options.scope) {
      entry.scope = options.scope;
    }
    if (meta && Object.keys(meta).length > 0) {
      entry.meta = redactMeta(meta);
    }
    write(`${safeJson(entry)}\n`);
  };

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}

/** Prefixes every entry's meta with fixed fields, e.g. `{ component: "auditor" }`. */
export function withLogContext(logger: Logger, context: LogMeta): Logger {
  const merge = (meta?: LogMeta): LogMeta => ({ ...context, ...meta });
  return {
    debug: (message, meta) => logger.debug(message, merge(meta)),
    info: (message, meta) => logger.info(message, merge(meta)),
    warn: (message, meta) => logger.warn(message, merge(meta)),
    error: (message, meta) => logger.error(message, merge(meta)),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

export function redactMeta(meta: LogMeta): LogMeta {
  const output: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase().replace(/[_-]/g, "");
    if (lowerKey.endsWith("token") || SECRET_KEY_PARTS.some((part) => lowerKey.includes(part))) {
      output[key] = "[REDACTED]";
    } else if (CONTACT_KEY_PARTS.some((part) => lowerKey.includes(part))) {
      output[key] = typeof value === "string" && value.length > 0 ? maskContact(value) : value;
    } else if (typeof value === "string" && value.length > MAX_STRING_CHARS) {
      output[key] = `${value.slice(0, MAX_STRING_CHARS)}...`;
    } else {
      output[key] = value;
    }
  }
  return output;
}

/** `avery@example.test` is logged as `a***st`. */
export function maskContact(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 3) {
    return "***";
  }
  return `${trimmed[0]}***${trimmed.slice(-2)}`;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return '"[unserializable]"';
  }
}
