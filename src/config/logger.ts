export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const MAX_META_STRING = 500;
const SENSITIVE_KEY = /token|secret|api_?key|authorization|password/i;

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

interface CreateLoggerOptions {
  minLevel?: LogLevel;
  /** Receives one JSON line per entry, newline included. Defaults to stdout. */
  write?: (line: string) => void;
}

/** Correlation fields shared by ranking and standardization logs. */
export interface LoggerContext {
  route?: string;
  action?: string;
  job_title?: string;
  candidate_index?: number;
  candidate_name?: string;
  prompt_name?: string;
  model_name?: string;
  latency_ms?: number;
  ok?: boolean;
  error_code?: string;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const threshold = LEVEL_WEIGHT[options?.minLevel ?? "info"];
  const write = options?.write ?? ((line: string) => process.stdout.write(line));

  const at =
    (level: LogLevel) =>
    (message: string, meta?: Record<string, unknown>): void => {
      if (LEVEL_WEIGHT[level] < threshold) {
        return;
      }
      write(`${formatEntry(level, message, meta)}\n`);
    };

  return {
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields?: Record<string, unknown>,
): void {
  logger[level](message, { ...context, ...fields });
}

export function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(meta).map(([key, value]) => [key, SENSITIVE_KEY.test(key) ? "[REDACTED]" : compactValue(value)]),
  );
}

function compactValue(value: unknown): unknown {
  if (typeof value === "string" && value.length > MAX_META_STRING) {
    return `${value.slice(0, MAX_META_STRING)}...`;
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function formatEntry(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  const entry: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };
  if (meta && Object.keys(meta).length > 0) {
    entry.meta = redactMeta(meta);
  }
  try {
    return JSON.stringify(entry);
  } catch {
    return JSON.stringify({ timestamp: entry.timestamp, level, message, meta: "[unserializable]" });
  }
}
