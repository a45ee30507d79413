export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

interface LogPayload {
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function normalizeLogLevel(value: string | undefined): LogLevel {
  if (!value) {
    return "info";
  }

  const normalized = value.toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }

  return "info";
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
  }

  // JSON.stringify throws on bigint, and wei amounts are bigint everywhere
  if (typeof value === "bigint") {
    return value.toString();
  }

  return value;
}

function serializeContext(context: LogContext | undefined): LogContext | undefined {
  if (!context) {
    return undefined;
  }

  const serialized: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    serialized[key] = serializeValue(value);
  }

  return serialized;
}

const processSink: LogSink = (level, line) => {
  if (level === "error") {
    process.stderr.write(`${line}\n`);
    return;
  }

  process.stdout.write(`${line}\n`);
};

function writeLog(sink: LogSink, level: LogLevel, scope: string, payload: LogPayload): void {
  const threshold = normalizeLogLevel(process.env.LOG_LEVEL);
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[threshold]) {
    return;
  }

  const context = serializeContext(payload.context);
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    scope,
    message: payload.message,
    ...(context && Object.keys(context).length > 0 ? { context } : {})
  });

  sink(level, line);
}

/**
 * Creates a JSON-lines logger. `bindings` are merged into the context of every
 * line, so a worker logger can carry its board id without repeating it.
 */
export function createLogger(scope: string, bindings: LogContext = {}, sink: LogSink = processSink): Logger {
  const log = (level: LogLevel, message: string, context?: LogContext) => {
    writeLog(sink, level, scope, { message, context: { ...bindings, ...context } });
  };

  return {
    debug(message, context) {
      log("debug", message, context);
    },
    info(message, context) {
      log("info", message, context);
    },
    warn(message, context) {
      log("warn", message, context);
    },
    error(message, context) {
      log("error", message, context);
    },
    child(extra) {
      return createLogger(scope, { ...bindings, ...extra }, sink);
    }
  };
}

/**
 * Logger that keeps parsed lines in memory instead of writing them. Tests use
 * it to assert on the events a component emitted.
 */
export function createMemoryLogger(scope: string): { logger: Logger; lines: Array<{ level: LogLevel; message: string; context?: LogContext }> } {
  const lines: Array<{ level: LogLevel; message: string; context?: LogContext }> = [];
  const sink: LogSink = (_level, line) => {
    const parsed: { level: LogLevel; message: string; context?: LogContext } = JSON.parse(line);
    lines.push({ level: parsed.level, message: parsed.message, context: parsed.context });
  };

  return { logger: createLogger(scope, {}, sink), lines };
}
