import pino, { type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type LoggerBindings = Record<string, unknown>;

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
};

type CreateLoggerOptions = {
  level?: string;
  bindings?: LoggerBindings;
};

function resolveLevel(): string {
  const envLevel = process.env.LOG_LEVEL?.trim();
  return envLevel && envLevel.length > 0 ? envLevel : "info";
}

function resolveServiceName(): string {
  const envName = process.env.SERVICE_NAME?.trim();
  return envName && envName.length > 0 ? envName : "tunnelconf";
}

function buildLoggerOptions(): LoggerOptions {
  return {
    level: resolveLevel(),
    base: { service: resolveServiceName() },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
}

export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const loggerOptions = buildLoggerOptions();
  if (options.level) {
    loggerOptions.level = options.level;
  }
  const logger = pino(loggerOptions);
  if (options.bindings && Object.keys(options.bindings).length > 0) {
    return logger.child(options.bindings);
  }
  return logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "tunnelconf" } });

function extractCode(error: object): string | number | undefined {
  if ("code" in error) {
    const candidate = error.code;
    if (typeof candidate === "string" || typeof candidate === "number") {
      return candidate;
    }
  }
  return undefined;
}

export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    const normalized: NormalizedError = {
      message: error.message,
      name: error.name,
    };
    if (error.stack) {
      normalized.stack = error.stack;
    }
    const code = extractCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
    if (error.cause !== undefined) {
      normalized.cause = error.cause instanceof Error ? normalizeError(error.cause) : error.cause;
    }
    return normalized;
  }

  if (typeof error === "string") {
    return { message: error };
  }

  return { message: safeStringify(error) ?? String(error) };
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}
