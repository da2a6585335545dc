import pino, { type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface LoggerConfig {
  environment: string;
  level?: string;
}

export function createLogger(config: LoggerConfig): AppLogger {
  if (config.environment === 'test') {
    return pino({ level: 'silent' });
  }

  const isProduction = config.environment === 'production';

  const baseOptions: LoggerOptions = {
    level: config.level ?? (isProduction ? 'info' : 'debug'),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isProduction) {
    // Production: JSON output for log aggregation
    return pino({
      ...baseOptions,
      base: {
        service: 'tollgate-engine',
        env: config.environment,
      },
    });
  }

  // Development: pretty print
  return pino({
    ...baseOptions,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  });
}

// Singleton logger instance (initialized later)
let logger: AppLogger | null = null;

export function getLogger(): AppLogger {
  if (!logger) {
    // Fallback logger if not initialized
    logger = createLogger({ environment: process.env.NODE_ENV ?? 'development', level: process.env.LOG_LEVEL });
  }
  return logger;
}

export function initLogger(config: LoggerConfig): AppLogger {
  logger = createLogger(config);
  return logger;
}

/** Renders bigints as decimal strings so log lines stay plain JSON. */
export function toLogFields(value: Record<string, unknown>): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'bigint') {
      fields[key] = entry.toString();
    } else if (typeof entry === 'object' && entry !== null && !Array.isArray(entry)) {
      fields[key] = toLogFields({ ...entry });
    } else {
      fields[key] = entry;
    }
  }
  return fields;
}

export function logError(log: AppLogger, error: unknown, context?: Record<string, unknown>): void {
  const err = error instanceof Error ? error : new Error(String(error));
  log.error(
    {
      event: 'error',
      error: {
        name: err.name,
        message: err.message,
        code: 'code' in err ? err.code : undefined,
        stack: err.stack,
      },
      ...context,
    },
    err.message,
  );
}
