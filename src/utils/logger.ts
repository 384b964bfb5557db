export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogContext = Record<string, unknown>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let threshold: LogLevel = 'info';

/** Sets the minimum level written; the bootstrap passes `Env.LOG_LEVEL`. */
export const configureLogger = (level: LogLevel): void => {
  threshold = level;
};

export const formatLogLine = (level: LogLevel, message: string, context?: LogContext): string =>
  JSON.stringify({
    level,
    message,
    ...(context ? { context } : {}),
    timestamp: new Date().toISOString()
  });

const write = (level: LogLevel, message: string, context?: LogContext) => {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[threshold]) {
    return;
  }
  const line = formatLogLine(level, message, context);
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export const logger = {
  debug: (message: string, context?: LogContext) => write('debug', message, context),
  info: (message: string, context?: LogContext) => write('info', message, context),
  warn: (message: string, context?: LogContext) => write('warn', message, context),
  error: (message: string, context?: LogContext) => write('error', message, context)
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
