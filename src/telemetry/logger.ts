export type LogContext = Record<string, unknown>;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LoggerFn = (message: string, context?: LogContext) => void;

export interface Logger {
  debug: LoggerFn;
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  // stdout belongs to the host program; every level goes to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);

export interface ConsoleLoggerOptions {
  /** Minimum level written. Default: warn */
  level?: LogLevel;
  /** Prepended to every message as `[prefix]`. */
  prefix?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'warn');
  const format = (message: string): string => (options.prefix ? `[${options.prefix}] ${message}` : message);
  const at = (level: LogLevel): LoggerFn => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return () => undefined;
    }
    return (message, context) => emit(level, format(message), context);
  };
  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** Shared fallback for primitives constructed without a logger. */
export const defaultLogger: Logger = createConsoleLogger({ level: 'warn', prefix: 'loomwork' });
