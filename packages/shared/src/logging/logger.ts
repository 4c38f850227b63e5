/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Destination for formatted log lines. Defaults to the console method
 * matching the level.
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Logger options
 */
export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  context?: Record<string, unknown>;
  sink?: LogSink;
  /**
   * Applied to the merged context just before formatting
   */
  transformContext?: (context: Record<string, unknown>) => Record<string, unknown>;
  /**
   * Applied to the message just before formatting
   */
  transformMessage?: (message: string) => string;
  /**
   * Timestamp source, for deterministic output in tests
   */
  now?: () => Date;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      return;
    case 'info':
      console.info(line);
      return;
    case 'warn':
      console.warn(line);
      return;
    case 'error':
      console.error(line);
      return;
  }
};

/**
 * Create a line-oriented logger.
 *
 * Output format: `[timestamp] [LEVEL] [prefix] message {"context":"json"}`
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const prefix = options.prefix ?? 'cfdi-bundle';
  const baseContext = options.context ?? {};
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());

  const shouldLog = (level: LogLevel): boolean => LOG_LEVELS[level] >= minLevel;

  const formatMessage = (level: LogLevel, message: string, context?: Record<string, unknown>): string => {
    const timestamp = now().toISOString();
    const merged = { ...baseContext, ...context };
    const finalContext = options.transformContext ? options.transformContext(merged) : merged;
    const finalMessage = options.transformMessage ? options.transformMessage(message) : message;
    const contextStr = Object.keys(finalContext).length > 0
      ? ` ${JSON.stringify(finalContext)}`
      : '';

    return `[${timestamp}] [${level.toUpperCase()}] [${prefix}] ${finalMessage}${contextStr}`;
  };

  const emit = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (shouldLog(level)) {
      sink(level, formatMessage(level, message, context));
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),

    child(context: Record<string, unknown>): Logger {
      return createLogger({ ...options, context: { ...baseContext, ...context } });
    },
  };
}

/**
 * Logger that drops everything. Default for library code when no logger is injected.
 */
export const silentLogger: Logger = createLogger({ sink: () => undefined });
