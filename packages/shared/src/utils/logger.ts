import { randomUUID } from 'node:crypto';
import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

/**
 * Log context that can be attached to log entries for correlation and filtering.
 * These fields flow through a sync run so every line can be traced to its stream.
 */
export interface LogContext {
  /** Unique identifier for the whole sync run */
  runId?: string;
  /** Stream being extracted (e.g., 'jobs', 'allocations') */
  stream?: string;
  /** Service/component name */
  service?: string;
  /** Component within a service */
  component?: string;
  /** HTTP method for API requests */
  method?: string;
  /** HTTP path for API requests */
  path?: string;
  /** Allow additional string keys for flexibility */
  [key: string]: string | undefined;
}

/**
 * Extended logger interface with context support
 */
export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;
  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context.
   * The context is merged with parent context and included in all log entries.
   */
  child(context: LogContext): Logger;

  /**
   * Get the current context attached to this logger
   */
  getContext(): LogContext;
}

/**
 * Wrapper around pino that provides context-aware logging
 */
class ContextLogger implements Logger {
  private pino: PinoLogger;
  private context: LogContext;

  constructor(pinoInstance: PinoLogger, context: LogContext = {}) {
    this.pino = pinoInstance;
    this.context = context;
  }

  private formatData(data?: Record<string, unknown>): Record<string, unknown> {
    return { ...this.context, ...data };
  }

  private formatError(error?: Error | unknown): Record<string, unknown> {
    if (!error) return {};
    if (error instanceof Error) {
      // First 5 frames are enough to locate a failure; full stacks drown the run log
      const stackLines = error.stack?.split('\n') ?? [];
      const truncatedStack = stackLines.slice(0, 6).join('\n');

      return {
        err: {
          type: error.name,
          message: error.message,
          stack: truncatedStack,
        },
      };
    }
    return { err: String(error) };
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(this.formatData(data), msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(this.formatData(data), msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(this.formatData(data), msg);
  }

  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.error({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.fatal({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  child(context: LogContext): Logger {
    const mergedContext = { ...this.context, ...context };
    const childPino = this.pino.child(context);
    return new ContextLogger(childPino, mergedContext);
  }

  getContext(): LogContext {
    return { ...this.context };
  }
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Configuration options for creating a logger
 */
export interface CreateLoggerOptions {
  /** Service name to include in all log entries */
  service: string;
  /** Log level (default: LOG_LEVEL env, then 'info') */
  level?: LogLevel;
  /** Force pretty printing regardless of environment */
  pretty?: boolean;
  /** Additional context to include in all log entries */
  context?: LogContext;
}

/** stdout carries the message stream, so every log line goes to stderr */
const STDERR_FD = 2;

function shouldUsePretty(forceFlag?: boolean): boolean {
  if (forceFlag !== undefined) return forceFlag;
  const nodeEnv = process.env.NODE_ENV;
  return nodeEnv === 'development' || nodeEnv === 'test' || !nodeEnv;
}

function getLogLevel(configLevel?: string): string {
  return configLevel ?? process.env.LOG_LEVEL ?? 'info';
}

/**
 * Create a new logger instance with the specified configuration.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'tap' });
 * logger.info('Starting sync');
 *
 * const streamLogger = logger.child({ runId: '123', stream: 'jobs' });
 * streamLogger.info('Page committed'); // includes runId and stream
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const usePretty = shouldUsePretty(options.pretty);
  const level = getLogLevel(options.level);

  const pinoOptions: LoggerOptions = {
    level,
    base: {
      service: options.service,
      pid: process.pid,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      // Raw API payloads can be huge; keep log lines bounded
      payload: (value: unknown) => {
        const str = JSON.stringify(value);
        return str.length > 1024 ? str.slice(0, 1024) + '...[truncated]' : str;
      },
      bookmark: (value: unknown) => JSON.stringify(value),
    },
  };

  if (usePretty) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{service} | {msg}',
        destination: STDERR_FD,
      },
    };
    return new ContextLogger(pino(pinoOptions), options.context ?? {});
  }

  const pinoInstance = pino(pinoOptions, pino.destination(STDERR_FD));
  return new ContextLogger(pinoInstance, options.context ?? {});
}

/**
 * Generate a unique run ID for log correlation.
 */
export function generateRunId(): string {
  return randomUUID();
}

/**
 * No-op logger for testing or when logging should be disabled
 */
export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => nullLogger,
  getContext: () => ({}),
};

/**
 * Cap error messages so a single upstream error body cannot flood the run summary.
 */
export function capErrorMessage(message: string, maxLength = 1000): string {
  if (message.length <= maxLength) return message;
  return message.substring(0, maxLength) + '... (truncated)';
}
