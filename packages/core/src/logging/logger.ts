/**
 * @fileoverview Centralized logging infrastructure
 *
 * Uses pino for structured logging with:
 * - Configurable log levels, changeable at run time
 * - JSON output to a log file when a destination is set
 * - Pretty printing to stderr for interactive sessions
 * - Component child loggers
 *
 * The shell owns stdout, so logs never go there.
 */

import pino from 'pino';

// =============================================================================
// Types
// =============================================================================

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
  /** Log file path; when set, logs are written there as JSON lines */
  destination?: string;
}

export interface LogContext {
  component?: string;
  command?: string;
  [key: string]: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLevel(options: LoggerOptions): LogLevel {
  if (options.level) {
    return options.level;
  }
  const fromEnv = process.env.LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  const level = resolveLevel(options);

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'necroshell',
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (options.destination) {
    return pino(pinoOptions, pino.destination({ dest: options.destination, mkdir: true, sync: true }));
  }

  const pretty = options.pretty ?? process.env.NODE_ENV !== 'production';
  if (pretty && level !== 'silent') {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination({ dest: 2, sync: true }));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class ShellLogger {
  private pino: pino.Logger;

  constructor(options: LoggerOptions | pino.Logger = {}) {
    this.pino = 'child' in options ? options : createPinoLogger(options);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): ShellLogger {
    return new ShellLogger(this.pino.child(context));
  }

  get level(): LogLevel {
    const level = this.pino.level;
    return isLogLevel(level) ? level : 'info';
  }

  /**
   * Change the level; only children created afterwards inherit it
   */
  setLevel(level: LogLevel): void {
    this.pino.level = level;
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  /**
   * Log at error level
   */
  error(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else {
      this.pino.error(error ?? {}, msg);
    }
  }

  fatal(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.fatal({ err: error }, msg);
    } else {
      this.pino.fatal(error ?? {}, msg);
    }
  }

  /**
   * Start a timer for performance tracking
   */
  startTimer(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { durationMs: duration.toFixed(2) });
    };
  }
}

// =============================================================================
// Default Logger
// =============================================================================

let defaultLogger: ShellLogger | null = null;
const componentLoggers = new Map<string, ShellLogger>();

/**
 * Get the default logger instance
 */
export function getLogger(options?: LoggerOptions): ShellLogger {
  if (!defaultLogger) {
    defaultLogger = new ShellLogger(options);
  }
  return defaultLogger;
}

/**
 * Replace the default logger, e.g. after settings are loaded.
 * Component loggers handed out earlier are re-bound on next use.
 */
export function configureLogger(options: LoggerOptions): ShellLogger {
  defaultLogger = new ShellLogger(options);
  componentLoggers.clear();
  return defaultLogger;
}

/**
 * Set the level of the default logger and every component logger
 */
export function setLogLevel(level: LogLevel): void {
  getLogger().setLevel(level);
  for (const logger of componentLoggers.values()) {
    logger.setLevel(level);
  }
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string): ComponentLogger {
  return new ComponentLogger(component);
}

/**
 * Resolves its child logger lazily, so a module-level logger follows
 * configureLogger() calls made after the module was loaded
 */
export class ComponentLogger {
  constructor(private readonly component: string) {}

  private resolve(): ShellLogger {
    let logger = componentLoggers.get(this.component);
    if (!logger) {
      logger = getLogger().child({ component: this.component });
      componentLoggers.set(this.component, logger);
    }
    return logger;
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.resolve().trace(msg, data);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.resolve().debug(msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.resolve().info(msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.resolve().warn(msg, data);
  }

  error(msg: string, error?: Error | Record<string, unknown>): void {
    this.resolve().error(msg, error);
  }

  startTimer(label: string): () => void {
    return this.resolve().startTimer(label);
  }
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
  componentLoggers.clear();
}
