/**
 * Logger
 *
 * Tagged console logging for the sync core.
 * The level lives on each logger instance, never in module state.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Minimal console shape the logger writes to.
 */
export interface LogSink {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;

  /**
   * Same level and sink, different tag.
   */
  withTag(tag: string): Logger;
}

export interface LoggerOptions {
  tag?: string;
  level?: LogLevel;
  sink?: LogSink;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

/**
 * Resolve the default level from `ENTITLEMENT_SYNC_LOG_LEVEL`.
 */
export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.ENTITLEMENT_SYNC_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly tag: string,
    readonly level: LogLevel,
    private readonly sink: LogSink
  ) {}

  debug(message: string, ...details: unknown[]): void {
    this.write('debug', message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.write('info', message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.write('warn', message, details);
  }

  error(message: string, ...details: unknown[]): void {
    this.write('error', message, details);
  }

  withTag(tag: string): Logger {
    return new ConsoleLogger(tag, this.level, this.sink);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    try {
      this.sink[level](`[${this.tag}] ${message}`, ...details);
    } catch {
      // sink failures are ignored
    }
  }
}

/**
 * Create a logger writing `[Tag] message` lines.
 *
 * @example
 * const logger = createLogger({ tag: 'EntitlementSync', level: 'debug' });
 * logger.info('configured'); // [EntitlementSync] configured
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(
    options.tag ?? 'EntitlementSync',
    options.level ?? logLevelFromEnv(),
    options.sink ?? console
  );
}

/**
 * Logger that drops everything. Handy in tests.
 */
export const silentLogger: Logger = createLogger({ level: 'silent' });
