/**
 * Level-filtered console logging.
 *
 * Every component takes a Logger so the host can silence or redirect
 * output. Tags prefix each line: "[viewbind:CounterPresenter#3] ...".
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/** Where log lines go. `console` satisfies this. */
export interface LogSink {
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

export interface Logger {
  readonly level: LogLevel;
  readonly tag: string;
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  /** Logger with the same level and sink and a nested tag. */
  child(tag: string): Logger;
}

class ConsoleLogger implements Logger {
  constructor(
    readonly level: LogLevel,
    readonly tag: string,
    private readonly sink: LogSink,
  ) {}

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) this.sink.error(this.format(message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) this.sink.warn(this.format(message), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) this.sink.info(this.format(message), ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) this.sink.debug(this.format(message), ...args);
  }

  child(tag: string): Logger {
    return new ConsoleLogger(this.level, `${this.tag}:${tag}`, this.sink);
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[this.level] >= LEVEL_RANK[level];
  }

  private format(message: string): string {
    return `[${this.tag}] ${message}`;
  }
}

export function createLogger(
  level: LogLevel = 'info',
  tag = 'viewbind',
  sink: LogSink = console,
): Logger {
  return new ConsoleLogger(level, tag, sink);
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger('silent');
