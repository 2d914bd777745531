/**
 * Log levels, most severe first
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export type LogSink = Pick<Console, 'error' | 'warn' | 'log' | 'debug'>;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Console-backed logger that drops messages below the configured level
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(level: LogLevel = 'info', private readonly sink: LogSink = console) {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) this.sink.error(message, ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) this.sink.warn(message, ...details);
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) this.sink.log(message, ...details);
  }

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) this.sink.debug(message, ...details);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= this.threshold;
  }
}

const noop = (): void => {};

// Default for the simulation core: libraries stay quiet unless handed a logger
export const SILENT_LOGGER: Logger = {
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
};
