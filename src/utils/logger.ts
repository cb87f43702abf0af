import { Writable } from 'node:stream';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  level: LogLevel;
  sink: Console;
}

export class Logger {
  private level: LogLevel;
  private sink: Console;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.sink = options.sink;
  }

  configure(options: Partial<LoggerOptions>): void {
    this.level = options.level ?? this.level;
    this.sink = options.sink ?? this.sink;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled('debug')) this.sink.debug(this.format('debug', message), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled('info')) this.sink.info(this.format('info', message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled('warn')) this.sink.warn(this.format('warn', message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isEnabled('error')) this.sink.error(this.format('error', message), ...args);
  }

  private format(level: LogLevel, message: string): string {
    return `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
  }
}

export function createNullConsole(): Console {
  const discard = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
  return new console.Console({ stdout: discard, stderr: discard });
}

export const logger = new Logger({ level: 'info', sink: console });
