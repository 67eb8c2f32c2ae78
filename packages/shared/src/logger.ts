/**
 * Console logger with level filtering and a tag per call.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

export function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message;
  }
  if (typeof arg === 'object' && arg !== null) {
    return JSON.stringify(arg);
  }
  return String(arg);
}

class Logger {
  private level: LogLevel;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const envLevel = env.LOG_LEVEL?.toLowerCase();
    this.level = isLogLevel(envLevel) ? envLevel : 'info';
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(tag: string, args: unknown[]): string[] {
    const timestamp = new Date().toISOString().slice(11, 19);
    return [`[${timestamp}] ${tag}`, ...args.map(formatArg)];
  }

  debug(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.debug(...this.formatMessage(tag, args));
    }
  }

  info(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(...this.formatMessage(tag, args));
    }
  }

  warn(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(...this.formatMessage(tag, args));
    }
  }

  error(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(...this.formatMessage(tag, args));
    }
  }
}

export const logger = new Logger();

export { Logger };
