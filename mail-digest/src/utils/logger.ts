/**
 * Simple logger utility
 * Provides formatted console logging with timestamps
 */

const LOG_LEVELS = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
  SILENT: 100
} as const;

type LogLevel = keyof typeof LOG_LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export class Logger {
  private level: LogLevel;

  constructor(level: string = process.env.LOG_LEVEL || 'INFO') {
    const configured = level.toUpperCase();
    this.level = isLogLevel(configured) ? configured : 'INFO';
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.length > 0 ? ' ' + JSON.stringify(args) : '';
    return `[${timestamp}] [${level}] ${message}${formattedArgs}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('DEBUG')) {
      console.log(this.formatMessage('DEBUG', message, ...args));
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('INFO')) {
      console.log(this.formatMessage('INFO', message, ...args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('WARN')) {
      console.warn(this.formatMessage('WARN', message, ...args));
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('ERROR')) {
      console.error(this.formatMessage('ERROR', message, ...args));
    }
  }
}

export type { LogLevel };

export default new Logger();
