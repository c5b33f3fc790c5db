/**
 * Leveled logger writing diagnostics to stderr
 * @module utils/logger
 * @internal
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

/**
 * Stdout is reserved for the verbose report and the signature, so every
 * level goes through console.error.
 */
export class Logger {
  constructor(
    private readonly level: LogLevel = LogLevel.WARN,
    private readonly name: string = 'transfer-with'
  ) {}

  child(name: string): Logger {
    return new Logger(this.level, `${this.name}:${name}`);
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.NONE && this.level <= level;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      console.error(`[${this.name}:DEBUG]`, message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.INFO)) {
      console.error(`[${this.name}:INFO]`, message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.WARN)) {
      console.error(`[${this.name}:WARN]`, message, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.ERROR)) {
      console.error(`[${this.name}:ERROR]`, message, ...args);
    }
  }
}
