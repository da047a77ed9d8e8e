// Diagnostic logging. Everything goes to stderr so stdout stays free for tool output.

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = LogLevel.INFO) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return this.level !== LogLevel.SILENT && level >= this.level;
  }

  debug(message: string): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      console.error(`[debug] ${message}`);
    }
  }

  info(message: string): void {
    if (this.isEnabled(LogLevel.INFO)) {
      console.error(message);
    }
  }

  warn(message: string): void {
    if (this.isEnabled(LogLevel.WARN)) {
      console.warn(`Warning: ${message}`);
    }
  }

  error(message: string): void {
    if (this.isEnabled(LogLevel.ERROR)) {
      console.error(`Error: ${message}`);
    }
  }
}

export const logger = new Logger();
