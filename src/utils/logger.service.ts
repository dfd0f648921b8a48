import chalk from 'chalk';

export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
}

/**
 * Parse a level name such as "debug" or "WARN"; unknown names give undefined
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.trim().toUpperCase()) {
    case 'NONE':
      return LogLevel.NONE;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
      return LogLevel.WARN;
    case 'INFO':
      return LogLevel.INFO;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return undefined;
  }
}

class LoggerService {
  private level: LogLevel = parseLogLevel(process.env['GITMARKS_LOG_LEVEL']) ?? LogLevel.INFO;

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public error(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.ERROR) {
      console.error(chalk.red('❌ Error:'), message, ...args);
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.WARN) {
      console.warn(chalk.yellow('⚠️ Warn:'), message, ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.INFO) {
      console.log(message, ...args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(chalk.gray('🔍 Debug:'), message, ...args);
    }
  }
}

export const logger = new LoggerService();
