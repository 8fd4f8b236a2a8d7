import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Trailing key/value context attached to a log line, e.g.
 * `logger.info('CACHE_HIT', { keyword, count })`.
 */
export type LogContext = Record<string, unknown>;

class Logger {
  private logDir: string;

  constructor() {
    this.logDir = path.resolve(process.env.LOG_DIR || path.join(process.cwd(), 'logs'));
    fs.ensureDirSync(this.logDir);
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    return context
      ? `[${timestamp}] [${level}] ${message} ${JSON.stringify(context)}`
      : `[${timestamp}] [${level}] ${message}`;
  }

  private writeToFile(formatted: string): void {
    const logFile = path.join(this.logDir, `${new Date().toISOString().split('T')[0]}.log`);
    fs.appendFileSync(logFile, formatted + '\n');
  }

  debug(message: string, context?: LogContext): void {
    const formatted = this.formatMessage(LogLevel.DEBUG, message, context);
    console.log(chalk.gray(formatted));
    this.writeToFile(formatted);
  }

  info(message: string, context?: LogContext): void {
    const formatted = this.formatMessage(LogLevel.INFO, message, context);
    console.log(chalk.blue(formatted));
    this.writeToFile(formatted);
  }

  warn(message: string, context?: LogContext): void {
    const formatted = this.formatMessage(LogLevel.WARN, message, context);
    console.log(chalk.yellow(formatted));
    this.writeToFile(formatted);
  }

  error(message: string, context?: LogContext): void {
    const formatted = this.formatMessage(LogLevel.ERROR, message, context);
    console.error(chalk.red(formatted));
    this.writeToFile(formatted);
  }
}

export const logger = new Logger();
