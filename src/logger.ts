/**
 * Logger utility using Winston
 * Provides centralized logging with support for different log types
 */

import winston from 'winston';
import { config } from './config';

/**
 * Log message types
 */
export type LogType =
  | 'setup'
  | 'http'
  | 'store'
  | 'query'
  | 'rules'
  | 'server'
  | 'error';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Logger class that wraps Winston
 */
export class Logger {
  private readonly logger: winston.Logger;

  constructor() {
    this.logger = winston.createLogger({
      level: config.getString('logs.level', 'info'),
      silent: config.getBoolean('logs.silent'),
      transports: [
        new winston.transports.Console({
          format: winston.format.printf((info) => {
            const type = typeof info.type === 'string' ? info.type : undefined;
            const message = String(info.message);
            const typePrefix = type ? `[${type.toUpperCase()}]` : '';
            return typePrefix ? `${typePrefix} ${message}` : message;
          }),
        }),
      ],
    });
  }

  /**
   * Level and silence are read on every call so that addConfig() takes effect
   * on an already created logger.
   */
  private syncWithConfig(): void {
    this.logger.level = config.getString('logs.level', 'info');
    this.logger.silent = config.getBoolean('logs.silent');
  }

  /**
   * Log a message with a specific type
   * @param type - Type of log message
   * @param message - Message content
   * @param level - Log level (default: 'info')
   */
  public log(type: LogType, message: string, level: LogLevel = 'info'): void {
    // Per-request HTTP and store traffic is only logged when asked for
    if (type === 'http' && !config.getBoolean('logs.verboseHttpLogs')) {
      return;
    }
    if (type === 'store' && !config.getBoolean('logs.verboseStoreLogs')) {
      return;
    }

    this.syncWithConfig();
    this.logger.log({
      level,
      message,
      type,
    });
  }

  /**
   * Log an error message
   */
  public error(type: LogType, message: string): void {
    this.log(type, message, 'error');
  }

  /**
   * Log a warning message
   */
  public warn(type: LogType, message: string): void {
    this.log(type, message, 'warn');
  }

  /**
   * Log an info message
   */
  public info(type: LogType, message: string): void {
    this.log(type, message, 'info');
  }

  /**
   * Log a debug message
   */
  public debug(type: LogType, message: string): void {
    this.log(type, message, 'debug');
  }
}

/**
 * Singleton instance
 */
let loggerInstance: Logger | null = null;

/**
 * Get logger instance
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

