/**
 * Type definitions for @lorekeeper/logger
 */

import type winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LoggerConfig {
  /** Service name (required) */
  service: string;

  /** Log level (default: 'info') */
  level?: LogLevel;

  /** Enable console transport (default: true) */
  enableConsole?: boolean;

  /** Enable file transport (default: false) */
  enableFile?: boolean;

  /** Log file path (default: 'logs/{service}.log') */
  filePath?: string;

  /** Enable daily rotate file transport (default: false) */
  enableDailyRotate?: boolean;

  /** Max files for rotation (default: '14d') */
  maxFiles?: string;

  /** Max file size for rotation (default: '20m') */
  maxSize?: string;

  /** Log format (default: 'json' in production, 'pretty' in development) */
  format?: LogFormat;

  /** Suppress all output (default: false) */
  silent?: boolean;

  /** Additional metadata to include in all logs */
  metadata?: LogMetadata;

  /** Environment (default: process.env.NODE_ENV) */
  environment?: string;

  /** Service version (default: process.env.SERVICE_VERSION) */
  version?: string;
}

export type LogMetadata = Record<string, unknown>;

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;

  info(message: string, metadata?: LogMetadata): void;

  warn(message: string, metadata?: LogMetadata): void;

  /** Error instances under `metadata.error` are flattened to message and stack */
  error(message: string, metadata?: LogMetadata): void;

  /** Create child logger with additional context */
  child(metadata: LogMetadata): Logger;

  /** Get Winston logger instance (for advanced use) */
  getWinstonLogger(): winston.Logger;
}
