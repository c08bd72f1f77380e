/**
 * Core Logger Implementation
 * Unified logging solution for lorekeeper services
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { Logger, LoggerConfig, LogMetadata } from './types';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

/**
 * Create a Winston logger instance with standardized configuration
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    service,
    level = 'info',
    enableConsole = true,
    enableFile = false,
    filePath,
    enableDailyRotate = false,
    maxFiles = '14d',
    maxSize = '20m',
    format: logFormat,
    silent = false,
    metadata = {},
    environment = process.env.NODE_ENV || 'development',
    version = process.env.SERVICE_VERSION || '0.1.0',
  } = config;

  // Determine format based on environment
  const useJsonFormat = logFormat === 'json' || (logFormat === undefined && environment === 'production');

  // Base metadata to include in all logs
  const baseMetadata = {
    service,
    environment,
    version,
    ...metadata,
  };

  const loggerFormat = useJsonFormat
    ? combine(
        errors({ stack: true }),
        timestamp(),
        json()
      )
    : combine(
        errors({ stack: true }),
        colorize(),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        printf(({ timestamp, level, message, service, environment: _env, version: _version, ...meta }) => {
          const metaPart = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} [${level}] [${service}] ${message}${metaPart}`;
        })
      );

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(new winston.transports.Console());
  }

  if (enableFile) {
    transports.push(new winston.transports.File({
      filename: filePath || `logs/${service}.log`,
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 10,
    }));
  }

  if (enableDailyRotate) {
    transports.push(new DailyRotateFile({
      filename: filePath || `logs/${service}-%DATE%.log`,
      datePattern: 'YYYY-MM-DD',
      maxSize,
      maxFiles,
      zippedArchive: true,
    }));
  }

  const winstonLogger = winston.createLogger({
    level,
    format: loggerFormat,
    defaultMeta: baseMetadata,
    transports,
    silent,
    exitOnError: false,
  });

  return wrap(winstonLogger);
}

function wrap(winstonLogger: winston.Logger): Logger {
  return {
    debug(message: string, metadata?: LogMetadata) {
      winstonLogger.debug(message, flattenError(metadata));
    },

    info(message: string, metadata?: LogMetadata) {
      winstonLogger.info(message, flattenError(metadata));
    },

    warn(message: string, metadata?: LogMetadata) {
      winstonLogger.warn(message, flattenError(metadata));
    },

    error(message: string, metadata?: LogMetadata) {
      winstonLogger.error(message, flattenError(metadata));
    },

    child(metadata: LogMetadata): Logger {
      return wrap(winstonLogger.child(metadata));
    },

    getWinstonLogger() {
      return winstonLogger;
    },
  };
}

// winston serializes Error instances to {} inside metadata
function flattenError(metadata?: LogMetadata): LogMetadata | undefined {
  if (!(metadata?.error instanceof Error)) {
    return metadata;
  }
  return {
    ...metadata,
    error: metadata.error.message,
    stack: metadata.error.stack,
  };
}
