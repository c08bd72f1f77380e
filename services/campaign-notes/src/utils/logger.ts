import { createLogger, LogLevel } from '@lorekeeper/logger';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function parseLogLevel(value: string | undefined): LogLevel {
  return LEVELS.find((level) => level === value) ?? 'info';
}

export const logger = createLogger({
  service: 'campaign-notes',
  level: parseLogLevel(process.env.LOG_LEVEL),
  silent: process.env.NODE_ENV === 'test',
  enableDailyRotate: process.env.LOG_ROTATE === 'true',
});
