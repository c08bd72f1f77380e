import { createLogger, LogLevel } from '@lorekeeper/logger';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function envLevel(): LogLevel {
  return LEVELS.find((level) => level === process.env.LOG_LEVEL) ?? 'info';
}

export const logger = createLogger({
  service: 'lorekeeper-database',
  level: envLevel(),
  silent: process.env.NODE_ENV === 'test',
});
