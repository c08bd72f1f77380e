/**
 * @lorekeeper/logger
 * Unified logging package for lorekeeper services
 */

export { createLogger } from './logger';
export type {
  Logger,
  LoggerConfig,
  LogMetadata,
  LogLevel,
  LogFormat,
} from './types';
