/**
 * glyphdeck-core
 *
 * Dataset cache, spreadsheet loading, study sessions and configuration
 * for the Glyphdeck character trainer.
 */

export * from './cache/index.js';
export * from './dataset/index.js';
export * from './study/index.js';
export * from './config/index.js';
export {
  createConsoleLogger,
  silentLogger,
  errorMessage,
  type Logger,
  type ConsoleLoggerOptions,
} from './utils/logger.js';
