/**
 * @corrective-rag/core
 *
 * Shared building blocks: errors, logging, settings, math.
 */

export {
  RagError,
  ERROR_HINTS,
  createRagError,
  wrapError,
  isRagError,
  describeError,
  type ErrorCode,
} from './error/rag-error.js';

export {
  ConsoleLogger,
  SilentLogger,
  LogLevel,
  createLogger,
  getLogger,
  setRootLogger,
  parseLogLevel,
  sanitizeMeta,
  type Logger,
  type LogMeta,
  type LogSink,
  type ConsoleLoggerOptions,
} from './logging/logger.js';

export { SettingsSchema, loadSettings, type Settings } from './config/settings.js';

export { cosineSimilarity, clamp, mean } from './utils/math.js';
