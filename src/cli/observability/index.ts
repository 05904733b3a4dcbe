/**
 * Observability re-exports.
 */

export {
  createLogger,
  createNormalizingTransform,
  getLogPath,
  type LogOptions,
  makeLogOptions,
  writeLogMessage,
} from './logger.ts';
