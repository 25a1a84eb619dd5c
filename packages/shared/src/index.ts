/**
 * @warden/shared
 *
 * Ambient utilities shared by the Warden packages.
 */

// Logging
export {
  createLogger,
  setLoggerConfig,
  getLoggerConfig,
  initLoggerFromEnv,
  DEFAULT_LOGGER_CONFIG,
  LOG_LEVELS,
  LOG_FORMATS,
} from './utils/logger';
export type { Logger, LoggerConfig, LogContext, LogLevel, LogFormat } from './utils/logger';

// Environment / configuration
export { parseBool, validateConfig, formatValidationErrors } from './utils/env';
export type { EnvMap, ValidationError, ValidationResult } from './utils/env';
