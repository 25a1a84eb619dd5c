/**
 * Structured Logger
 *
 * Emits one line per entry through the console, either as JSON or in a
 * compact human-readable form. Level filtering is global so embedding
 * applications can silence the library from one place.
 *
 * Output format (json):
 * {"timestamp":"2024-01-01T00:00:00.000Z","level":"info","module":"AUTHORITY","message":"..."}
 */

/**
 * Log levels in order of severity (lowest to highest).
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log output format.
 */
export type LogFormat = 'json' | 'pretty';

/**
 * Logger configuration for level filtering and output format.
 */
export interface LoggerConfig {
  /** Minimum log level to output (default: 'info') */
  level: LogLevel;
  /** Output format: 'json' for structured logs, 'pretty' for human-readable (default: 'json') */
  format: LogFormat;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'json',
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
export const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalLoggerConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

/**
 * Set global logger configuration.
 * @param config - Partial configuration to merge with defaults
 */
export function setLoggerConfig(config: Partial<LoggerConfig>): void {
  globalLoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalLoggerConfig };
}

/**
 * Context fields carried by every entry of a logger.
 */
export interface LogContext {
  /** Module/component name for log categorization */
  module?: string;
  /** Action being authorized */
  action?: string;
  /** Resource type the action targets */
  resourceType?: string;
  /** Rule that decided the outcome */
  ruleId?: string;
  /** Operation duration in milliseconds */
  durationMs?: number;
  [key: string]: unknown;
}

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext, error?: Error): void;
  error(message: string, context?: LogContext, error?: Error): void;
  debug(message: string, context?: LogContext): void;
  /** Create a child logger with additional context merged in */
  child(additionalContext: LogContext): Logger;
  /** Create a child logger with module name set */
  module(moduleName: string): Logger;
  /** Start a timer and return a function to log the duration */
  startTimer(label: string): () => void;
}

interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

function shouldLog(level: LogLevel, config: LoggerConfig): boolean {
  return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[config.level];
}

function formatLogEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'pretty') {
    const levelColor: Record<LogLevel, string> = {
      debug: '\x1b[90m', // gray
      info: '\x1b[36m', // cyan
      warn: '\x1b[33m', // yellow
      error: '\x1b[31m', // red
    };
    const reset = '\x1b[0m';
    const timestamp = entry.timestamp.substring(11, 23); // HH:mm:ss.SSS
    const module = entry.module ? `[${entry.module}] ` : '';
    const duration = entry.durationMs !== undefined ? ` (${entry.durationMs}ms)` : '';
    return `${levelColor[entry.level]}${timestamp} ${entry.level.toUpperCase().padEnd(5)}${reset} ${module}${entry.message}${duration}`;
  }
  return JSON.stringify(entry);
}

/**
 * Create a logger instance with base context.
 *
 * @param baseContext - Default context to include in all log entries
 * @param config - Optional configuration override; unset fields follow the global config
 *
 * @example
 * const log = createLogger().module('AUTHORITY');
 * log.warn('Resource type could not be resolved', { action: 'read' });
 */
export function createLogger(baseContext: LogContext = {}, config?: Partial<LoggerConfig>): Logger {
  const log = (level: LogLevel, message: string, extra?: LogContext, error?: Error): void => {
    // Resolved per call so setLoggerConfig applies to loggers created earlier
    const effectiveConfig = config ? { ...globalLoggerConfig, ...config } : globalLoggerConfig;
    if (!shouldLog(level, effectiveConfig)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...baseContext,
      ...extra,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
        },
      }),
    };

    const output = formatLogEntry(entry, effectiveConfig.format);

    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'debug':
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  };

  return {
    info: (msg, extra) => log('info', msg, extra),
    warn: (msg, extra, err) => log('warn', msg, extra, err),
    error: (msg, extra, err) => log('error', msg, extra, err),
    debug: (msg, extra) => log('debug', msg, extra),

    child: (additionalContext) => createLogger({ ...baseContext, ...additionalContext }, config),

    module: (moduleName) => createLogger({ ...baseContext, module: moduleName }, config),

    startTimer: (label) => {
      const startTime = Date.now();
      return () => {
        log('info', `${label} completed`, { durationMs: Date.now() - startTime });
      };
    },
  };
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Initialize logger configuration from environment variables.
 *
 * - LOG_LEVEL: "debug" | "info" | "warn" | "error" (default: "info")
 * - LOG_FORMAT: "json" | "pretty" (default: "json")
 *
 * Unknown values fall back to the defaults.
 */
export function initLoggerFromEnv(env: { LOG_LEVEL?: string; LOG_FORMAT?: string }): void {
  setLoggerConfig({
    level: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : DEFAULT_LOGGER_CONFIG.level,
    format: isLogFormat(env.LOG_FORMAT) ? env.LOG_FORMAT : DEFAULT_LOGGER_CONFIG.format,
  });
}
