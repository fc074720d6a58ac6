/**
 * Logger Configuration
 *
 * Configures pino logger with environment-aware formatting:
 * - Production: JSON output for log aggregation
 * - Development: Pretty-printed colorized output for readability
 * - Test: JSON output, silenced unless LOG_LEVEL says otherwise
 *
 * Usage:
 *   import { loggers } from '../shared/logging/logger';
 *   loggers.tailor.info({ jobId }, 'Tailoring started');
 */

import 'dotenv/config';
import pino, { Logger, LoggerOptions } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_DEVELOPMENT = NODE_ENV === 'development';
const LOG_LEVEL = process.env.LOG_LEVEL || (IS_DEVELOPMENT ? 'debug' : 'info');

/**
 * Base logger options shared across environments
 */
const baseOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: {
    pid: process.pid,
    env: NODE_ENV,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Redact sensitive fields from logs
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'apiKey',
      'token',
      'secret',
      '*.apiKey',
      '*.token',
      '*.secret',
    ],
    remove: true,
  },
};

/**
 * Development-specific options with pretty printing
 */
const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '{msg}',
      singleLine: false,
    },
  },
};

/**
 * Production options - JSON output for log aggregation
 */
const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      env: NODE_ENV,
    }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

/**
 * Main application logger instance
 */
export const logger: Logger = pino(IS_DEVELOPMENT ? developmentOptions : productionOptions);

/**
 * Create a child logger for a specific component/module
 *
 * @example
 * const parserLogger = createComponentLogger('parser');
 * parserLogger.info({ sections: 4 }, 'Resume parsed');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Pre-configured loggers for common components
 */
export const loggers = {
  /** HTTP request/response logging */
  http: createComponentLogger('http'),
  /** Text generation calls */
  llm: createComponentLogger('llm'),
  /** Tailoring pipeline stages */
  tailor: createComponentLogger('tailor'),
  /** File extraction, parsing and rendering */
  documents: createComponentLogger('documents'),
  /** Command-line entry point */
  cli: createComponentLogger('cli'),
};

/**
 * Serialize an error for structured logging
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const extras: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(err)) {
      if (!['name', 'message', 'stack'].includes(key)) {
        extras[key] = Reflect.get(err, key);
      }
    }
    return {
      type: err.constructor.name,
      message: err.message,
      stack: IS_DEVELOPMENT ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

export default logger;
