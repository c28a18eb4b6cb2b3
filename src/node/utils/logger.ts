import path from 'path';
import winston from 'winston';
import { config, type AppConfig } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

const SERVICE_NAME = 'alphabeta-engine';

// ============================================================================
// Formats
// ============================================================================

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }

  // Handle Error objects specially
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  return info;
});

/**
 * Format for structured JSON logging (used in production and file transports).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (used in development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, environment: _env, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Create a winston logger from the logging section of the app config:
 * a console transport in the configured format, plus a JSON file
 * transport when a log file is configured.
 */
export function createLogger(appConfig: Pick<AppConfig, 'logging' | 'nodeEnv'>): winston.Logger {
  const consoleTransport = new winston.transports.Console({
    format: appConfig.logging.format === 'json' ? jsonFormat : consoleFormat,
  });
  const fileTransport = appConfig.logging.file
    ? new winston.transports.File({
        filename: path.resolve(appConfig.logging.file),
        format: jsonFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    : undefined;

  return winston.createLogger({
    level: appConfig.logging.level,
    defaultMeta: {
      service: SERVICE_NAME,
      environment: appConfig.nodeEnv,
    },
    transports: fileTransport ? [consoleTransport, fileTransport] : [consoleTransport],
  });
}

const logger = createLogger(config);

export { logger };
