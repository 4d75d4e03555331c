import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { config } from '../config';
import type { EngineLogger } from '../../shared/utils/engineLogger';

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'klotski-cli';

/**
 * Stamps the service name and flattens Error instances so they survive
 * JSON serialization.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }

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
 * Format for structured JSON logging (file transport and LOG_FORMAT=json).
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
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${metaStr}`;
  })
);

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    // Board output goes to stdout, so every log level goes to stderr.
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
});

if (config.logging.file) {
  const logFile = path.resolve(config.logging.file);
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  logger.add(
    new winston.transports.File({
      filename: logFile,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

/**
 * Adapter that routes engine diagnostics into winston.
 */
export const engineLogger: EngineLogger = {
  debug: (message, meta) => logger.debug(message, { component: 'engine', ...meta }),
  info: (message, meta) => logger.info(message, { component: 'engine', ...meta }),
  warn: (message, meta) => logger.warn(message, { component: 'engine', ...meta }),
};

// ============================================================================
// Exports
// ============================================================================

export { logger };
