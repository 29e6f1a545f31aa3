import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { config } from '../config';

export type LogMeta = Record<string, unknown>;

// ============================================================================
// Formats
// ============================================================================

/**
 * Structure log metadata consistently and flatten Error objects so they
 * survive JSON serialisation.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = 'perftree';
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
 * bigint counts appear in log metadata; JSON.stringify cannot encode them.
 */
const bigintReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value;

/**
 * Format for structured JSON logging (file transport and LOG_FORMAT=json).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json({ replacer: bigintReplacer })
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, bigintReplacer)}` : '';
    return `${timestamp} ${level}: ${message}${metaStr}`;
  })
);

// ============================================================================
// Logger
// ============================================================================

/**
 * Standard output carries command results, so every console level is routed
 * to stderr.
 */
const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: 'perftree',
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
});

if (config.logging.file) {
  const logPath = path.resolve(config.logging.file);
  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  logger.add(
    new winston.transports.File({
      filename: logPath,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

export { logger };
