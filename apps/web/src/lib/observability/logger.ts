/**
 * Structured Logger using Winston
 * Supports correlation IDs, log levels, and file rotation
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

const isDevelopment = process.env.NODE_ENV !== 'production';
const level = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// Context keys that may carry the account's API token
const SECRET_KEYS = new Set(['apiToken', 'Api-Token', 'ACTIVECAMPAIGN_API_KEY']);

const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (SECRET_KEYS.has(key)) {
      info[key] = '[redacted]';
    }
  }
  return info;
});

// Define log format
const logFormat = winston.format.combine(
  redactSecrets(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.metadata(),
  isDevelopment
    ? winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, metadata }) => {
          const meta = metadata as Record<string, unknown>;
          const metaStr = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
          return `[${timestamp}] ${level}: ${message}${metaStr}`;
        })
      )
    : winston.format.json()
);

// Console transport
const consoleTransport = new winston.transports.Console({ level });

// File transports with rotation (only in production)
const fileTransports: winston.transport[] = [];

if (!isDevelopment) {
  // Error logs: failed pushes and the orphaned ids operators need
  fileTransports.push(
    new DailyRotateFile({
      filename: 'logs/error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '30d',
      format: winston.format.json(),
    })
  );

  // Combined logs
  fileTransports.push(
    new DailyRotateFile({
      filename: 'logs/combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '7d',
      format: winston.format.json(),
    })
  );
}

// Create logger instance
const logger = winston.createLogger({
  level,
  format: logFormat,
  transports: [consoleTransport, ...fileTransports],
  silent: process.env.NODE_ENV === 'test',
  exitOnError: false,
});

export type Logger = winston.Logger;

// Helper to add correlation ID
export function withCorrelationId(correlationId: string): Logger {
  return logger.child({ correlationId });
}

// Fields provider errors carry beyond name/message/stack
const ERROR_FIELDS = new Set(['kind', 'status', 'detail', 'retryAfterMs', 'missingFields', 'invalidFields']);

/** Flatten an unknown thrown value into loggable fields */
export function serializeError(error: unknown): Record<string, unknown> | undefined {
  if (error === undefined) {
    return undefined;
  }
  if (error instanceof Error) {
    const extra = Object.entries(error).filter(
      ([key, value]) => ERROR_FIELDS.has(key) && value !== undefined
    );
    return {
      name: error.name,
      message: error.message,
      ...Object.fromEntries(extra),
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

// Convenience methods
export const logInfo = (message: string, context?: Record<string, unknown>) =>
  logger.info(message, context);

export const logWarn = (message: string, context?: Record<string, unknown>) =>
  logger.warn(message, context);

export const logError = (message: string, error?: unknown, context?: Record<string, unknown>) => {
  logger.error(message, {
    ...context,
    error: serializeError(error),
  });
};

export const logDebug = (message: string, context?: Record<string, unknown>) =>
  logger.debug(message, context);

export default logger;
