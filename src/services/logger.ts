/**
 * Structured Logging Service
 *
 * Uses Winston for structured JSON logging with:
 * - Console output (colored in dev)
 * - File output (JSON format, disabled under test)
 * - Per-component child loggers
 * - A separate audit stream for device-affecting operations
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';

const level = process.env.LOG_LEVEL || 'info';
const isProduction = process.env.NODE_ENV === 'production';
const writeFiles = process.env.NODE_ENV !== 'test';
const logsDir = path.resolve(process.env.LOG_DIR || 'logs');

if (writeFiles && !fs.existsSync(logsDir)) {
  fs.mkdirSync(logsDir, { recursive: true });
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, component, service, ...meta }) => {
    const tag = typeof component === 'string' ? `[${component}] ` : '';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${tag}${message}${metaStr}`;
  })
);

function fileTransports(): winston.transport[] {
  if (!writeFiles) return [];
  return [
    // All logs
    new winston.transports.File({
      filename: path.join(logsDir, 'device.log'),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      tailable: true,
    }),

    // Errors only
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    }),
  ];
}

export const logger = winston.createLogger({
  level,
  format: logFormat,
  defaultMeta: { service: 'device-core' },
  transports: [
    new winston.transports.Console({
      format: isProduction ? logFormat : consoleFormat,
      silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
    }),
    ...fileTransports(),
  ],
});

/**
 * Logger tagged with the emitting component (MCP, StateMachine, ...)
 */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}

// Audit logger for operations that change the device
export const auditLogger = winston.createLogger({
  level: 'info',
  format: logFormat,
  defaultMeta: { service: 'device-audit' },
  transports: writeFiles
    ? [
        new winston.transports.File({
          filename: path.join(logsDir, 'audit.log'),
          maxsize: 50 * 1024 * 1024,
          maxFiles: 10,
        }),
      ]
    : [new winston.transports.Console({ silent: true })],
});

/**
 * Log a device-affecting event
 */
export function auditLog(action: string, details: Record<string, unknown>): void {
  auditLogger.info(action, {
    timestamp: new Date().toISOString(),
    ...details,
  });
}
