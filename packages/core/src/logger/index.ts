/**
 * Logger Module
 *
 * Structured logging with Winston:
 * - Human-readable stderr output with success/failure glyphs
 * - Optional rotating JSON files when FLOWKIT_LOG_DIR is set
 * - Correlation IDs for tracing a single facade call
 * - Sensitive data redaction
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { randomUUID } from 'crypto';

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss.SSS';

const SENSITIVE_KEYS = ['token', 'secret', 'password', 'apikey', 'api_key', 'authorization'];

// `key: value` pairs and auth schemes embedded in free text
const SENSITIVE_TEXT = [
  /(api_?token|password|secret|authorization)(['":\s]+['"]?)([^'"}\s,]+)/gi,
  /(bearer|basic)(\s+)([^\s'"]+)/gi,
];

/**
 * Redact sensitive information from log data
 */
export function redactSensitive(data: unknown): unknown {
  if (typeof data === 'string') {
    return SENSITIVE_TEXT.reduce(
      (text, pattern) => text.replace(pattern, '$1$2[REDACTED]'),
      data
    );
  }
  if (Array.isArray(data)) {
    return data.map(redactSensitive);
  }
  if (data && typeof data === 'object') {
    return Object.fromEntries(
      Object.entries(data).map(([key, value]) => {
        const lowerKey = key.toLowerCase();
        return SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))
          ? [key, '[REDACTED]']
          : [key, redactSensitive(value)];
      })
    );
  }
  return data;
}

/**
 * Status glyph shown in front of completed operations on the console
 */
export function statusGlyph(status: unknown): string {
  if (status === 'success') return '✓ ';
  if (status === 'failure') return '✗ ';
  return '';
}

const CONTEXT_KEYS = new Set(['correlationId', 'service', 'operation', 'duration', 'status', 'stack']);

function extraMeta(info: winston.Logform.TransformableInfo): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(info).filter(
      ([key]) => !CONTEXT_KEYS.has(key) && key !== 'level' && key !== 'message' && key !== 'timestamp'
    )
  );
}

// One line per entry in the rotating file; durations are written as durationMs
const fileFormat = winston.format.printf((info) => {
  const meta = extraMeta(info);
  return JSON.stringify({
    timestamp: info.timestamp,
    level: info.level.toUpperCase(),
    message: info.message,
    correlationId: info.correlationId ?? undefined,
    service: info.service,
    operation: info.operation,
    status: info.status,
    durationMs: info.duration,
    meta: Object.keys(meta).length > 0 ? redactSensitive(meta) : undefined,
  });
});

const consoleFormat = winston.format.printf((info) => {
  const { correlationId, service, operation, duration, status, stack } = info;
  const parts = [`${info.timestamp} [${info.level.toUpperCase()}]`];

  if (typeof correlationId === 'string') parts.push(`[${correlationId.slice(0, 8)}]`);
  if (service) parts.push(`[${service}]`);
  if (operation) parts.push(`${operation}:`);
  parts.push(`${statusGlyph(status)}${info.message}`);
  if (duration !== undefined) parts.push(`(${duration}ms)`);

  let output = parts.join(' ');
  if (stack) output += `\n${stack}`;

  const meta = extraMeta(info);
  if (Object.keys(meta).length > 0) {
    output += `\n  → ${JSON.stringify(redactSensitive(meta), null, 2).replace(/\n/g, '\n  ')}`;
  }
  return output;
});

function buildTransports(logDir: string | undefined): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: winston.format.combine(winston.format.timestamp({ format: TIMESTAMP_FORMAT }), consoleFormat),
    }),
  ];

  if (logDir) {
    transports.push(
      new DailyRotateFile({
        dirname: path.resolve(logDir),
        filename: 'flowkit-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: process.env.LOG_MAX_SIZE || '10m',
        maxFiles: process.env.LOG_MAX_DAYS || '14d',
        zippedArchive: true,
        format: winston.format.combine(winston.format.timestamp({ format: TIMESTAMP_FORMAT }), fileFormat),
      })
    );
  }

  return transports;
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.errors({ stack: true }),
  transports: buildTransports(process.env.FLOWKIT_LOG_DIR),
});

/**
 * Change the level of the shared logger at runtime (e.g. after config load)
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}

let currentCorrelationId: string | null = null;

export function generateCorrelationId(): string {
  return randomUUID();
}

export function setCorrelationId(id: string): void {
  currentCorrelationId = id;
}

export function getCorrelationId(): string | null {
  return currentCorrelationId;
}

export function clearCorrelationId(): void {
  currentCorrelationId = null;
}

/**
 * Handle returned by startOperation
 */
export interface OperationLogger {
  success: (message?: string, resultMeta?: Record<string, unknown>) => void;
  failure: (error: Error | string, resultMeta?: Record<string, unknown>) => void;
}

/**
 * Service logger interface - returned by createServiceLogger
 */
export interface ServiceLogger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  startOperation: (operation: string, meta?: Record<string, unknown>) => OperationLogger;
}

/**
 * Create a logger bound to a service name.
 *
 * `startOperation` logs the start at debug level and returns a handle whose
 * `success`/`failure` record the outcome and duration of the operation.
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  const context = () => ({ service: serviceName, correlationId: getCorrelationId() });

  return {
    debug: (message, meta) => {
      logger.debug(message, { ...context(), ...meta });
    },
    info: (message, meta) => {
      logger.info(message, { ...context(), ...meta });
    },
    warn: (message, meta) => {
      logger.warn(message, { ...context(), ...meta });
    },
    error: (message, meta) => {
      logger.error(message, { ...context(), ...meta });
    },
    startOperation: (operation, meta) => {
      const startTime = Date.now();
      logger.debug(`Starting ${operation}`, { ...context(), operation, ...meta });

      return {
        success: (message, resultMeta) => {
          logger.info(message || `Completed ${operation}`, {
            ...context(),
            operation,
            duration: Date.now() - startTime,
            status: 'success',
            ...resultMeta,
          });
        },
        failure: (error, resultMeta) => {
          const errorMessage = error instanceof Error ? error.message : error;
          logger.error(`Failed ${operation}: ${errorMessage}`, {
            ...context(),
            operation,
            duration: Date.now() - startTime,
            status: 'failure',
            stack: error instanceof Error ? error.stack : undefined,
            ...resultMeta,
          });
        },
      };
    },
  };
}

export default logger;
