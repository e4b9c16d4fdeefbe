/**
 * Structured Logger
 *
 * Winston-based logger with:
 * - JSON format for production, colorized console for development
 * - Correlation IDs for request tracing
 * - Daily log rotation in production
 * - Sensitive data filtering (routing provider keys, service-role keys)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { AsyncLocalStorage } from 'async_hooks';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

export const asyncLocalStorage = new AsyncLocalStorage<{ correlationId: string }>();

const SENSITIVE_FIELDS = [
  'password',
  'token',
  'apiKey',
  'api_key',
  'secret',
  'authorization',
  'cookie',
  'subscription-key',
  'subscriptionKey',
  'service_role',
  'SUPABASE_SERVICE_ROLE_KEY',
  'AZURE_MAPS_SUBSCRIPTION_KEY',
];

const MAX_STRING_LENGTH = 500;

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_FIELDS.some((field) => lowerKey.includes(field.toLowerCase()));
}

/**
 * Redact sensitive keys and truncate long strings, recursively.
 */
export function sanitizeData(data: unknown): unknown {
  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    return data.length > MAX_STRING_LENGTH ? `[String of length ${data.length}]` : data;
  }

  if (Array.isArray(data)) {
    return data.map(sanitizeData);
  }

  if (data instanceof Date || data instanceof Error) {
    return data;
  }

  if (typeof data === 'object') {
    return sanitizeRecord(data);
  }

  return data;
}

export function sanitizeRecord(data: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    sanitized[key] = isSensitiveKey(key) ? '[REDACTED]' : sanitizeData(value);
  }

  return sanitized;
}

/**
 * Adds the correlation ID of the current request and sanitizes metadata
 */
const correlationFormat = winston.format((info) => {
  const store = asyncLocalStorage.getStore();

  const { level, message, timestamp, correlationId, service, environment, ...metadata } = info;

  return {
    level,
    message,
    timestamp,
    correlationId: store?.correlationId ?? correlationId,
    service,
    environment,
    ...sanitizeRecord(metadata),
  };
});

const devFormat = printf(({ level, message, timestamp, correlationId, ...metadata }) => {
  let msg = `${timestamp}`;

  if (correlationId) {
    msg += ` [${correlationId}]`;
  }

  msg += ` [${level}]: ${message}`;

  const { service, environment, ...rest } = metadata;

  if (Object.keys(rest).length > 0) {
    msg += ` ${JSON.stringify(rest)}`;
  }

  return msg;
});

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';

const LOG_LEVEL = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

const baseFormat = combine(
  errors({ stack: true }),
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  correlationFormat()
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: isDevelopment ? combine(colorize(), devFormat) : combine(json()),
    silent: isTest,
  }),
];

if (!isDevelopment && !isTest) {
  // Error log - keep for 30 days, max 20MB per file
  transports.push(
    new DailyRotateFile({
      filename: 'logs/error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: json(),
      maxSize: '20m',
      maxFiles: '30d',
      zippedArchive: true,
    })
  );

  // Combined log - keep for 14 days
  transports.push(
    new DailyRotateFile({
      filename: 'logs/combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      format: json(),
      maxSize: '20m',
      maxFiles: '14d',
      zippedArchive: true,
    })
  );
}

export const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: baseFormat,
  defaultMeta: {
    service: 'hos-trip-planner',
    environment: process.env.NODE_ENV || 'development',
  },
  transports,
  exitOnError: false,
});

export function logWithCorrelation(
  level: 'error' | 'warn' | 'info' | 'debug',
  message: string,
  meta?: Record<string, unknown>
): void {
  const store = asyncLocalStorage.getStore();

  logger.log(level, message, {
    ...(meta ? sanitizeRecord(meta) : {}),
    correlationId: store?.correlationId,
  });
}

// Stream for Morgan HTTP logging
export const stream = {
  write: (message: string) => {
    logger.info(message.trim());
  },
};

if (!isTest) {
  logger.info('Logger initialized', {
    level: LOG_LEVEL,
    environment: process.env.NODE_ENV || 'development',
    rotation: !isDevelopment ? 'enabled' : 'disabled',
  });
}

/**
 * Helper functions for common log scenarios
 */
export const logHelpers = {
  apiRequest: (method: string, path: string, meta?: Record<string, unknown>) => {
    logWithCorrelation('info', `API Request: ${method} ${path}`, meta);
  },

  apiResponse: (method: string, path: string, statusCode: number, duration: number) => {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    logWithCorrelation(level, `API Response: ${method} ${path}`, {
      statusCode,
      duration: `${duration}ms`,
    });
  },

  dbQuery: (operation: string, table: string, duration?: number) => {
    logWithCorrelation('debug', `DB Query: ${operation} on ${table}`, {
      duration: duration !== undefined ? `${duration}ms` : undefined,
    });
  },

  externalCall: (service: string, operation: string, meta?: Record<string, unknown>) => {
    logWithCorrelation('debug', `External Call: ${service} ${operation}`, meta);
  },

  business: (event: string, meta?: Record<string, unknown>) => {
    logWithCorrelation('info', `Business Event: ${event}`, meta);
  },

  security: (event: string, severity: 'low' | 'medium' | 'high', meta?: Record<string, unknown>) => {
    const level = severity === 'high' ? 'error' : severity === 'medium' ? 'warn' : 'info';
    logWithCorrelation(level, `Security: ${event}`, { severity, ...meta });
  },
};
