import winston from 'winston';
import { config } from '../config/index.js';

const { combine, timestamp, json, errors, printf, colorize } = winston.format;

export type SecuritySeverity = 'low' | 'medium' | 'high' | 'critical';

const consoleLine = printf(({ level, message, timestamp: at, stack, service: _service, environment: _env, ...meta }) => {
  const context = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  const trace = stack ? `\n${stack}` : '';
  return `${at} ${level} ${message}${context}${trace}`;
});

/**
 * Structured JSON in production, one colourised line per entry elsewhere.
 */
export const logger = winston.createLogger({
  level: config.monitoring.logLevel,
  defaultMeta: {
    service: 'tenant-sync',
    environment: config.env,
  },
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    config.isProduction ? json() : combine(colorize(), consoleLine)
  ),
  transports: [
    new winston.transports.Console({
      handleExceptions: true,
      handleRejections: true,
    }),
  ],
  exitOnError: false,
});

export function logRequest(method: string, path: string, statusCode: number, durationMs: number, userId?: string): void {
  const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
  logger.log(level, `${method} ${path} ${statusCode}`, { durationMs, userId });
}

/**
 * Security-relevant events (rejected OAuth states, audit gaps) go to the
 * error or warn stream by severity.
 */
export function logSecurity(event: string, severity: SecuritySeverity, metadata: Record<string, unknown> = {}): void {
  const level = severity === 'critical' || severity === 'high' ? 'error' : 'warn';
  logger.log(level, `Security event: ${event}`, { event, severity, ...sanitizeForLogging(metadata) });
}

// Token material, client credentials and callback signatures
const SENSITIVE_KEY = /token|secret|password|authorization|apikey|api_key|encrypted|cookie/i;
const SENSITIVE_EXACT = new Set(['hmac', 'signature']);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY.test(key) || SENSITIVE_EXACT.has(key.toLowerCase());
}

export function sanitizeForLogging(obj: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (isNestedRecord(value)) {
      sanitized[key] = sanitizeForLogging(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function isNestedRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Error)
  );
}
