import pino from 'pino';
import { config } from './config.js';
import { getTraceInfo } from './tracing.js';

/**
 * Redacts values for keys containing sensitive patterns
 */
const SENSITIVE_PATTERNS = [
  'token',
  'password',
  'secret',
  'api_key',
  'apikey',
  'authorization',
  'credential',
  'bearer',
];

const REDACTED = '***REDACTED***';

/**
 * Deep sanitize an object, redacting sensitive values
 */
function sanitizeObject(obj: unknown, depth = 0): unknown {
  if (depth > 10) return '[MAX_DEPTH]';

  if (obj === null || obj === undefined) return obj;

  if (typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map((item) => sanitizeObject(item, depth + 1));
  }

  // Keep message, scrub stack
  if (obj instanceof Error) {
    const sanitizedError: Record<string, unknown> = {
      name: obj.name,
      message: sanitizeString(obj.message),
    };
    if (obj.stack) {
      sanitizedError.stack = sanitizeString(obj.stack);
    }
    return sanitizedError;
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const keyLower = key.toLowerCase();
    const isSensitive = SENSITIVE_PATTERNS.some((pattern) => keyLower.includes(pattern));

    if (isSensitive && value !== null && value !== undefined) {
      result[key] = REDACTED;
    } else if (typeof value === 'string') {
      result[key] = sanitizeString(value);
    } else {
      result[key] = sanitizeObject(value, depth + 1);
    }
  }
  return result;
}

/**
 * Mask token-shaped substrings
 */
export function sanitizeString(str: string): string {
  let result = str.replace(/ghp_[A-Za-z0-9_]{36,}/g, 'ghp_***REDACTED***');
  result = result.replace(/github_pat_[A-Za-z0-9_]{22,}/g, 'github_pat_***REDACTED***');
  result = result.replace(/Bearer\s+[A-Za-z0-9\-_.~+/]+=*/gi, 'Bearer ***REDACTED***');
  result = result.replace(/Basic\s+[A-Za-z0-9+/]+=*/g, 'Basic ***REDACTED***');
  result = result.replace(/sk-ant-[A-Za-z0-9\-_]{20,}/g, 'sk-ant-***REDACTED***'); // Anthropic
  result = result.replace(/xox[aboprs]-[A-Za-z0-9-]+/g, 'xox*-***REDACTED***'); // Slack

  return result;
}

// stdout carries the MCP transport, so every log line goes to stderr
const baseLogger = pino(
  {
    level: config.LOG_LEVEL ?? (config.NODE_ENV === 'production' ? 'info' : 'debug'),
    transport:
      config.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
              destination: 2,
            },
          }
        : undefined,
    base: {
      service: 'taskctx',
    },
    mixin() {
      return getTraceInfo();
    },
    serializers: {
      err: (err: Error) => sanitizeObject(err),
      error: (err: unknown) => sanitizeObject(err),
    },
    redact: {
      paths: [
        'headers.authorization',
        'config.apiToken',
        'config.apiKey',
        'config.botToken',
        'config.token',
      ],
      censor: REDACTED,
    },
  },
  config.NODE_ENV === 'development' ? undefined : pino.destination(2)
);

export const logger = baseLogger;

export type Logger = pino.Logger;

// Child logger per component; trace ids are added by the mixin
export function createLogger(component: string): Logger {
  return baseLogger.child({ component });
}
