/**
 * Log Formatting
 *
 * Log formatters and secret redaction
 */

import * as winston from 'winston';
import type { LogContext } from './types.js';

const SECRET_PATTERNS = [/authorization/i, /set-cookie/i, /api[-_]?key/i, /token/i, /secret/i, /password/i, /bearer/i];

// connection strings carry credentials inline
const CREDENTIAL_URL = /\b([a-z][a-z0-9+.-]*:\/\/)([^:/@\s]+):([^@/\s]+)@/gi;

export function maskCredentialsInString(value: string): string {
  return value.replace(CREDENTIAL_URL, '$1$2:***@');
}

/**
 * Redacts secret-looking keys and inline URL credentials
 */
export function maskSecrets(obj: unknown, maxDepth = 4): unknown {
  if (typeof obj === 'string') {
    return maskCredentialsInString(obj);
  }
  if (maxDepth <= 0 || obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => maskSecrets(item, maxDepth - 1));
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_PATTERNS.some(pattern => pattern.test(key))) {
      masked[key] = '[REDACTED]';
    } else {
      masked[key] = maskSecrets(value, maxDepth - 1);
    }
  }
  return masked;
}

export function safeStringify(obj: unknown, maxSize = 10000): string {
  try {
    const str = JSON.stringify(maskSecrets(obj));
    return str.length > maxSize ? str.substring(0, maxSize) + '...[TRUNCATED]' : str;
  } catch {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

interface ContextSource {
  getStore: () => LogContext | undefined;
}

export function createDevFormat(correlationStorage: ContextSource): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, correlationId, ...meta }) => {
      const context = correlationStorage.getStore();
      const finalCorrelationId = correlationId || context?.correlationId;

      const correlation = finalCorrelationId ? ` [${String(finalCorrelationId).slice(0, 24)}]` : '';
      const serviceInfo = service ? `[${String(service)}]` : '';
      const { env: _env, version: _version, instanceId: _instanceId, ...rest } = meta;
      const metaStr = Object.keys(rest).length > 0 ? ` ${safeStringify(rest, 1000)}` : '';

      return `${String(timestamp)} ${level}${serviceInfo}${correlation}: ${String(message)}${metaStr}`;
    })
  );
}

export function createProdFormat(correlationStorage: ContextSource): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => {
      const context = correlationStorage.getStore();
      if (context) {
        info.correlationId = info.correlationId || context.correlationId;
        info.jobId = info.jobId || context.jobId;
      }
      return safeStringify(info, 50000);
    })
  );
}
