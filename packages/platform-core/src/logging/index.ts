/**
 * Logging Module - Index
 */

export type { Logger, LogContext, LoggerMeta } from './types.js';
export { createLogger, getLogger } from './logger.js';
export { maskSecrets, maskCredentialsInString, safeStringify, createDevFormat, createProdFormat } from './formatting.js';
export { correlationStorage, getCorrelationContext, runWithContext, generateCorrelationId } from './correlation.js';
export { serializeError } from './error-serializer.js';
export type { SerializedError } from './error-serializer.js';
