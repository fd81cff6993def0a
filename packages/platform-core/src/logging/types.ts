/**
 * Logging Types
 */

export type { Logger } from 'winston';

export interface LogContext {
  correlationId?: string;
  jobId?: string;
  userId?: string;
  [key: string]: unknown;
}

export interface LoggerMeta {
  service: string;
  env: string;
  version?: string;
  instanceId?: string;
}
