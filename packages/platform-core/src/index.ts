/**
 * Platform Core - shared plumbing for songharvest services
 *
 * - Structured logging with correlation tracking
 * - Domain error taxonomy and express error middleware
 * - Recurring task scheduling and graceful shutdown
 * - PostgreSQL connection management
 */

export * from './logging/index.js';
export * from './error-handling/index.js';
export * from './http/index.js';
export * from './scheduling/index.js';
export * from './lifecycle/index.js';
export * from './database/index.js';
