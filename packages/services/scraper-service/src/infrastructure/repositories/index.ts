export { DrizzleScrapeJobRepository } from './DrizzleScrapeJobRepository';
export { DrizzleSessionRepository } from './DrizzleSessionRepository';
export { DrizzleCleanupLogRepository } from './DrizzleCleanupLogRepository';
