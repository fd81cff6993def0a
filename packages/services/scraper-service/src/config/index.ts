export { loadScraperConfig, SERVICE_NAME } from './service-config';
export type { ScraperConfig } from './service-config';
export { getLogger } from './logger';
