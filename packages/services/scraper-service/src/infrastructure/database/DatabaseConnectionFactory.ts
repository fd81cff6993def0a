/**
 * Scraper Service Database Connection Factory
 *
 * Uses the DatabaseConnectionFactory from platform-core with the
 * scraper-service schema.
 */

import { createDatabaseConnectionFactory, type DatabaseConnectionFactory } from '@songharvest/platform-core';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from '../../schema/scraper-schema';
import { SERVICE_NAME } from '../../config/service-config';

export type DatabaseSchema = typeof schema;
export type DatabaseConnection = NodePgDatabase<DatabaseSchema>;

export function createScraperDatabase(connectionString?: string): DatabaseConnectionFactory<DatabaseSchema> {
  return createDatabaseConnectionFactory({
    serviceName: SERVICE_NAME,
    schema,
    connectionString,
  });
}
