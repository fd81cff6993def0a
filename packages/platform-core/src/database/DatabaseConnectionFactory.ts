/**
 * Database Connection Factory
 *
 * Owns one pg pool and its drizzle wrapper for a service. Created once at
 * startup and passed to repositories; the pool is closed during the
 * `connections` shutdown phase.
 *
 * @example
 * import * as schema from './schema/scraper-schema';
 *
 * const connections = createDatabaseConnectionFactory({ serviceName: 'scraper-service', schema });
 * const jobs = new DrizzleScrapeJobRepository(connections.getDatabase());
 */

import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { createLogger } from '../logging/logger.js';
import type { Logger } from '../logging/types.js';
import { serializeError } from '../logging/error-serializer.js';
import { registerPhasedShutdownHook } from '../lifecycle/gracefulShutdown.js';

export type SQLConnection = Pool;

export interface DatabaseConfig<TSchema extends Record<string, unknown>> {
  serviceName: string;
  schema: TSchema;
  connectionString?: string;
  envVarName?: string;
  poolMax?: number;
  statementTimeoutMs?: number;
}

export class DatabaseConnectionFactory<TSchema extends Record<string, unknown>> {
  private pool: SQLConnection | null = null;
  private db: NodePgDatabase<TSchema> | null = null;
  private readonly logger: Logger;

  constructor(private readonly config: DatabaseConfig<TSchema>) {
    this.logger = createLogger(`${config.serviceName}-database`);
  }

  private getConnectionString(): string {
    const envVarName = this.config.envVarName || 'DATABASE_URL';
    const connectionString = this.config.connectionString || process.env[envVarName];

    if (!connectionString) {
      this.logger.error('Database URL not configured', { serviceName: this.config.serviceName, envVarName });
      throw new Error(`${envVarName} environment variable is required for ${this.config.serviceName}`);
    }

    return this.appendConnectionParams(connectionString);
  }

  private appendConnectionParams(connStr: string): string {
    const statementTimeout = this.config.statementTimeoutMs ?? parseInt(process.env.STATEMENT_TIMEOUT_MS || '30000', 10);
    if (connStr.includes('statement_timeout=')) {
      return connStr;
    }
    return connStr + (connStr.includes('?') ? '&' : '?') + `statement_timeout=${statementTimeout}`;
  }

  private getSslConfig(connStr: string): false | { rejectUnauthorized: boolean } {
    if (process.env.DATABASE_SSL === 'false') {
      return false;
    }
    try {
      const url = new URL(connStr);
      if (url.hostname === 'localhost' || url.hostname === '127.0.0.1') {
        return false;
      }
      if (url.searchParams.get('sslmode') === 'disable') {
        return false;
      }
    } catch (error) {
      this.logger.warn('Could not parse database URL for SSL settings', { error: serializeError(error) });
    }
    return { rejectUnauthorized: false };
  }

  getSQLConnection(): SQLConnection {
    if (!this.pool) {
      const connStr = this.getConnectionString();
      this.pool = new Pool({
        connectionString: connStr,
        max: this.config.poolMax ?? (process.env.NODE_ENV === 'production' ? 20 : 5),
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 10000,
        ssl: this.getSslConfig(connStr),
      });
      this.pool.on('error', error => {
        this.logger.error('Idle database client error', { error: serializeError(error) });
      });
      this.logger.debug('SQL connection pool established', { serviceName: this.config.serviceName });
    }
    return this.pool;
  }

  getDatabase(): NodePgDatabase<TSchema> {
    if (!this.db) {
      this.db = drizzle(this.getSQLConnection(), { schema: this.config.schema });
      this.logger.debug('Drizzle database connection established');
    }
    return this.db;
  }

  async close(): Promise<void> {
    if (!this.pool) return;
    const pool = this.pool;
    this.pool = null;
    this.db = null;
    await pool.end();
    this.logger.info('Database connection pool closed', { serviceName: this.config.serviceName });
  }
}

export function createDatabaseConnectionFactory<TSchema extends Record<string, unknown>>(
  config: DatabaseConfig<TSchema>
): DatabaseConnectionFactory<TSchema> {
  const factory = new DatabaseConnectionFactory(config);
  registerPhasedShutdownHook('connections', () => factory.close(), `database:${config.serviceName}`);
  return factory;
}
