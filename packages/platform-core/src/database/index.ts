/**
 * Database Module
 */

export {
  createDatabaseConnectionFactory,
  DatabaseConnectionFactory,
  type DatabaseConfig,
  type SQLConnection,
} from './DatabaseConnectionFactory.js';
