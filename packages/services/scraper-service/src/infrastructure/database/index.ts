export { createScraperDatabase, type DatabaseConnection, type DatabaseSchema } from './DatabaseConnectionFactory';
