/**
 * SQL Dialect Abstraction Layer
 *
 * Placeholder syntax, bind value encoding and parameter limits per engine.
 *
 * @module dialect
 */

export {
  SQLDialect,
  resolveMaxParameters,
  type DialectConfig,
  type DialectOptions,
} from './sql-dialect';
export { MySQLDialect, formatMySQLDateTime } from './mysql-dialect';
export { PostgreSQLDialect } from './postgresql-dialect';
export { SQLiteDialect } from './sqlite-dialect';
export { DialectFactory, type DialectDatabaseType } from './dialect-factory';
