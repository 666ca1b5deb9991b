/**
 * sqlweave - All-in-one package
 *
 * Includes the core builder and both driver hand-offs:
 *
 * ```bash
 * npm install sqlweave
 * ```
 *
 * Or install individual packages:
 *
 * ```bash
 * npm install @sqlweave/core @sqlweave/mysql
 * npm install @sqlweave/core @sqlweave/postgresql
 * ```
 */

// Re-export everything from core
export * from '@sqlweave/core';

export { createMySQLQueryBuilder, interpolate, toQueryOptions } from '@sqlweave/mysql';
export type { ToQueryOptionsOptions } from '@sqlweave/mysql';

export { createPostgreSQLQueryBuilder, toQueryConfig } from '@sqlweave/postgresql';
export type { ToQueryConfigOptions } from '@sqlweave/postgresql';
