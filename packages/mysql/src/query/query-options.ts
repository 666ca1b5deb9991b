import { DialectMismatchError } from '@sqlweave/core';
import { format } from 'mysql2';

import type { BuiltQuery } from '@sqlweave/core';
import type { QueryOptions } from 'mysql2';

export interface ToQueryOptionsOptions {
  /** Query timeout in milliseconds */
  timeout?: number;
}

function assertMySQL(query: BuiltQuery): void {
  if (query.dialect !== 'mysql') {
    throw new DialectMismatchError('mysql', query.dialect);
  }
}

/**
 * Turn a built query into the options object `mysql2` connections and pools
 * accept for `query()` and `execute()`.
 *
 * @example
 * ```typescript
 * const qb = createMySQLQueryBuilder('SELECT * FROM users WHERE id = ');
 * qb.pushBind(42);
 * const [rows] = await pool.execute(toQueryOptions(qb.build()));
 * ```
 */
export function toQueryOptions(query: BuiltQuery, options: ToQueryOptionsOptions = {}): QueryOptions {
  assertMySQL(query);

  const queryOptions: QueryOptions = {
    sql: query.sql,
    values: [...query.args],
  };
  if (options.timeout !== undefined) {
    queryOptions.timeout = options.timeout;
  }
  return queryOptions;
}

/**
 * Inline the arguments as escaped literals, for logs and debugging.
 * Send the placeholders and values separately when executing.
 */
export function interpolate(query: BuiltQuery): string {
  assertMySQL(query);
  return format(query.sql, [...query.args]);
}
