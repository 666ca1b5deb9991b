import { DialectMismatchError } from '@sqlweave/core';

import type { BuiltQuery, EncodedValue } from '@sqlweave/core';
import type { QueryConfig } from 'pg';

export interface ToQueryConfigOptions {
  /** Prepared statement name; pg prepares the text once per connection under it */
  name?: string;
}

/**
 * Turn a built query into the config object `pg` clients accept.
 *
 * @example
 * ```typescript
 * const qb = createPostgreSQLQueryBuilder('SELECT * FROM users WHERE id = ');
 * qb.pushBind(42);
 * const result = await client.query(toQueryConfig(qb.build()));
 * ```
 */
export function toQueryConfig(
  query: BuiltQuery,
  options: ToQueryConfigOptions = {},
): QueryConfig<EncodedValue[]> {
  if (query.dialect !== 'postgresql') {
    throw new DialectMismatchError('postgresql', query.dialect);
  }

  const config: QueryConfig<EncodedValue[]> = {
    text: query.sql,
    values: [...query.args],
  };
  if (options.name !== undefined) {
    config.name = options.name;
  }
  return config;
}
