import { QueryBuilder } from './query-builder';
import { DialectFactory } from '../dialect/dialect-factory';

import type { QueryBuilderOptions } from './query-builder';
import type { DialectDatabaseType } from '../dialect/dialect-factory';
import type { DialectOptions } from '../dialect/sql-dialect';

export interface CreateQueryBuilderOptions extends QueryBuilderOptions, DialectOptions {}

/**
 * Builder for a database type, e.g. `createQueryBuilder('postgres', 'SELECT ')`.
 * Custom dialect options get a dedicated dialect instance; otherwise the
 * shared one is used.
 */
export function createQueryBuilder(
  type: DialectDatabaseType,
  init = '',
  options: CreateQueryBuilderOptions = {},
): QueryBuilder {
  const { maxParameters, ...builderOptions } = options;
  const dialect =
    maxParameters === undefined
      ? DialectFactory.getDialect(type)
      : DialectFactory.createDialect(type, { maxParameters });

  return new QueryBuilder(dialect, init, builderOptions);
}
