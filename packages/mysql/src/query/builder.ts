import { createQueryBuilder } from '@sqlweave/core';

import type { CreateQueryBuilderOptions, QueryBuilder } from '@sqlweave/core';

/**
 * QueryBuilder writing `?` placeholders.
 */
export function createMySQLQueryBuilder(
  init = '',
  options: CreateQueryBuilderOptions = {},
): QueryBuilder {
  return createQueryBuilder('mysql', init, options);
}
