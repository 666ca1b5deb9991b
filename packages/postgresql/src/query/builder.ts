import { createQueryBuilder } from '@sqlweave/core';

import type { CreateQueryBuilderOptions, QueryBuilder } from '@sqlweave/core';

/**
 * QueryBuilder writing `$1, $2, ...` placeholders.
 */
export function createPostgreSQLQueryBuilder(
  init = '',
  options: CreateQueryBuilderOptions = {},
): QueryBuilder {
  return createQueryBuilder('postgresql', init, options);
}
