export { createPostgreSQLQueryBuilder } from './query/builder';
export { toQueryConfig, type ToQueryConfigOptions } from './query/query-config';

// Re-export core types
export type {
  BindValue,
  BuiltQuery,
  EncodedValue,
  CreateQueryBuilderOptions,
  QueryBuilder,
} from '@sqlweave/core';
export { PostgreSQLDialect } from '@sqlweave/core';
