export { createMySQLQueryBuilder } from './query/builder';
export {
  interpolate,
  toQueryOptions,
  type ToQueryOptionsOptions,
} from './query/query-options';

// Re-export core types
export type {
  BindValue,
  BuiltQuery,
  EncodedValue,
  CreateQueryBuilderOptions,
  QueryBuilder,
} from '@sqlweave/core';
export { MySQLDialect } from '@sqlweave/core';
