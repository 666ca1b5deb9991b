export { QueryBuilder, type QueryBuilderOptions, type PushRow } from './query-builder';
export { Separated } from './separated';
export { renumberFragment, type FragmentParts, type RenumberedFragment } from './fragment';
export { createQueryBuilder, type CreateQueryBuilderOptions } from './factory';
