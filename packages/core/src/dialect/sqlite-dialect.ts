/**
 * SQLite Dialect Implementation
 *
 * Positional (?) placeholders and a default limit of 32766 bind parameters
 * (SQLITE_LIMIT_VARIABLE_NUMBER since 3.32.0; builds before that allow 999,
 * pass `maxParameters` for those).
 */

import { SQLDialect, resolveMaxParameters } from './sql-dialect';

import type { DialectConfig, DialectOptions } from './sql-dialect';
import type { EncodedValue } from '../types';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export class SQLiteDialect extends SQLDialect {
  readonly name = 'sqlite';

  readonly config: DialectConfig;

  constructor(options: DialectOptions = {}) {
    super();
    this.config = {
      identifierQuote: '"',
      placeholderStyle: 'positional',
      maxParameters: resolveMaxParameters(options, 32_766),
    };
  }

  protected override encodeBoolean(value: boolean): EncodedValue {
    return value ? 1 : 0;
  }

  protected encodeBigInt(value: bigint): EncodedValue {
    if (value < INT64_MIN || value > INT64_MAX) {
      throw this.encodeError(`${value} is out of range for a SQLite INTEGER`, value);
    }
    return value;
  }

  protected encodeDate(value: Date): EncodedValue {
    return value.toISOString();
  }
}
