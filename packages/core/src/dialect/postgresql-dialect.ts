/**
 * PostgreSQL Dialect Implementation
 *
 * - Double quote (") identifier quoting
 * - Numbered ($1, $2) parameter placeholders
 * - 65535 bind parameters per statement
 * - Arrays bound as PostgreSQL arrays
 */

import { SQLDialect, resolveMaxParameters } from './sql-dialect';

import type { DialectConfig, DialectOptions } from './sql-dialect';
import type { BindValue, EncodedValue } from '../types';

const INT8_MIN = -(2n ** 63n);
const INT8_MAX = 2n ** 63n - 1n;

export class PostgreSQLDialect extends SQLDialect {
  readonly name = 'postgresql';

  readonly config: DialectConfig;

  constructor(options: DialectOptions = {}) {
    super();
    this.config = {
      identifierQuote: '"',
      placeholderStyle: 'numbered',
      maxParameters: resolveMaxParameters(options, 65_535),
    };
  }

  /**
   * text columns cannot hold NUL
   */
  protected override encodeString(value: string): EncodedValue {
    if (value.includes('\u0000')) {
      throw this.encodeError('PostgreSQL text cannot contain NUL characters', value);
    }
    return value;
  }

  /**
   * float8 accepts NaN and the infinities in text form
   */
  protected override encodeNumber(value: number): EncodedValue {
    if (Number.isNaN(value)) {
      return 'NaN';
    }
    if (value === Number.POSITIVE_INFINITY) {
      return 'Infinity';
    }
    if (value === Number.NEGATIVE_INFINITY) {
      return '-Infinity';
    }
    return value;
  }

  protected encodeBigInt(value: bigint): EncodedValue {
    if (value < INT8_MIN || value > INT8_MAX) {
      throw this.encodeError(`${value} is out of range for int8`, value);
    }
    return value.toString();
  }

  protected encodeDate(value: Date): EncodedValue {
    return value.toISOString();
  }

  protected override encodeArray(value: readonly BindValue[]): EncodedValue {
    return value.map((element) => this.encode(element));
  }
}
