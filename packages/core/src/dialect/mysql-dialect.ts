/**
 * MySQL Dialect Implementation
 *
 * Handles MySQL-specific binding rules:
 * - Backtick (`) identifier quoting
 * - Positional (?) parameter placeholders
 * - Booleans as TINYINT, dates as DATETIME text in local time
 */

import { SQLDialect, resolveMaxParameters } from './sql-dialect';

import type { DialectConfig, DialectOptions } from './sql-dialect';
import type { EncodedValue } from '../types';

const BIGINT_MIN = -(2n ** 63n);
const BIGINT_UNSIGNED_MAX = 2n ** 64n - 1n;

export function formatMySQLDateTime(date: Date): string {
  const pad = (num: number): string => String(num).padStart(2, '0');

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class MySQLDialect extends SQLDialect {
  readonly name = 'mysql';

  readonly config: DialectConfig;

  constructor(options: DialectOptions = {}) {
    super();
    this.config = {
      identifierQuote: '`',
      placeholderStyle: 'positional',
      maxParameters: resolveMaxParameters(options, 65_535),
    };
  }

  protected override encodeBoolean(value: boolean): EncodedValue {
    return value ? 1 : 0;
  }

  /**
   * Signed BIGINT through BIGINT UNSIGNED, sent as text
   */
  protected encodeBigInt(value: bigint): EncodedValue {
    if (value < BIGINT_MIN || value > BIGINT_UNSIGNED_MAX) {
      throw this.encodeError(`${value} does not fit in a 64-bit integer column`, value);
    }
    return value.toString();
  }

  protected encodeDate(value: Date): EncodedValue {
    return formatMySQLDateTime(value);
  }
}
