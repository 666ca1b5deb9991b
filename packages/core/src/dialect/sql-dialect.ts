/**
 * SQL Dialect Base Class
 *
 * A dialect is the strategy a builder is created with: it encodes bind values
 * into what the driver expects, formats placeholders and enforces the
 * engine's bind parameter limit. Builders never switch dialects.
 */

import { ArgumentBuffer } from '../arguments/argument-buffer';
import { EncodeError, ParameterLimitError, ValidationError, describeValue } from '../errors';

import type { BindObject, BindValue, EncodedValue, PlaceholderStyle } from '../types';

export interface DialectConfig {
  /** Character used to escape identifiers (e.g., ` for MySQL, " for PostgreSQL) */
  identifierQuote: string;
  /** Positional (?) or numbered ($1, $2) placeholders */
  placeholderStyle: PlaceholderStyle;
  /** Largest number of bind parameters a single query may carry */
  maxParameters: number;
}

export interface DialectOptions {
  /** Override the engine default, e.g. a SQLite build with a custom SQLITE_LIMIT_VARIABLE_NUMBER */
  maxParameters?: number;
}

export function resolveMaxParameters(options: DialectOptions, fallback: number): number {
  const { maxParameters = fallback } = options;
  if (!Number.isInteger(maxParameters) || maxParameters < 1) {
    throw new ValidationError('maxParameters must be a positive integer', 'maxParameters');
  }
  return maxParameters;
}

function isBindArray(value: BindValue): value is readonly BindValue[] {
  return Array.isArray(value);
}

export abstract class SQLDialect {
  abstract readonly name: string;
  abstract readonly config: DialectConfig;

  /**
   * Encode a bind value for this engine. Throws `EncodeError` for values the
   * engine has no representation for.
   */
  encode(value: BindValue): EncodedValue {
    if (value === null || value === undefined) {
      return null;
    }

    if (typeof value === 'string') {
      return this.encodeString(value);
    }

    if (typeof value === 'number') {
      return this.encodeNumber(value);
    }

    if (typeof value === 'bigint') {
      return this.encodeBigInt(value);
    }

    if (typeof value === 'boolean') {
      return this.encodeBoolean(value);
    }

    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) {
        throw this.encodeError('Invalid Date cannot be bound', value);
      }
      return this.encodeDate(value);
    }

    if (value instanceof Uint8Array) {
      return Buffer.isBuffer(value) ? value : Buffer.from(value);
    }

    if (isBindArray(value)) {
      return this.encodeArray(value);
    }

    return this.encodeJson(value);
  }

  /**
   * Placeholder for the argument at 1-based `index`
   * MySQL, SQLite: ?
   * PostgreSQL: $1, $2, $3...
   */
  formatPlaceholder(index: number): string {
    return this.config.placeholderStyle === 'numbered' ? `$${index}` : '?';
  }

  /**
   * Escape an identifier (table name, column name)
   */
  escapeIdentifier(identifier: string): string {
    const quote = this.config.identifierQuote;
    return identifier
      .split('.')
      .map((part) => `${quote}${part.replaceAll(quote, quote + quote)}${quote}`)
      .join('.');
  }

  /**
   * Empty argument buffer for this dialect, optionally pre-filled.
   */
  createArguments(values: Iterable<BindValue> = []): ArgumentBuffer {
    const args = new ArgumentBuffer(this);
    for (const value of values) {
      args.add(value);
    }
    return args;
  }

  assertParameterCount(count: number): void {
    if (count > this.config.maxParameters) {
      throw new ParameterLimitError(this.config.maxParameters, count, this.name);
    }
  }

  protected encodeString(value: string): EncodedValue {
    return value;
  }

  protected encodeNumber(value: number): EncodedValue {
    if (!Number.isFinite(value)) {
      throw this.encodeError(`${this.name} cannot bind non-finite number ${value}`, value);
    }
    return value;
  }

  protected encodeBoolean(value: boolean): EncodedValue {
    return value;
  }

  protected encodeArray(value: readonly BindValue[]): EncodedValue {
    throw this.encodeError(`${this.name} has no array type, bind each element separately`, value);
  }

  /**
   * Objects are sent as JSON text
   */
  protected encodeJson(value: BindObject): EncodedValue {
    let json: string;
    try {
      json = JSON.stringify(value);
    } catch (error) {
      throw this.encodeError(
        'Object cannot be serialized as JSON',
        value,
        error instanceof Error ? error : undefined,
      );
    }
    if (typeof json !== 'string') {
      throw this.encodeError('Object serialized to nothing', value);
    }
    return json;
  }

  protected encodeError(message: string, value: unknown, cause?: Error): EncodeError {
    return new EncodeError(message, this.name, describeValue(value), cause);
  }

  protected abstract encodeBigInt(value: bigint): EncodedValue;

  protected abstract encodeDate(value: Date): EncodedValue;
}
