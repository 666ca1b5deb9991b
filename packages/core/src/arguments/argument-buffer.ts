import { BuilderStateError, DialectMismatchError, ValidationError } from '../errors';

import type { SQLDialect } from '../dialect/sql-dialect';
import type { BindValue, EncodedValue } from '../types';

/**
 * Ordered, already-encoded bind values for one dialect.
 *
 * Every mutation validates first and appends last, so a failed call leaves
 * the buffer as it was.
 */
export class ArgumentBuffer {
  private readonly values: EncodedValue[] = [];
  private owned = false;

  constructor(public readonly dialect: SQLDialect) {}

  get length(): number {
    return this.values.length;
  }

  /**
   * Whether a QueryBuilder has taken this buffer.
   */
  get isOwned(): boolean {
    return this.owned;
  }

  /**
   * Mark the buffer as held by one QueryBuilder. A buffer is owned for the
   * rest of its life, even after the builder hands its values out.
   * @internal
   */
  claim(): void {
    if (this.owned) {
      throw new BuilderStateError('ArgumentBuffer already belongs to a QueryBuilder');
    }
    this.owned = true;
  }

  /**
   * Encode and append a value.
   * @throws EncodeError when the dialect cannot represent the value
   * @throws ParameterLimitError when the dialect's limit would be exceeded
   */
  add(value: BindValue): void {
    const encoded = this.dialect.encode(value);
    this.dialect.assertParameterCount(this.values.length + 1);
    this.values.push(encoded);
  }

  /**
   * Append the values of another buffer, in order.
   */
  extend(other: ArgumentBuffer): void {
    if (other.dialect.name !== this.dialect.name) {
      throw new DialectMismatchError(this.dialect.name, other.dialect.name);
    }
    this.dialect.assertParameterCount(this.values.length + other.length);
    this.reserve(other.length);

    // Copy first so extending a buffer with itself terminates
    for (const value of other.values.slice()) {
      this.values.push(value);
    }
  }

  /**
   * Capacity hint. Arrays grow on demand, so only the argument is checked.
   */
  reserve(additional: number): void {
    if (!Number.isInteger(additional) || additional < 0) {
      throw new ValidationError('reserve() takes a non-negative integer', 'additional');
    }
  }

  /**
   * Drop values past `length`.
   */
  truncate(length: number): void {
    if (!Number.isInteger(length) || length < 0) {
      throw new ValidationError('truncate() takes a non-negative integer', 'length');
    }
    this.values.length = Math.min(length, this.values.length);
  }

  /**
   * Placeholder token for the most recently added value: `?` or `$N`.
   */
  formatPlaceholder(): string {
    const count = this.values.length;
    if (count === 0) {
      throw new BuilderStateError('No bound value to format a placeholder for');
    }
    this.dialect.assertParameterCount(count);
    return this.dialect.formatPlaceholder(count);
  }

  toArray(): EncodedValue[] {
    return [...this.values];
  }
}
