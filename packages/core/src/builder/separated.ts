import { BuilderStateError } from '../errors';
import { display } from '../utils/display';

import type { QueryBuilder } from './query-builder';
import type { BindValue, Displayable } from '../types';

/**
 * A comma (or other token) separated list being written into a QueryBuilder.
 *
 * The separator goes before every `push()` / `pushBind()` except the first
 * on this list. One list element can span several calls: follow the first
 * call with `pushUnseparated()` / `pushBindUnseparated()`.
 *
 * Use a list only while building the clause it was created for. Once its
 * builder is reset or built, the list throws `BuilderStateError`.
 */
export class Separated {
  private readonly separator: string;
  private readonly revision: number;
  private pushSeparator = false;

  constructor(
    private readonly builder: QueryBuilder,
    separator: Displayable,
  ) {
    this.separator = display(separator);
    this.revision = builder.revision;
  }

  /**
   * Push the separator if applicable, then `sql`.
   */
  push(sql: Displayable): this {
    this.assertCurrent();
    const text = display(sql);
    this.builder.push(this.pushSeparator ? `${this.separator}${text}` : text);
    this.pushSeparator = true;
    return this;
  }

  pushUnseparated(sql: Displayable): this {
    this.assertCurrent();
    this.builder.push(sql);
    return this;
  }

  /**
   * Push the separator if applicable, then bind `value`.
   */
  pushBind(value: BindValue): this {
    this.assertCurrent();
    this.builder.appendBind(this.pushSeparator ? this.separator : '', value);
    this.pushSeparator = true;
    return this;
  }

  pushBindUnseparated(value: BindValue): this {
    this.assertCurrent();
    this.builder.pushBind(value);
    return this;
  }

  private assertCurrent(): void {
    if (this.builder.revision !== this.revision) {
      throw new BuilderStateError('Separated list used after its QueryBuilder was reset or built');
    }
  }
}
