import { renumberFragment } from './fragment';
import { Separated } from './separated';
import { BuilderStateError, DialectMismatchError, ValidationError } from '../errors';
import { display } from '../utils/display';
import { formatParams, truncateSql } from '../utils/logging';

import type { FragmentParts } from './fragment';
import type { ArgumentBuffer } from '../arguments/argument-buffer';
import type { SQLDialect } from '../dialect/sql-dialect';
import type {
  BindValue,
  BuiltQuery,
  Displayable,
  Logger,
  PlaceholderMark,
} from '../types';

export interface QueryBuilderOptions {
  logger?: Logger;
  /** Include bound values in the debug line written by `build()` */
  logParams?: boolean;
}

/**
 * Writes one row of a `pushValues()` / `pushTuples()` list.
 */
export type PushRow<T> = (list: Separated, row: T, index: number) => void;

/** Share of the dialect's parameter limit at which a warning is logged */
const LIMIT_WARNING_RATIO = 0.9;

/**
 * Builds parameterized SQL at runtime.
 *
 * Text is appended verbatim with `push()`; values go through `pushBind()`,
 * which records the value and writes the dialect's placeholder. `build()`
 * hands out the text and arguments once, after which the builder only
 * accepts `reset()` and `sql()`.
 *
 * @example
 * ```typescript
 * const qb = new QueryBuilder(new PostgreSQLDialect(), 'SELECT * FROM users WHERE id IN (');
 * const ids = qb.separated(', ');
 * for (const id of [1, 2, 3]) {
 *   ids.pushBind(id);
 * }
 * ids.pushUnseparated(')');
 *
 * const { sql, args } = qb.build();
 * // sql: SELECT * FROM users WHERE id IN ($1, $2, $3)
 * // args: [1, 2, 3]
 * ```
 */
export class QueryBuilder {
  readonly dialect: SQLDialect;

  private query: string;
  private readonly initialLength: number;
  private args: ArgumentBuffer | undefined;
  private placeholders: PlaceholderMark[] = [];
  private revisionCounter = 0;
  private limitWarned = false;
  private readonly logger?: Logger;
  private readonly logParams: boolean;

  /**
   * Start building a query with an initial SQL fragment, which may be empty.
   */
  constructor(dialect: SQLDialect, init = '', options: QueryBuilderOptions = {}) {
    this.dialect = dialect;
    this.query = init;
    this.initialLength = init.length;
    this.args = QueryBuilder.adopt(dialect.createArguments());
    this.logger = options.logger;
    this.logParams = options.logParams ?? false;
  }

  /**
   * Start from existing SQL and arguments. The builder takes ownership of
   * `args`. Nothing checks that `args` matches the placeholders in `init`.
   * @throws BuilderStateError if another builder already holds `args`
   */
  static withArguments(
    init: string,
    args: ArgumentBuffer,
    options: QueryBuilderOptions = {},
  ): QueryBuilder {
    QueryBuilder.adopt(args);
    const builder = new QueryBuilder(args.dialect, init, options);
    builder.args = args;
    return builder;
  }

  /**
   * Append SQL verbatim.
   *
   * Never pass untrusted input here: nothing is escaped. Bind it with
   * `pushBind()` instead.
   */
  push(sql: Displayable): this {
    this.sanityCheck();
    this.query += display(sql);
    return this;
  }

  /**
   * Bind a value and append its placeholder (`?`, or `$N` for PostgreSQL).
   * @throws EncodeError if the dialect cannot encode the value; the builder is left unchanged
   * @throws ParameterLimitError past the dialect's bind parameter limit
   */
  pushBind(value: BindValue): this {
    this.appendBind('', value);
    return this;
  }

  /**
   * Fold a fully built sub-query into this one: its text once, then its
   * arguments in order. Placeholders the fragment wrote through `pushBind()`
   * are renumbered to follow this builder's arguments. The fragment is
   * consumed.
   */
  pushFragment(fragment: QueryBuilder): this {
    const args = this.sanityCheck();

    if (fragment === this) {
      throw new BuilderStateError('A QueryBuilder cannot be merged into itself');
    }
    if (fragment.dialect.name !== this.dialect.name) {
      throw new DialectMismatchError(this.dialect.name, fragment.dialect.name);
    }
    if (!fragment.args) {
      throw new BuilderStateError('Fragment was already built or merged');
    }
    if (fragment.args === args) {
      throw new BuilderStateError('Fragment shares its arguments with this QueryBuilder');
    }
    this.dialect.assertParameterCount(args.length + fragment.args.length);

    const parts = fragment.detach();
    const renumbered = renumberFragment(parts, this.query.length, args.length, this.dialect);

    args.extend(parts.args);
    this.query += renumbered.sql;
    this.placeholders.push(...renumbered.placeholders);

    this.logger?.debug('Fragment merged', { arguments: parts.args.length });
    this.checkParameterLimit(args);
    return this;
  }

  /**
   * Start a list separated by `separator`.
   *
   * ```typescript
   * const list = qb.separated(', ');
   * for (const name of names) {
   *   list.pushBind(name);
   * }
   * list.pushUnseparated(')');
   * ```
   *
   * An empty list leaves nothing between the surrounding tokens, which is
   * usually invalid SQL.
   */
  separated(separator: Displayable): Separated {
    this.sanityCheck();
    return new Separated(this, separator);
  }

  /**
   * Append a `VALUES` list for a bulk insert, one parenthesized row per item.
   *
   * ```typescript
   * qb.push('INSERT INTO users (name, email) ');
   * qb.pushValues(users, (row, user) => {
   *   row.pushBind(user.name).pushBind(user.email);
   * });
   * // INSERT INTO users (name, email) VALUES ($1, $2), ($3, $4)
   * ```
   *
   * If `pushRow` throws, everything this call appended is removed again.
   * Fragments merged by `pushRow` before it threw stay consumed.
   */
  pushValues<T>(rows: Iterable<T>, pushRow: PushRow<T>): this {
    const items = this.collectRows(rows, 'pushValues');

    this.atomically(() => {
      this.push('VALUES ');
      const list = this.separated(', ');
      items.forEach((row, index) => {
        list.push('(');
        pushRow(this.separated(', '), row, index);
        list.pushUnseparated(')');
      });
    });
    return this;
  }

  /**
   * Append a parenthesized list of tuples, e.g. for `(a, b) IN ((...), (...))`.
   *
   * Writes ` ((...), (...)) ` with surrounding spaces.
   */
  pushTuples<T>(rows: Iterable<T>, pushRow: PushRow<T>): this {
    const items = this.collectRows(rows, 'pushTuples');

    this.atomically(() => {
      this.push(' (');
      const list = this.separated(', ');
      items.forEach((row, index) => {
        list.push('(');
        pushRow(this.separated(', '), row, index);
        list.pushUnseparated(')');
      });
      list.pushUnseparated(') ');
    });
    return this;
  }

  /**
   * Back to the initial fragment with no arguments. Valid after `build()`.
   */
  reset(): this {
    this.query = this.query.slice(0, this.initialLength);
    this.args = QueryBuilder.adopt(this.dialect.createArguments());
    this.placeholders = [];
    this.revisionCounter++;
    this.limitWarned = false;
    return this;
  }

  /**
   * Current SQL; may not be syntactically complete.
   */
  sql(): string {
    return this.query;
  }

  /**
   * Hand out the SQL and its arguments. The builder must be `reset()`
   * before it is used again.
   */
  build(): BuiltQuery {
    const args = this.finalize();
    const built: BuiltQuery = {
      sql: this.query,
      args: args.toArray(),
      dialect: this.dialect.name,
    };

    this.logger?.debug('Query built', {
      dialect: built.dialect,
      sql: truncateSql(built.sql),
      arguments: built.args.length,
      ...(this.logParams ? { params: formatParams(built.args) } : {}),
    });
    return built;
  }

  /**
   * Hand out the SQL alone; the arguments are dropped.
   */
  intoSql(): string {
    this.finalize();
    return this.query;
  }

  get argumentCount(): number {
    return this.args?.length ?? 0;
  }

  get isFinalized(): boolean {
    return this.args === undefined;
  }

  /**
   * Bumped by `reset()`, `build()` and `intoSql()`; lists started before
   * that refuse further pushes.
   * @internal
   */
  get revision(): number {
    return this.revisionCounter;
  }

  /**
   * Bind `value`, then write `prefix` and the placeholder. Nothing is
   * written when binding fails.
   * @internal
   */
  appendBind(prefix: string, value: BindValue): void {
    const args = this.sanityCheck();
    args.add(value);
    const token = args.formatPlaceholder();

    this.query += prefix;
    this.placeholders.push({ offset: this.query.length, length: token.length, index: args.length - 1 });
    this.query += token;
    this.checkParameterLimit(args);
  }

  private static adopt(args: ArgumentBuffer): ArgumentBuffer {
    args.claim();
    return args;
  }

  private sanityCheck(): ArgumentBuffer {
    if (!this.args) {
      throw new BuilderStateError('QueryBuilder must be reset before reuse after build()');
    }
    return this.args;
  }

  private finalize(): ArgumentBuffer {
    const args = this.sanityCheck();
    this.args = undefined;
    this.revisionCounter++;
    return args;
  }

  private detach(): FragmentParts {
    const parts: FragmentParts = {
      sql: this.query,
      args: this.finalize(),
      placeholders: this.placeholders,
    };
    this.placeholders = [];
    return parts;
  }

  private collectRows<T>(rows: Iterable<T>, method: string): T[] {
    this.sanityCheck();
    const items = Array.from(rows);
    if (items.length === 0) {
      throw new ValidationError(`${method}() needs at least one row`, 'rows');
    }
    return items;
  }

  /**
   * Run `fn`, restoring text, arguments, placeholders and the limit warning
   * if it throws. Fragments `fn` merged are not restored.
   */
  private atomically(fn: () => void): void {
    const args = this.sanityCheck();
    const textLength = this.query.length;
    const argumentCount = args.length;
    const placeholderCount = this.placeholders.length;
    const limitWarned = this.limitWarned;

    try {
      fn();
    } catch (error) {
      if (this.args === args) {
        this.query = this.query.slice(0, textLength);
        args.truncate(argumentCount);
        this.placeholders.length = placeholderCount;
        this.limitWarned = limitWarned;
      }
      throw error;
    }
  }

  private checkParameterLimit(args: ArgumentBuffer): void {
    const limit = this.dialect.config.maxParameters;
    if (this.limitWarned || args.length < Math.ceil(limit * LIMIT_WARNING_RATIO)) {
      return;
    }
    this.limitWarned = true;
    this.logger?.warn('Approaching bind parameter limit', {
      dialect: this.dialect.name,
      count: args.length,
      limit,
    });
  }
}
