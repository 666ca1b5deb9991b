/**
 * Plain object bound as a JSON document.
 */
export interface BindObject {
  readonly [key: string]: unknown;
}

/**
 * A value accepted by `pushBind`. Each dialect decides which of these it can
 * encode; the rest are rejected with an `EncodeError`.
 * @example
 * ```typescript
 * builder.pushBind(42);
 * builder.pushBind('alice');
 * builder.pushBind(new Date());
 * builder.pushBind({ tags: ['a', 'b'] });
 * ```
 */
export type BindValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array
  | null
  | undefined
  | readonly BindValue[]
  | BindObject;

/**
 * A bind value after dialect encoding, ready to hand to a driver.
 */
export type EncodedValue = string | number | bigint | boolean | Buffer | null | EncodedValue[];

/**
 * Anything that can be written into SQL text verbatim.
 */
export type Displayable = string | number | bigint | boolean | { toString(): string };

export type PlaceholderStyle = 'positional' | 'numbered';

/**
 * A placeholder emitted by `pushBind`, tracked so fragment merge can renumber it.
 */
export interface PlaceholderMark {
  /** Position of the token in the builder's text */
  offset: number;
  /** Token length */
  length: number;
  /** 0-based index of the argument the token refers to */
  index: number;
}

/**
 * Finished query, produced once by `QueryBuilder.build()`.
 */
export interface BuiltQuery {
  sql: string;
  args: EncodedValue[];
  dialect: string;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
