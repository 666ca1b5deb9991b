/**
 * Fragment composition helpers.
 *
 * A fragment is a builder whose text and arguments are folded into another
 * builder. Its own placeholders were numbered from 1; once its arguments are
 * appended after the target's, every placeholder it emitted through
 * `pushBind` is rewritten for the argument's new position. Placeholders
 * written by hand with `push()` are not tracked and stay as they are.
 */

import type { ArgumentBuffer } from '../arguments/argument-buffer';
import type { SQLDialect } from '../dialect/sql-dialect';
import type { PlaceholderMark } from '../types';

export interface FragmentParts {
  sql: string;
  args: ArgumentBuffer;
  placeholders: readonly PlaceholderMark[];
}

export interface RenumberedFragment {
  sql: string;
  placeholders: PlaceholderMark[];
}

/**
 * Rewrite a detached fragment's placeholders for a target whose text is
 * `textOffset` long and which already holds `argumentOffset` arguments.
 * Marks must be sorted by offset.
 */
export function renumberFragment(
  parts: Pick<FragmentParts, 'sql' | 'placeholders'>,
  textOffset: number,
  argumentOffset: number,
  dialect: SQLDialect,
): RenumberedFragment {
  const placeholders: PlaceholderMark[] = [];
  let sql = '';
  let cursor = 0;

  for (const mark of parts.placeholders) {
    const index = mark.index + argumentOffset;
    const token = dialect.formatPlaceholder(index + 1);

    sql += parts.sql.slice(cursor, mark.offset);
    placeholders.push({ offset: textOffset + sql.length, length: token.length, index });
    sql += token;
    cursor = mark.offset + mark.length;
  }

  sql += parts.sql.slice(cursor);
  return { sql, placeholders };
}
