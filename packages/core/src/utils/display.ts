import { FormatError } from '../errors';

import type { Displayable } from '../types';

/**
 * Text of a SQL fragment as it will be written into the query.
 */
export function display(sql: Displayable): string {
  if (typeof sql === 'string') {
    return sql;
  }
  try {
    return String(sql);
  } catch (error) {
    throw new FormatError(
      'Error formatting SQL fragment',
      error instanceof Error ? error : undefined,
    );
  }
}
