import type { Logger } from '../types';

/**
 * Console logger, opt-in through the `logger` builder option
 */
/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`[sqlweave] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[sqlweave] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[sqlweave] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[sqlweave] ${msg}`, ...args),
};
/* eslint-enable no-console */

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength = 200): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}

/**
 * Format parameters for logging
 */
export function formatParams(params: readonly unknown[], maxLength = 100): string {
  const str = JSON.stringify(params, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
  if (str.length <= maxLength) {
    return str;
  }
  return `${str.slice(0, maxLength)}...`;
}
