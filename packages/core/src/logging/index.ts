import { LOG_PREFIX } from '../constants';

import type { Logger } from '../types';

/**
 * Default console logger
 */
/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`${LOG_PREFIX} ${msg}`, ...args),
  info: (msg, ...args) => console.info(`${LOG_PREFIX} ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`${LOG_PREFIX} ${msg}`, ...args),
  error: (msg, ...args) => console.error(`${LOG_PREFIX} ${msg}`, ...args),
};
/* eslint-enable no-console */

const noop = (): void => {};

export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Shorten long SQL so log lines stay readable
 */
export function truncateSql(sql: string, maxLength = 200): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}
