/**
 * Constants
 *
 * Centralized rendering constants. The generated SQL is line-oriented:
 * every clause keyword sits on its own line and every item below it is
 * indented so that golden outputs stay stable.
 */

// ============ Layout Defaults ============

export const RENDER_DEFAULTS = {
  /** Indentation of the first item under a clause keyword */
  INDENT: ' '.repeat(10),
  /** Prefix of every following item in a comma separated list */
  CONTINUATION: `${' '.repeat(9)},`,
  /** Prefix of every following predicate in a WHERE or HAVING block */
  AND_PREFIX: `${' '.repeat(6)}AND `,
  /** Separator placed between rendered lines */
  LINE_SEPARATOR: '\n',
} as const;

// ============ Logging ============

export const LOG_PREFIX = '[metaquery]';

// ============ Features ============

/** Feature names reported by UnsupportedConstructError */
export const FEATURES = {
  OUTER_JOIN: 'outer-join',
  OUTER_JOIN_CONDITION: 'outer-join-condition',
  ALIASED_SELECTION: 'aliased-selection',
  COMMA_FROM: 'comma-from',
} as const;

export type Feature = (typeof FEATURES)[keyof typeof FEATURES];
