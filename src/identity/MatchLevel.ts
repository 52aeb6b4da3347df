/**
 * Match levels returned by the identity matcher, weakest first.
 */

export const MATCH_LEVELS = [
  'ERROR',
  'NO_MATCH',
  'FIRST_CONFLICT_LAST_MATCH',
  'INITIALS_ONLY',
  'FIRST_OR_LAST_ONLY',
  'FIRST_INITIAL_LAST',
  'FIRST_LAST',
  'EXACT',
] as const;

export type MatchLevel = typeof MATCH_LEVELS[number];

/**
 * Ordinal strength of each level. EXACT (scalar equality) ranks with
 * FIRST_LAST (full person-name agreement).
 */
const STRENGTH: Record<MatchLevel, number> = {
  ERROR: 0,
  NO_MATCH: 1,
  FIRST_CONFLICT_LAST_MATCH: 2,
  INITIALS_ONLY: 3,
  FIRST_OR_LAST_ONLY: 4,
  FIRST_INITIAL_LAST: 5,
  FIRST_LAST: 6,
  EXACT: 6,
};

/**
 * Negative if `a` is weaker than `b`, zero if equally strong, positive otherwise.
 */
export function compareMatchLevels(a: MatchLevel, b: MatchLevel): number {
  return STRENGTH[a] - STRENGTH[b];
}

export function isAtLeast(level: MatchLevel, threshold: MatchLevel): boolean {
  return compareMatchLevels(level, threshold) >= 0;
}

/**
 * Whether the level signals any agreement at all.
 */
export function isMatch(level: MatchLevel): boolean {
  return isAtLeast(level, 'FIRST_CONFLICT_LAST_MATCH');
}
