/**
 * Types for the property merge engine.
 */

/**
 * Conflict policies, in the order they are usually offered to users.
 */
export const MERGE_POLICIES = [
  'THIS_OVERRIDES_OTHER',
  'OTHER_OVERRIDES_THIS',
  'COMBINE',
] as const;

/**
 * How conflicting information is resolved when two properties are merged.
 *
 * - THIS_OVERRIDES_OTHER: local information wins; the other side only fills gaps
 * - OTHER_OVERRIDES_THIS: non-empty information from the other side wins
 * - COMBINE: both sides are kept; unmatched values are appended and
 *   value definitions are concatenated
 */
export type MergePolicy = typeof MERGE_POLICIES[number];

export function isMergePolicy(value: unknown): value is MergePolicy {
  return typeof value === 'string' && (MERGE_POLICIES as readonly string[]).includes(value);
}

/**
 * Precondition that blocked a merge. 'value' means an incoming value could
 * not be placed in the target.
 */
export type MergeConflict =
  | 'name'
  | 'type'
  | 'mapping'
  | 'definition'
  | 'unit'
  | 'value';

/**
 * Outcome of a merge call. A failed merge leaves both properties untouched.
 */
export type MergeResult =
  | { ok: true; appended: number; replaced: number; reconciled: number }
  | { ok: false; conflict: MergeConflict; message: string };

export type MergeFailure = Extract<MergeResult, { ok: false }>;
