/**
 * IdentityMatcher: scores whether two values denote the same thing.
 *
 * Scalars (text, int, float, date, time) either match exactly or not at all;
 * person names go through the heuristic in personName.ts.
 */

import type { Property } from '../odml/Property.js';
import { tryCoerceContent } from '../odml/valueTypes.js';
import type { RawContent } from '../odml/valueTypes.js';
import { createLogger } from '../logging/logger.js';
import type { MatchLevel } from './MatchLevel.js';
import { matchPersonNames } from './personName.js';

const log = createLogger('identity');

type ScalarMatchType = 'int' | 'float' | 'date' | 'time';

const SCALAR_TYPES: readonly string[] = ['int', 'float', 'date', 'time'] satisfies readonly ScalarMatchType[];

function isScalarMatchType(type: string): type is ScalarMatchType {
  return SCALAR_TYPES.includes(type);
}

function asText(content: RawContent): string {
  return content instanceof Date ? content.toISOString() : String(content);
}

function matchScalar(a: RawContent, b: RawContent, type: ScalarMatchType): MatchLevel {
  const left = tryCoerceContent(a, type);
  const right = tryCoerceContent(b, type);
  if (left === null || right === null) {
    log.error(`Cannot compare '${asText(a)}' and '${asText(b)}' as ${type}`);
    return 'ERROR';
  }
  return left.value === right.value ? 'EXACT' : 'NO_MATCH';
}

/**
 * Score two values interpreted under `type`.
 *
 * Missing input, an empty or unsupported type, or content that cannot be read
 * as the type yields ERROR. Never throws.
 */
export function matchIdentity(
  a: RawContent | null | undefined,
  b: RawContent | null | undefined,
  type: string | null | undefined
): MatchLevel {
  if (a === null || a === undefined || b === null || b === undefined || type === null || type === undefined) {
    log.debug('match returns error: an input or the type is missing');
    return 'ERROR';
  }
  const normalizedType = type.trim().toLowerCase();
  if (normalizedType === '') {
    log.debug('match returns error: type is empty');
    return 'ERROR';
  }

  if (normalizedType === 'person') {
    return matchPersonNames(asText(a), asText(b));
  }
  if (normalizedType === 'text' || normalizedType === 'string') {
    return asText(a).toLowerCase() === asText(b).toLowerCase() ? 'EXACT' : 'NO_MATCH';
  }
  if (isScalarMatchType(normalizedType)) {
    return matchScalar(a, b, normalizedType);
  }

  log.debug(`match returns error: type '${type}' is not supported`);
  return 'ERROR';
}

/**
 * Score the first values of two properties under the first property's type
 * (or the second's, if the first has none).
 */
export function matchProperties(a: Property, b: Property): MatchLevel {
  return matchIdentity(a.getValue(0), b.getValue(0), a.getType() ?? b.getType());
}
