/**
 * Property name rules.
 */

import { createLogger } from '../logging/logger.js';
import { PropertyConstructionError } from './errors.js';

const log = createLogger('names');

const LEADING_LETTER = /^[A-Za-z]/;

/**
 * Bring a name into property style.
 *
 * Surrounding whitespace is trimmed, every inner blank is removed and the
 * character after it upper-cased (`"foo bar"` becomes `"fooBar"`), and a
 * name that does not start with an ASCII letter gets the prefix `P_`.
 */
export function checkNameStyle(name: string): string {
  let result = name.trim();

  let blank = result.indexOf(' ');
  while (blank !== -1) {
    result = result.slice(0, blank) + result.charAt(blank + 1).toUpperCase() + result.slice(blank + 2);
    log.warn(`Invalid property name '${name}': generating camelCase by removing blanks`);
    blank = result.indexOf(' ');
  }

  if (!LEADING_LETTER.test(result)) {
    result = `P_${result}`;
    log.warn(`Invalid property name '${name}': 'P_' added as no leading letter found`);
  }

  return result;
}

/**
 * Reason a name cannot be used at all, or null if it can.
 */
export function invalidNameReason(name: string): string | null {
  if (name.trim() === '') {
    return 'Property name must not be empty';
  }
  if (name.includes('/')) {
    return `Property name '${name}' must not be like a path`;
  }
  return null;
}

/**
 * @throws PropertyConstructionError for empty or path-like names
 */
export function assertValidName(name: string): void {
  const reason = invalidNameReason(name);
  if (reason !== null) {
    throw new PropertyConstructionError(reason, name);
  }
}
