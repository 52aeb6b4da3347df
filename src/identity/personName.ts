/**
 * Person-name decomposition and scoring.
 *
 * Recognised forms: "Last, First", "F.Last", "First Last", "F. Last" and a
 * single token, which is read as a last name.
 */

import type { MatchLevel } from './MatchLevel.js';

export interface PersonName {
  /** First name or initial without dot; empty when none was given */
  first: string;
  last: string;
}

function cutAt(text: string, separator: string): string {
  const index = text.indexOf(separator);
  return index === -1 ? text : text.slice(0, index);
}

export function getLastName(fullName: string): string {
  const name = fullName.trim();
  const hasDot = name.includes('.');
  const hasSpace = name.includes(' ');

  if (name.includes(',')) {
    return name.slice(0, name.indexOf(',')).trim();
  }
  if (hasDot && !hasSpace) {
    return name.slice(name.lastIndexOf('.') + 1);
  }
  if (!hasSpace) {
    return name;
  }
  return name.slice(name.lastIndexOf(' ') + 1);
}

export function getFirstName(fullName: string): string {
  const name = fullName.trim();
  const hasDot = name.includes('.');
  const hasSpace = name.includes(' ');

  if (name.includes(',')) {
    const rest = name.slice(name.indexOf(',') + 1).trim();
    return cutAt(cutAt(rest, ' '), '.');
  }
  if (hasDot && !hasSpace) {
    return cutAt(name, '.');
  }
  if (!hasDot && hasSpace) {
    return cutAt(name, ' ');
  }
  if (!hasSpace) {
    return '';
  }
  return cutAt(cutAt(cutAt(name, '.').trim(), ' '), '.');
}

export function splitPersonName(fullName: string): PersonName {
  return { first: getFirstName(fullName), last: getLastName(fullName) };
}

/**
 * Score two person names. Comparison ignores case; empty names are an error.
 */
export function matchPersonNames(name1: string, name2: string): MatchLevel {
  if (name1.trim() === '' || name2.trim() === '') {
    return 'ERROR';
  }

  const a = splitPersonName(name1.toLowerCase());
  const b = splitPersonName(name2.toLowerCase());

  if (a.first !== '' && b.first !== '') {
    if (a.first === b.first && a.last === b.last) {
      return 'FIRST_LAST';
    }
    if (a.first !== b.first && (a.first.startsWith(b.first) || b.first.startsWith(a.first)) && a.last === b.last) {
      return 'FIRST_INITIAL_LAST';
    }
    if ((a.first.startsWith(b.first) && a.last.startsWith(b.last))
      || (b.first.startsWith(a.first) && b.last.startsWith(a.last))) {
      return 'INITIALS_ONLY';
    }
    if (a.last === b.last) {
      return 'FIRST_CONFLICT_LAST_MATCH';
    }
    return 'NO_MATCH';
  }

  if (a.first === '' && b.first === '') {
    return a.last === b.last ? 'FIRST_OR_LAST_ONLY' : 'NO_MATCH';
  }

  const [partial, full] = a.first === '' ? [a, b] : [b, a];
  return partial.last === full.last || partial.last === full.first ? 'FIRST_OR_LAST_ONLY' : 'NO_MATCH';
}
