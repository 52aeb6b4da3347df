/**
 * Identity matcher exports.
 */

export * from './MatchLevel.js';
export * from './personName.js';
export * from './IdentityMatcher.js';
