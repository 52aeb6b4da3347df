/**
 * Terminology exports.
 */

export * from './types.js';
export * from './Terminology.js';
export * from './TerminologyLoader.js';
