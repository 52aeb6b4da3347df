/**
 * Validation engine exports.
 */

export * from './types.js';
export * from './PropertyValidator.js';
