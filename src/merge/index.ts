/**
 * Merge engine exports.
 */

export * from './types.js';
export * from './PropertyMerger.js';
