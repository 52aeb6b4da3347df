/**
 * Property model exports.
 */

export * from './errors.js';
export * from './valueTypes.js';
export * from './names.js';
export * from './container.js';
export * from './Value.js';
export * from './Property.js';
