/**
 * odml-core: property model, merge, validation and identity matching for
 * odML experiment metadata.
 *
 * This is the main entry point for the library.
 */

// Property and value model
export * from './odml/index.js';

// Merge engine
export * from './merge/index.js';

// Validation against terminologies
export * from './validation/index.js';

// Identity matching
export * from './identity/index.js';

// Terminology documents
export * from './terminology/index.js';

// Configuration and logging
export * from './config/types.js';
export { loadConfig, validateConfig, resolveConfig, substituteEnvVars, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions, PartialOdmlConfig } from './config/loader.js';
export { createLogger, setLogLevel, getLogLevel } from './logging/logger.js';
export type { Logger, LogLevel } from './logging/logger.js';

// Toolkit
export { OdmlToolkit, createToolkit, loadToolkit } from './toolkit.js';
