/**
 * Configuration types for odml-core.
 *
 * These types define the structure of odml.config.yaml and provide
 * type-safe access to toolkit settings.
 */

import type { LogLevel } from '../logging/logger.js';
import type { MergePolicy } from '../merge/types.js';

/**
 * Top-level configuration.
 */
export interface OdmlConfig {
  logging: LoggingConfig;
  merge: MergeConfig;
  naming: NamingConfig;
  terminology: TerminologyConfig;
}

/**
 * Console logging settings.
 */
export interface LoggingConfig {
  /** Minimum level written to the console (default: 'warn') */
  level: LogLevel;
}

/**
 * Merge engine settings.
 */
export interface MergeConfig {
  /** Policy used when a merge call names none (default: 'COMBINE') */
  defaultPolicy: MergePolicy;
}

/**
 * Property naming settings.
 */
export interface NamingConfig {
  /** Apply checkNameStyle to names passed to createProperty (default: false) */
  normalizeOnCreate: boolean;
}

/**
 * Terminology discovery settings.
 */
export interface TerminologyConfig {
  /** Directory searched for *.terminology.yaml files (default: './terminologies') */
  directory: string;
  /** Whether to descend into subdirectories (default: true) */
  recursive: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: OdmlConfig = {
  logging: {
    level: 'warn',
  },
  merge: {
    defaultPolicy: 'COMBINE',
  },
  naming: {
    normalizeOnCreate: false,
  },
  terminology: {
    directory: './terminologies',
    recursive: true,
  },
};
