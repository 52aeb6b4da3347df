/**
 * OdmlToolkit: wires configuration and loaded terminologies into the
 * property, merge, validation and identity engines.
 */

import { loadConfig, resolveConfig } from './config/loader.js';
import type { LoadConfigOptions } from './config/loader.js';
import type { OdmlConfig } from './config/types.js';
import { createLogger, setLogLevel } from './logging/logger.js';
import { Property } from './odml/Property.js';
import type { PropertyInit } from './odml/Property.js';
import type { RawContent } from './odml/valueTypes.js';
import { mergeProperties } from './merge/PropertyMerger.js';
import type { MergePolicy, MergeResult } from './merge/types.js';
import { validateProperty } from './validation/PropertyValidator.js';
import type { PropertyValidationResult, ValidationIssue } from './validation/types.js';
import { matchIdentity } from './identity/IdentityMatcher.js';
import type { MatchLevel } from './identity/MatchLevel.js';
import type { Terminology } from './terminology/Terminology.js';
import { loadTerminologies } from './terminology/TerminologyLoader.js';

const log = createLogger('toolkit');

export class OdmlToolkit {
  private readonly terminologyList: Terminology[];

  constructor(
    readonly config: OdmlConfig,
    terminologies: Terminology[] = []
  ) {
    this.terminologyList = [...terminologies];
    setLogLevel(config.logging.level);
  }

  get terminologies(): readonly Terminology[] {
    return this.terminologyList;
  }

  addTerminology(terminology: Terminology): void {
    this.terminologyList.push(terminology);
  }

  /**
   * Create a property, normalising its name if `naming.normalizeOnCreate` is set.
   *
   * @throws PropertyConstructionError for an empty or path-like name
   */
  createProperty(name: string, init: PropertyInit = {}): Property {
    return new Property(name, {
      normalizeName: this.config.naming.normalizeOnCreate,
      ...init,
    });
  }

  /**
   * Merge `other` into `target`, using `merge.defaultPolicy` unless a policy is given.
   */
  merge(target: Property, other: Property, policy?: MergePolicy): MergeResult {
    return mergeProperties(target, other, policy ?? this.config.merge.defaultPolicy);
  }

  /**
   * Reference property for `property` from the first terminology that knows it.
   */
  findReference(property: Property): Property | null {
    for (const terminology of this.terminologyList) {
      const reference = terminology.findReference(property);
      if (reference !== null) return reference;
    }
    return null;
  }

  /**
   * Validate a property against its reference in the loaded terminologies.
   */
  validate(property: Property): PropertyValidationResult {
    const reference = this.findReference(property);
    if (reference !== null) {
      return validateProperty(property, reference);
    }

    const issue: ValidationIssue = {
      code: 'reference-missing',
      severity: 'warning',
      path: property.describePath(),
      message: `No terminology defines property '${property.getName()}'`,
    };
    log.warn(`Validation of ${issue.path}: ${issue.message}`);
    return { valid: true, issues: [issue] };
  }

  match(a: RawContent | null | undefined, b: RawContent | null | undefined, type: string): MatchLevel {
    return matchIdentity(a, b, type);
  }
}

/**
 * Create a toolkit from an already resolved configuration.
 */
export function createToolkit(config: OdmlConfig = resolveConfig(), terminologies: Terminology[] = []): OdmlToolkit {
  return new OdmlToolkit(config, terminologies);
}

/**
 * Load the configuration file and every terminology in the configured directory.
 */
export async function loadToolkit(options: LoadConfigOptions = {}): Promise<OdmlToolkit> {
  const config = await loadConfig(options);
  setLogLevel(config.logging.level);

  const { terminologies, errors } = await loadTerminologies({
    basePath: config.terminology.directory,
    recursive: config.terminology.recursive,
  });
  for (const error of errors) {
    log.warn(`Skipped terminology ${error.path}: ${error.error}`);
  }

  return new OdmlToolkit(config, terminologies);
}
