/**
 * PropertyValidator: checks a property against its terminology definition.
 *
 * Every discrepancy becomes a warning; the checked property is never changed
 * and validation always runs to the end.
 */

import type { Property } from '../odml/Property.js';
import { createLogger } from '../logging/logger.js';
import type { PropertyValidationResult, ValidationIssue } from './types.js';

const log = createLogger('validation');

function checkDefinition(property: Property, reference: Property): ValidationIssue | null {
  const definition = property.getDefinition();
  if (definition === null) return null;

  const expected = reference.getDefinition() ?? '';
  if (definition.toLowerCase() === expected.toLowerCase()) return null;

  return {
    code: 'definition-mismatch',
    severity: 'warning',
    path: property.describePath(),
    message: `Property '${property.getName()}' contains a definition that differs from the terminology; kept original definition`,
  };
}

function checkDependency(property: Property, reference: Property): ValidationIssue | null {
  const dependency = reference.getDependency();
  if (dependency === null) return null;

  const path = property.describePath();
  const container = property.getParent();
  if (container === null) {
    return {
      code: 'dependency-unresolved',
      severity: 'warning',
      path,
      message: `Terminology requests a sibling property '${dependency}' but property '${property.getName()}' has no container`,
    };
  }

  const sibling = container.containsProperty(dependency) ? container.getProperty(dependency) : null;
  if (sibling === null) {
    return {
      code: 'dependency-missing',
      severity: 'warning',
      path,
      message: `Terminology requests a sibling property with the name '${dependency}' which was not found`,
    };
  }

  const dependencyValue = reference.getDependencyValue();
  if (dependencyValue === null) return null;

  const expected = dependencyValue.toLowerCase();
  const found = sibling.getValues().some(content => String(content).toLowerCase() === expected);
  if (found) return null;

  return {
    code: 'dependency-value-mismatch',
    severity: 'warning',
    path,
    message: `Terminology requests a sibling property '${dependency}' that contains the value '${dependencyValue}'; no match was found`,
  };
}

/**
 * Validate `property` against the terminology's `reference` definition.
 */
export function validateProperty(property: Property, reference: Property): PropertyValidationResult {
  const issues: ValidationIssue[] = [];

  const definitionIssue = checkDefinition(property, reference);
  if (definitionIssue !== null) issues.push(definitionIssue);

  const dependencyIssue = checkDependency(property, reference);
  if (dependencyIssue !== null) issues.push(dependencyIssue);

  for (const value of property.getWholeValues()) {
    issues.push(...value.validate(reference));
  }

  for (const issue of issues) {
    log.warn(`Validation of ${issue.path}: ${issue.message}`);
  }

  return {
    valid: !issues.some(issue => issue.severity === 'error'),
    issues,
  };
}
