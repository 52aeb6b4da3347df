/**
 * Types for property validation against a terminology.
 *
 * Validation reports discrepancies; it never changes the validated property.
 */

/**
 * Issue severity levels.
 */
export type ValidationSeverity = 'error' | 'warning' | 'info';

/**
 * What kind of discrepancy was found.
 */
export type ValidationIssueCode =
  | 'definition-mismatch'
  | 'dependency-unresolved'
  | 'dependency-missing'
  | 'dependency-value-mismatch'
  | 'value-type-mismatch'
  | 'value-unit-mismatch'
  | 'reference-missing';

/**
 * Single validation issue.
 */
export interface ValidationIssue {
  /** Issue kind */
  code: ValidationIssueCode;
  /** Severity level */
  severity: ValidationSeverity;
  /** Human-readable message */
  message: string;
  /** Location of the property, "<containerPath>#<name>" when attached */
  path: string;
}

/**
 * Result of validating one property.
 */
export interface PropertyValidationResult {
  /** Whether no error-severity issue was found */
  valid: boolean;
  /** Issues in the order they were found */
  issues: ValidationIssue[];
}
