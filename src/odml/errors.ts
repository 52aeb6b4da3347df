/**
 * Error types raised by the property model.
 *
 * Only construction-time violations are thrown. Mutators on an existing
 * Property report failure through their return value instead.
 */

export type PropertyErrorCode = 'INVALID_PROPERTY_NAME';

export type ValueErrorCode =
  | 'VALUE_CONVERSION_FAILED'
  | 'UNKNOWN_VALUE_TYPE';

/**
 * Raised when a Property is created with an empty or path-like name.
 */
export class PropertyConstructionError extends Error {
  readonly code: PropertyErrorCode = 'INVALID_PROPERTY_NAME';

  constructor(
    message: string,
    public readonly propertyName: string
  ) {
    super(message);
    this.name = 'PropertyConstructionError';
  }
}

/**
 * Raised when content cannot be represented under a value type.
 */
export class ValueConversionError extends Error {
  constructor(
    readonly code: ValueErrorCode,
    message: string,
    public readonly content: unknown,
    public readonly valueType: string | null
  ) {
    super(message);
    this.name = 'ValueConversionError';
  }
}
