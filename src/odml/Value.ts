/**
 * Value: a single typed datum of a Property plus its metadata.
 *
 * Equality is defined over content only; unit, uncertainty, reference,
 * definition, filename, checksum and encoder never take part in it.
 */

import { createHash } from 'node:crypto';
import type { Property } from './Property.js';
import {
  coerceContent,
  parseValueType,
  tryCoerceContent,
} from './valueTypes.js';
import type {
  RawContent,
  TypedContent,
  ValueContent,
  ValueType,
} from './valueTypes.js';
import type { ValidationIssue } from '../validation/types.js';

export type Uncertainty = number | string;

/**
 * Everything needed to create a Value. Only `content` is required.
 */
export interface ValueInit {
  content: RawContent;
  /** Type tag, case-insensitive (see ValueTypeSchema) */
  type?: string | null;
  unit?: string | null;
  uncertainty?: Uncertainty | null;
  /** Reference id of the value */
  reference?: string | null;
  definition?: string | null;
  /** Default file name; kept for binary content only */
  filename?: string | null;
  checksum?: string | null;
  encoder?: string | null;
}

/** Default encoding assumed for binary payloads. */
export const DEFAULT_BINARY_ENCODER = 'Base64';

function blankToNull(text: string | null | undefined): string | null {
  if (text === null || text === undefined || text.trim() === '') {
    return null;
  }
  return text;
}

function uncertaintyOrNull(uncertainty: Uncertainty | null | undefined): Uncertainty | null {
  if (uncertainty === null || uncertainty === undefined) return null;
  if (typeof uncertainty === 'string' && uncertainty.trim() === '') return null;
  return uncertainty;
}

export class Value {
  private typed: TypedContent;
  private unitText: string | null;
  private uncertaintyValue: Uncertainty | null;
  private referenceText: string | null;
  private definitionText: string | null;
  private filenameText: string | null;
  private readonly checksumText: string | null;
  private readonly encoderText: string | null;
  private owner: Property | null = null;

  /**
   * @throws ValueConversionError if the content does not fit the declared type
   */
  constructor(init: ValueInit) {
    this.typed = coerceContent(init.content, parseValueType(init.type));
    this.unitText = blankToNull(init.unit);
    this.uncertaintyValue = uncertaintyOrNull(init.uncertainty);
    this.referenceText = blankToNull(init.reference);
    this.definitionText = blankToNull(init.definition);
    this.filenameText = this.typed.type === 'binary' ? blankToNull(init.filename) : null;

    if (this.typed.type === 'binary') {
      this.checksumText = blankToNull(init.checksum) ?? `md5$${createHash('md5').update(this.typed.value).digest('hex')}`;
      this.encoderText = blankToNull(init.encoder) ?? DEFAULT_BINARY_ENCODER;
    } else {
      this.checksumText = blankToNull(init.checksum);
      this.encoderText = blankToNull(init.encoder);
    }
  }

  get content(): ValueContent {
    return this.typed.value;
  }

  /**
   * The typed variant fixed when the value was created or re-typed.
   */
  get typedContent(): TypedContent {
    return this.typed;
  }

  get type(): ValueType | null {
    return this.typed.type;
  }

  get unit(): string | null {
    return this.unitText;
  }

  set unit(unit: string | null) {
    this.unitText = blankToNull(unit);
  }

  get uncertainty(): Uncertainty | null {
    return this.uncertaintyValue;
  }

  set uncertainty(uncertainty: Uncertainty | null) {
    this.uncertaintyValue = uncertaintyOrNull(uncertainty);
  }

  get reference(): string | null {
    return this.referenceText;
  }

  set reference(reference: string | null) {
    this.referenceText = blankToNull(reference);
  }

  get definition(): string | null {
    return this.definitionText;
  }

  set definition(definition: string | null) {
    this.definitionText = blankToNull(definition);
  }

  get filename(): string | null {
    return this.filenameText;
  }

  set filename(filename: string | null) {
    this.filenameText = blankToNull(filename);
  }

  get checksum(): string | null {
    return this.checksumText;
  }

  get encoder(): string | null {
    return this.encoderText;
  }

  /**
   * The Property this value belongs to, if attached.
   */
  get property(): Property | null {
    return this.owner;
  }

  /**
   * Record the owning Property. Ownership itself lives in the Property's value list.
   */
  setAssociatedProperty(property: Property | null): void {
    this.owner = property;
  }

  /**
   * Replace the content, keeping the current type.
   *
   * @throws ValueConversionError if the content does not fit the type
   */
  setContent(content: RawContent): void {
    this.typed = coerceContent(content, this.typed.type);
  }

  /**
   * Change the type tag, re-coercing the current content.
   *
   * @throws ValueConversionError if the content does not fit the new type
   */
  setType(type: string | null): void {
    this.typed = coerceContent(this.typed.value, parseValueType(type));
  }

  isEmpty(): boolean {
    return typeof this.typed.value === 'string' && this.typed.value.trim() === '';
  }

  /**
   * Content equality against another value or against raw content.
   * Raw content is read under this value's type first, so `'5'` matches an int 5.
   */
  equals(other: Value | RawContent): boolean {
    if (other instanceof Value) {
      return this.typed.value === other.typed.value;
    }
    const coerced = tryCoerceContent(other, this.typed.type);
    return coerced !== null && coerced.value === this.typed.value;
  }

  /**
   * Compare this value against the definition of a terminology property.
   */
  validate(reference: Property): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const path = this.owner?.describePath() ?? String(this.content);

    const expectedType = reference.getType();
    if (expectedType !== null && this.type !== expectedType) {
      issues.push({
        code: 'value-type-mismatch',
        severity: 'warning',
        path,
        message: `Value '${String(this.content)}' has type '${this.type ?? ''}' but terminology expects '${expectedType}'`,
      });
    }

    const expectedUnit = reference.getUnit(0);
    if (expectedUnit !== null && this.unit !== null && expectedUnit.toLowerCase() !== this.unit.toLowerCase()) {
      issues.push({
        code: 'value-unit-mismatch',
        severity: 'warning',
        path,
        message: `Value '${String(this.content)}' has unit '${this.unit}' but terminology expects '${expectedUnit}'`,
      });
    }

    return issues;
  }

  /**
   * Detached copy carrying all fields.
   */
  clone(): Value {
    return new Value(this.toInit());
  }

  toInit(): ValueInit {
    return {
      content: this.typed.value,
      type: this.typed.type,
      unit: this.unitText,
      uncertainty: this.uncertaintyValue,
      reference: this.referenceText,
      definition: this.definitionText,
      filename: this.filenameText,
      checksum: this.checksumText,
      encoder: this.encoderText,
    };
  }

  toString(): string {
    return String(this.typed.value);
  }
}
