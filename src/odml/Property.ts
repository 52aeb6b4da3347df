/**
 * Property: a named, ordered collection of same-typed Values plus the
 * metadata describing them (definition, dependency, terminology mapping).
 *
 * Construction fails fast on an unusable name. Every later mutator reports
 * failure through its return value, logs the reason and leaves the property
 * unchanged.
 */

import { Value } from './Value.js';
import type { Uncertainty, ValueInit } from './Value.js';
import { parseValueType, tryCoerceContent } from './valueTypes.js';
import type { RawContent, ValueContent, ValueType } from './valueTypes.js';
import { ValueConversionError } from './errors.js';
import { assertValidName, checkNameStyle, invalidNameReason } from './names.js';
import type { PropertyContainer } from './container.js';
import { createLogger } from '../logging/logger.js';
import { mergeProperties } from '../merge/PropertyMerger.js';
import type { MergePolicy, MergeResult } from '../merge/types.js';
import { validateProperty } from '../validation/PropertyValidator.js';
import type { PropertyValidationResult } from '../validation/types.js';
import { matchProperties } from '../identity/IdentityMatcher.js';
import type { MatchLevel } from '../identity/MatchLevel.js';

const log = createLogger('property');

/**
 * Options for a value added to an existing property.
 */
export type AddValueOptions = Omit<ValueInit, 'content'>;

/**
 * Everything besides the name that a property can be created with.
 */
export interface PropertyInit {
  definition?: string | null;
  /** Name of a sibling property this one depends on */
  dependency?: string | null;
  /** Value the sibling must hold */
  dependencyValue?: string | null;
  /** Locator of the matching terminology entry */
  mapping?: URL | string | null;
  /** Initial values; bare content picks up `type` and `unit` below */
  values?: Array<RawContent | ValueInit>;
  type?: string | null;
  unit?: string | null;
  /** Apply checkNameStyle to the name (default: false) */
  normalizeName?: boolean;
}

/**
 * Flat view of one value together with its property's metadata.
 */
export interface PropertyRow {
  name: string;
  reference: string | null;
  value: ValueContent;
  uncertainty: Uncertainty | null;
  unit: string | null;
  type: ValueType | null;
  filename: string | null;
  valueDefinition: string | null;
  propertyDefinition: string | null;
  dependency: string | null;
  dependencyValue: string | null;
  mapping: string | null;
}

export const PROPERTY_COLUMNS = [
  'name',
  'reference',
  'value',
  'uncertainty',
  'unit',
  'type',
  'filename',
  'valueDefinition',
  'propertyDefinition',
  'dependency',
  'dependencyValue',
  'mapping',
] as const satisfies readonly (keyof PropertyRow)[];

function isValueInit(entry: RawContent | ValueInit): entry is ValueInit {
  return typeof entry === 'object' && !(entry instanceof Date);
}

/** Value types whose content may rename the container of a "name" property. */
const NAMING_TYPES: ReadonlyArray<ValueType | null> = [null, 'text', 'string'];

function textOrNull(text: string | null | undefined): string | null {
  return text === null || text === undefined || text.trim() === '' ? null : text;
}

export class Property {
  private name: string;
  private definition: string | null = null;
  private dependency: string | null = null;
  private dependencyValue: string | null = null;
  private mapping: URL | null = null;
  private typeTag: ValueType | null = null;
  /** Unit reported while there are no values; also the default for new ones */
  private unitHint: string | null = null;
  private readonly values: Value[] = [];
  private parent: PropertyContainer | null = null;

  /**
   * @throws PropertyConstructionError for an empty or path-like name
   */
  constructor(name: string, init: PropertyInit = {}) {
    assertValidName(name);
    this.name = init.normalizeName === true ? checkNameStyle(name) : name;
    this.definition = textOrNull(init.definition);
    this.dependency = textOrNull(init.dependency);
    this.dependencyValue = textOrNull(init.dependencyValue);
    this.unitHint = textOrNull(init.unit);

    if (init.mapping !== undefined && init.mapping !== null) {
      this.setMapping(init.mapping);
    }
    if (init.type !== undefined && init.type !== null) {
      this.setType(init.type);
    }

    for (const entry of init.values ?? []) {
      if (isValueInit(entry)) {
        const { content, ...options } = entry;
        this.addValue(content, {
          ...options,
          type: options.type ?? init.type ?? null,
          unit: options.unit ?? init.unit ?? null,
        });
      } else {
        this.addValue(entry, { type: init.type ?? null, unit: init.unit ?? null });
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Identity and metadata
  // ---------------------------------------------------------------------------

  getName(): string {
    return this.name;
  }

  /**
   * Rename the property. Empty or path-like names are refused.
   */
  setName(name: string): boolean {
    const reason = invalidNameReason(name);
    if (reason !== null) {
      log.error(`Cannot rename property '${this.name}': ${reason}`);
      return false;
    }
    this.name = name;
    return true;
  }

  getDefinition(): string | null {
    return this.definition;
  }

  /**
   * Set or, with null, remove the definition.
   */
  setDefinition(definition: string | null): void {
    this.definition = textOrNull(definition);
  }

  getDependency(): string | null {
    return this.dependency;
  }

  setDependency(dependency: string | null): void {
    this.dependency = textOrNull(dependency);
  }

  getDependencyValue(): string | null {
    return this.dependencyValue;
  }

  setDependencyValue(dependencyValue: string | null): void {
    this.dependencyValue = textOrNull(dependencyValue);
  }

  getMapping(): URL | null {
    return this.mapping;
  }

  /**
   * Point the property at a terminology entry. An unparsable URL clears the mapping.
   */
  setMapping(mapping: URL | string | null): boolean {
    if (mapping === null || mapping instanceof URL) {
      this.mapping = mapping;
      return true;
    }
    try {
      this.mapping = new URL(mapping);
      return true;
    } catch {
      log.error(`Property '${this.name}': '${mapping}' is not a valid mapping URL`);
      this.mapping = null;
      return false;
    }
  }

  removeMapping(): void {
    this.mapping = null;
  }

  getParent(): PropertyContainer | null {
    return this.parent;
  }

  /**
   * Link the property to the container holding it. The link does not own the container.
   */
  setParent(parent: PropertyContainer | null): void {
    this.parent = parent;
  }

  /**
   * The established type of the property's values.
   */
  getType(): ValueType | null {
    return this.typeTag;
  }

  /**
   * Set the type of the property and all its values. Refused as a whole if
   * any current content does not fit the new type.
   */
  setType(type: string | null): boolean {
    let parsed: ValueType | null;
    try {
      parsed = parseValueType(type);
    } catch (err) {
      log.error(`Property '${this.name}': ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }

    const misfit = this.values.find(value => tryCoerceContent(value.content, parsed) === null);
    if (misfit !== undefined) {
      log.error(`Property '${this.name}': value '${misfit.toString()}' cannot be converted to ${parsed ?? 'untyped'}`);
      return false;
    }

    for (const value of this.values) {
      value.setType(parsed);
    }
    this.typeTag = parsed;
    return true;
  }

  /**
   * Unit of the value at `index`, or null when unset or out of range.
   * A property without values reports the unit it was created with.
   */
  getUnit(index = 0): string | null {
    if (this.values.length === 0) {
      return index === 0 ? this.unitHint : null;
    }
    return this.values[index]?.unit ?? null;
  }

  /**
   * Set the unit of every value.
   */
  setUnit(unit: string | null): void {
    if (this.values.length > 1) {
      log.warn(`Property '${this.name}': setting the unit of all ${this.values.length} values`);
    }
    this.unitHint = textOrNull(unit);
    for (const value of this.values) {
      value.unit = unit;
    }
  }

  setUnitAt(unit: string | null, index: number): boolean {
    const value = this.valueAt(index, 'setUnitAt');
    if (value === null) return false;
    value.unit = unit;
    return true;
  }

  // ---------------------------------------------------------------------------
  // Value sequence
  // ---------------------------------------------------------------------------

  valueCount(): number {
    return this.values.length;
  }

  /**
   * Add a value. Refused for null content and for content already present.
   *
   * A missing unit defaults to the first value's unit and a missing type to
   * the property's type. A differing type is logged but accepted; if the
   * property had no type yet it adopts the new one, which is refused when an
   * existing value cannot take that type.
   */
  addValue(content: RawContent | null | undefined, options: AddValueOptions = {}): boolean {
    if (content === null || content === undefined) {
      log.error(`Property '${this.name}': the value to add must not be null`);
      return false;
    }

    let requestedType: ValueType | null;
    try {
      requestedType = parseValueType(options.type);
    } catch (err) {
      log.error(`Property '${this.name}': ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }

    let toAdd: Value;
    try {
      toAdd = new Value({
        ...options,
        content,
        type: requestedType ?? this.typeTag,
        unit: options.unit ?? this.getUnit(0),
      });
    } catch (err) {
      if (err instanceof ValueConversionError) {
        log.error(`Property '${this.name}': error trying to initialize value: ${err.message}`);
        return false;
      }
      throw err;
    }

    return this.appendValue(toAdd);
  }

  /**
   * Append a detached Value as it is. Its type is kept even when it differs
   * from the property's; an untyped property adopts it.
   */
  appendValue(toAdd: Value): boolean {
    if (toAdd.property !== null) {
      log.error(`Property '${this.name}': value '${toAdd.toString()}' already belongs to a property`);
      return false;
    }

    const established = this.typeTag;
    const incoming = toAdd.type;
    const adopting = established === null && incoming !== null;

    for (const value of this.values) {
      const current = adopting ? tryCoerceContent(value.content, incoming) : value.typedContent;
      if (current === null) {
        log.error(
          `Property '${this.name}': value '${value.toString()}' cannot be converted to ${incoming ?? 'untyped'}; ` +
          `'${toAdd.toString()}' was not added`
        );
        return false;
      }
      if (current.value === toAdd.content) {
        log.error(`Property '${this.name}': value '${toAdd.toString()}' already exists`);
        return false;
      }
    }

    toAdd.setAssociatedProperty(this);
    this.values.push(toAdd);

    if (adopting) {
      this.setType(incoming);
    } else if (incoming !== established) {
      log.warn(
        `Property '${this.name}': type of newly added value (${incoming ?? 'untyped'}) differs from ` +
        `the property type (${established ?? 'untyped'}); index of the new value is ${this.values.length - 1}`
      );
    }

    return true;
  }

  /**
   * Append copies of all values of another property, skipping duplicates.
   *
   * @returns the number of values appended
   */
  addValues(other: Property): number {
    let appended = 0;
    for (const value of other.values) {
      const { content, ...options } = value.toInit();
      if (this.addValue(content, options)) {
        appended++;
      }
    }
    return appended;
  }

  /**
   * Set the content of a single-valued property.
   */
  setValue(content: RawContent): boolean {
    if (this.values.length > 1) {
      log.error(`Property '${this.name}' has more than one value; use setValueAt with an index`);
      return false;
    }
    if (this.values.length === 0) {
      return this.addValue(content);
    }
    return this.setValueAt(content, 0);
  }

  /**
   * Replace the content at `index`, keeping the value's other fields.
   *
   * Setting a textual value on a property called "name" renames the container.
   */
  setValueAt(content: RawContent, index: number): boolean {
    const target = this.valueAt(index, 'setValueAt');
    if (target === null) return false;

    const duplicate = this.values.findIndex((value, i) => i !== index && value.equals(content));
    if (duplicate !== -1) {
      log.error(`Property '${this.name}': value '${String(content)}' already exists at index ${duplicate}`);
      return false;
    }

    try {
      target.setContent(content);
    } catch (err) {
      if (err instanceof ValueConversionError) {
        log.error(`Property '${this.name}': ${err.message}`);
        return false;
      }
      throw err;
    }
    log.debug(`Property '${this.name}': set value at index ${index}`);

    const current = target.typedContent;
    if (this.name.toLowerCase() === 'name' && NAMING_TYPES.includes(current.type) && typeof current.value === 'string') {
      if (this.parent !== null) {
        this.parent.setName(current.value);
      } else {
        log.debug(`Property '${this.name}' has no container to rename`);
      }
    }
    return true;
  }

  /**
   * Index of the first value with the given content at or after `from`, or -1.
   */
  getValueIndex(content: RawContent, from = 0): number {
    for (let i = Math.max(from, 0); i < this.values.length; i++) {
      if (this.values[i]?.equals(content)) {
        return i;
      }
    }
    return -1;
  }

  getValue(index = 0): ValueContent | null {
    return this.valueAt(index, 'getValue')?.content ?? null;
  }

  getValues(): ValueContent[] {
    return this.values.map(value => value.content);
  }

  /**
   * The Value record at `index`. Handles are not stable across removal or merge.
   */
  getWholeValue(index = 0): Value | null {
    return this.valueAt(index, 'getWholeValue');
  }

  getWholeValues(): readonly Value[] {
    return [...this.values];
  }

  /**
   * Remove the value holding the given content.
   */
  removeValue(content: RawContent | null): boolean {
    if (content === null) {
      log.error(`Property '${this.name}': value for removal must not be null`);
      return false;
    }
    const index = this.getValueIndex(content);
    if (index < 0) {
      log.error(`Property '${this.name}': value '${String(content)}' for removal does not exist`);
      return false;
    }
    return this.detach(index);
  }

  /**
   * Remove the value at `index`.
   */
  removeValueAt(index: number): boolean {
    if (this.valueAt(index, 'removeValueAt') === null) return false;
    return this.detach(index);
  }

  /**
   * Remove every empty value, walking from the end so indices stay valid.
   *
   * @returns the number of values removed
   */
  removeEmptyValues(): number {
    let removed = 0;
    for (let i = this.values.length - 1; i >= 0; i--) {
      if (this.values[i]?.isEmpty()) {
        this.detach(i);
        removed++;
      }
    }
    return removed;
  }

  /**
   * True if there are no values or all values are empty.
   */
  isEmpty(): boolean {
    return this.values.every(value => value.isEmpty());
  }

  // ---------------------------------------------------------------------------
  // Per-value side fields
  // ---------------------------------------------------------------------------

  getValueReference(index = 0): string | null {
    return this.valueAt(index, 'getValueReference')?.reference ?? null;
  }

  getValueReferences(): Array<string | null> {
    return this.values.map(value => value.reference);
  }

  setValueReferenceAt(reference: string | null, index: number): boolean {
    const value = this.valueAt(index, 'setValueReferenceAt');
    if (value === null) return false;
    value.reference = reference;
    return true;
  }

  getValueUncertainty(index = 0): Uncertainty | null {
    return this.valueAt(index, 'getValueUncertainty')?.uncertainty ?? null;
  }

  getValueUncertainties(): Array<Uncertainty | null> {
    return this.values.map(value => value.uncertainty);
  }

  setValueUncertaintyAt(uncertainty: Uncertainty | null, index: number): boolean {
    const value = this.valueAt(index, 'setValueUncertaintyAt');
    if (value === null) return false;
    value.uncertainty = uncertainty;
    return true;
  }

  getValueDefinition(index = 0): string | null {
    return this.valueAt(index, 'getValueDefinition')?.definition ?? null;
  }

  getValueDefinitions(): Array<string | null> {
    return this.values.map(value => value.definition);
  }

  setValueDefinitionAt(definition: string | null, index: number): boolean {
    const value = this.valueAt(index, 'setValueDefinitionAt');
    if (value === null) return false;
    value.definition = definition;
    return true;
  }

  getValueFilename(index = 0): string | null {
    return this.valueAt(index, 'getValueFilename')?.filename ?? null;
  }

  /**
   * Set the default file name of a value. Only binary properties carry file names.
   */
  setValueFilenameAt(filename: string | null, index: number): boolean {
    const value = this.valueAt(index, 'setValueFilenameAt');
    if (value === null) return false;
    if (this.typeTag !== 'binary') {
      log.error(`Property '${this.name}': type must be binary to set a filename`);
      return false;
    }
    value.filename = filename;
    return true;
  }

  getValueChecksum(index = 0): string | null {
    return this.valueAt(index, 'getValueChecksum')?.checksum ?? null;
  }

  getValueEncoder(index = 0): string | null {
    return this.valueAt(index, 'getValueEncoder')?.encoder ?? null;
  }

  // ---------------------------------------------------------------------------
  // Scalar readers. Conversion failure yields NaN or null.
  // ---------------------------------------------------------------------------

  getText(index = 0): string | null {
    const value = this.valueAt(index, 'getText');
    return value === null ? null : value.toString();
  }

  getNumber(index = 0): number {
    const value = this.valueAt(index, 'getNumber');
    if (value === null) return Number.NaN;
    const typed = tryCoerceContent(value.content, 'float');
    if (typed === null || typed.type !== 'float') {
      log.error(`Property '${this.name}': value ${index} cannot be converted to a number`);
      return Number.NaN;
    }
    return typed.value;
  }

  /**
   * Date part (yyyy-MM-dd) of the value at `index`.
   */
  getDate(index = 0): string | null {
    const value = this.valueAt(index, 'getDate');
    if (value === null) return null;
    const typed = tryCoerceContent(value.content, 'date');
    if (typed === null || typed.type !== 'date') {
      log.error(`Property '${this.name}': value ${index} cannot be converted to a date`);
      return null;
    }
    return typed.value;
  }

  /**
   * Time part (HH:mm:ss) of the value at `index`.
   */
  getTime(index = 0): string | null {
    const value = this.valueAt(index, 'getTime');
    if (value === null) return null;
    const content = value.type === 'datetime' && typeof value.content === 'string'
      ? value.content.slice(11)
      : value.content;
    const typed = tryCoerceContent(content, 'time');
    if (typed === null || typed.type !== 'time') {
      log.error(`Property '${this.name}': value ${index} cannot be converted to a time`);
      return null;
    }
    return typed.value;
  }

  // ---------------------------------------------------------------------------
  // Engines
  // ---------------------------------------------------------------------------

  /**
   * Merge another property of the same name into this one.
   */
  merge(other: Property, policy: MergePolicy): MergeResult {
    return mergeProperties(this, other, policy);
  }

  /**
   * Check this property against its definition in a terminology.
   */
  validate(reference: Property): PropertyValidationResult {
    return validateProperty(this, reference);
  }

  /**
   * Score how well this property's first value matches another's.
   */
  match(other: Property): MatchLevel {
    return matchProperties(this, other);
  }

  // ---------------------------------------------------------------------------
  // Copies and views
  // ---------------------------------------------------------------------------

  /**
   * Deep copy, detached from any container.
   */
  clone(): Property {
    const copy = new Property(this.name, {
      definition: this.definition,
      dependency: this.dependency,
      dependencyValue: this.dependencyValue,
      mapping: this.mapping === null ? null : new URL(this.mapping.href),
      type: this.typeTag,
      unit: this.unitHint,
    });
    for (const value of this.values) {
      const cloned = value.clone();
      cloned.setAssociatedProperty(copy);
      copy.values.push(cloned);
    }
    return copy;
  }

  /**
   * Flat row for the value at `index`, or null when out of range.
   */
  toRow(index = 0): PropertyRow | null {
    const value = this.valueAt(index, 'toRow');
    if (value === null) return null;
    return {
      name: this.name,
      reference: value.reference,
      value: value.content,
      uncertainty: value.uncertainty,
      unit: value.unit,
      type: value.type,
      filename: value.filename,
      valueDefinition: value.definition,
      propertyDefinition: this.definition,
      dependency: this.dependency,
      dependencyValue: this.dependencyValue,
      mapping: this.mapping?.href ?? null,
    };
  }

  /**
   * "<containerPath>#<name>" when attached, otherwise the bare name.
   */
  describePath(): string {
    return this.parent === null ? this.name : `${this.parent.getPath()}#${this.name}`;
  }

  describe(): string {
    const containerPath = this.parent?.getPath() ?? '';
    return `property '${this.name}'; completePath: ${containerPath}/${this.name}`;
  }

  toString(): string {
    return this.name;
  }

  private valueAt(index: number, operation: string): Value | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.values.length) {
      log.error(`Property '${this.name}'.${operation}: index ${index} out of range`);
      return null;
    }
    return this.values[index] ?? null;
  }

  private detach(index: number): boolean {
    const [removed] = this.values.splice(index, 1);
    removed?.setAssociatedProperty(null);
    return removed !== undefined;
  }
}
