/**
 * PropertyMerger: reconciles two properties describing the same concept.
 *
 * A merge first checks that both sides are compatible (name, type, mapping,
 * definition, unit) and then plans where every incoming value goes. If a
 * check fails or a value has no place, nothing is changed. Otherwise scalar
 * fields are filled in and the plan is applied: each incoming value is
 * reconciled with the local value of equal content or, depending on the
 * policy, appended or written over a single local value.
 */

import type { Property } from '../odml/Property.js';
import { Value } from '../odml/Value.js';
import { tryCoerceContent } from '../odml/valueTypes.js';
import type { TypedContent, ValueContent, ValueType } from '../odml/valueTypes.js';
import { createLogger } from '../logging/logger.js';
import type { MergeConflict, MergeFailure, MergePolicy, MergeResult } from './types.js';

const log = createLogger('merge');

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Two mappings target the same terminology entry when they address the same
 * document, regardless of fragment.
 */
export function sameTerminologyEntry(a: URL, b: URL): boolean {
  const strip = (url: URL): string => {
    const copy = new URL(url.href);
    copy.hash = '';
    return copy.href;
  };
  return strip(a) === strip(b);
}

function conflict(kind: MergeConflict, message: string): MergeFailure {
  log.error(`Merge error: ${message}`);
  return { ok: false, conflict: kind, message };
}

/**
 * Check whether `other` can be merged into `target`.
 *
 * @returns the failed result, or null if the merge may proceed
 */
export function checkMergePreconditions(target: Property, other: Property): MergeFailure | null {
  const name = target.getName();

  if (!sameText(name, other.getName())) {
    return conflict('name', `cannot merge properties of different names ('${name}' and '${other.getName()}')`);
  }

  const targetType = target.getType();
  const otherType = other.getType();
  if (targetType !== null && otherType !== null && targetType !== otherType) {
    return conflict('type', `cannot merge property '${name}' of type '${targetType}' with type '${otherType}'`);
  }

  const targetMapping = target.getMapping();
  const otherMapping = other.getMapping();
  if (targetMapping !== null && otherMapping !== null && !sameTerminologyEntry(targetMapping, otherMapping)) {
    return conflict('mapping', `cannot merge property '${name}' mapped to different terminology entries`);
  }

  const targetDefinition = target.getDefinition();
  const otherDefinition = other.getDefinition();
  if (targetDefinition !== null && otherDefinition !== null && !sameText(targetDefinition, otherDefinition)) {
    return conflict('definition', `cannot merge property '${name}' having different definitions`);
  }

  const targetUnit = target.getUnit(0);
  const otherUnit = other.getUnit(0);
  if (targetUnit !== null && otherUnit !== null && !sameText(targetUnit, otherUnit)) {
    return conflict('unit', `cannot merge property '${name}' having different units ('${targetUnit}' and '${otherUnit}')`);
  }

  return null;
}

/**
 * Decide what to write into a local field given the incoming one.
 *
 * @returns the value to write, or null to keep the local field
 */
function resolveField<T>(mine: T | null, theirs: T | null, policy: MergePolicy): T | null {
  if (theirs === null) return null;
  if (mine === null) return theirs;
  return policy === 'OTHER_OVERRIDES_THIS' ? theirs : null;
}

/**
 * Reconcile the side fields of the local value at `index` with `other`.
 */
function reconcileValue(target: Property, index: number, other: Value, policy: MergePolicy): void {
  const mine = target.getWholeValue(index);
  if (mine === null) return;

  const definition = policy === 'COMBINE' && mine.definition !== null && other.definition !== null
    ? `${mine.definition}\n${other.definition}`
    : resolveField(mine.definition, other.definition, policy);
  if (definition !== null) {
    target.setValueDefinitionAt(definition, index);
  }

  const uncertainty = resolveField(mine.uncertainty, other.uncertainty, policy);
  if (uncertainty !== null) {
    target.setValueUncertaintyAt(uncertainty, index);
  }

  const filename = resolveField(mine.filename, other.filename, policy);
  if (filename !== null && target.getType() === 'binary') {
    target.setValueFilenameAt(filename, index);
  }

  const reference = resolveField(mine.reference, other.reference, policy);
  if (reference !== null) {
    target.setValueReferenceAt(reference, index);
  }
}

/**
 * Fill in scalar fields that the target lacks. Dependency and dependency
 * value are also overwritten under OTHER_OVERRIDES_THIS.
 */
function mergeScalars(target: Property, other: Property, policy: MergePolicy, adoptType: ValueType | null): void {
  if (target.getDefinition() === null) {
    target.setDefinition(other.getDefinition());
  }

  if (adoptType !== null) {
    target.setType(adoptType);
  }

  const otherUnit = other.getUnit(0);
  if (target.getUnit(0) === null && otherUnit !== null) {
    target.setUnit(otherUnit);
  }

  const otherMapping = other.getMapping();
  if (target.getMapping() === null && otherMapping !== null) {
    target.setMapping(new URL(otherMapping.href));
  }

  const dependency = resolveField(target.getDependency(), other.getDependency(), policy);
  if (dependency !== null) {
    target.setDependency(dependency);
  }

  const dependencyValue = resolveField(target.getDependencyValue(), other.getDependencyValue(), policy);
  if (dependencyValue !== null) {
    target.setDependencyValue(dependencyValue);
  }
}

type MergeStep =
  | { kind: 'reconcile'; index: number; value: Value }
  | { kind: 'append'; value: Value; type: ValueType | null }
  | { kind: 'replace'; value: Value };

interface MergePlan {
  /** Type the untyped target takes before values move */
  adoptType: ValueType | null;
  /** Local value that keeps an untyped target from taking the other side's type */
  untypedMisfit: ValueContent | null;
  steps: MergeStep[];
}

/**
 * True if a local value holding `slot` has the same content as an incoming
 * value, read either under the local value's type or as it would be stored.
 */
function holds(slot: TypedContent, content: ValueContent, stored: TypedContent): boolean {
  const read = tryCoerceContent(content, slot.type);
  return (read !== null && read.value === slot.value) || stored.value === slot.value;
}

/**
 * Work out where every value of `other` goes without touching `target`.
 */
function planMerge(target: Property, other: Property, policy: MergePolicy): MergePlan | MergeFailure {
  const name = target.getName();
  const otherType = other.getType();

  let valueType = target.getType();
  let adoptType: ValueType | null = null;
  let untypedMisfit: ValueContent | null = null;
  if (valueType === null && otherType !== null) {
    const misfit = target.getValues().find(content => tryCoerceContent(content, otherType) === null);
    if (misfit === undefined) {
      valueType = otherType;
      adoptType = otherType;
    } else {
      untypedMisfit = misfit;
    }
  }

  const slots: TypedContent[] = target.getWholeValues().map(value =>
    (adoptType !== null ? tryCoerceContent(value.content, adoptType) : null) ?? value.typedContent
  );
  const steps: MergeStep[] = [];

  for (const value of other.getWholeValues()) {
    const fitted = tryCoerceContent(value.content, valueType);
    const stored = fitted ?? value.typedContent;

    const index = slots.findIndex(slot => holds(slot, value.content, stored));
    if (index !== -1) {
      steps.push({ kind: 'reconcile', index, value });
      continue;
    }

    if (policy === 'COMBINE') {
      steps.push({ kind: 'append', value, type: fitted !== null ? valueType : value.type });
      slots.push(stored);
    } else if (policy === 'OTHER_OVERRIDES_THIS') {
      const [slot] = slots;
      if (slot === undefined || slots.length !== 1) continue;
      const replacement = tryCoerceContent(value.content, slot.type);
      if (replacement === null) {
        return conflict(
          'value',
          `incoming value '${value.toString()}' cannot replace the ${slot.type ?? 'untyped'} value of property '${name}'`
        );
      }
      slots[0] = replacement;
      steps.push({ kind: 'replace', value });
    }
  }

  return { adoptType, untypedMisfit, steps };
}

/**
 * Merge `other` into `target` under `policy`. `other` is never modified.
 */
export function mergeProperties(target: Property, other: Property, policy: MergePolicy): MergeResult {
  const failed = checkMergePreconditions(target, other);
  if (failed !== null) {
    return failed;
  }

  const plan = planMerge(target, other, policy);
  if ('ok' in plan) {
    return plan;
  }

  if (plan.untypedMisfit !== null) {
    log.warn(
      `Property '${target.getName()}' stays untyped: value '${String(plan.untypedMisfit)}' cannot be converted ` +
      `to ${other.getType() ?? 'untyped'}; incoming values are added untyped`
    );
  }

  mergeScalars(target, other, policy, plan.adoptType);

  let appended = 0;
  let replaced = 0;
  let reconciled = 0;

  for (const step of plan.steps) {
    switch (step.kind) {
      case 'reconcile':
        reconcileValue(target, step.index, step.value, policy);
        reconciled++;
        break;
      case 'append': {
        const { content, ...init } = step.value.toInit();
        const copy = new Value({ ...init, content, type: step.type, unit: init.unit ?? target.getUnit(0) });
        if (target.appendValue(copy)) appended++;
        break;
      }
      case 'replace':
        if (target.setValueAt(step.value.content, 0)) {
          reconcileValue(target, 0, step.value, policy);
          replaced++;
        }
        break;
    }
  }

  log.debug(
    `Merged property '${target.getName()}' (${policy}): ` +
    `${reconciled} reconciled, ${appended} appended, ${replaced} replaced`
  );
  return { ok: true, appended, replaced, reconciled };
}
