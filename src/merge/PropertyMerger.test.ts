/**
 * Tests for the property merge engine.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Property } from '../odml/Property.js';
import { checkMergePreconditions, mergeProperties, sameTerminologyEntry } from './PropertyMerger.js';
import type { MergePolicy } from './types.js';

describe('mergeProperties', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('preconditions', () => {
    it('refuses differing types and changes neither side', () => {
      const target = new Property('Count', { type: 'int', values: [1] });
      const other = new Property('Count', { type: 'float', values: [2.5] });

      const result = mergeProperties(target, other, 'COMBINE');

      expect(result).toEqual({
        ok: false,
        conflict: 'type',
        message: "cannot merge property 'Count' of type 'int' with type 'float'",
      });
      expect(target.getValues()).toEqual([1]);
      expect(target.getType()).toBe('int');
      expect(other.getValues()).toEqual([2.5]);
    });

    it('logs the refusal', () => {
      const error = vi.mocked(console.error);

      mergeProperties(new Property('Count', { type: 'int' }), new Property('Count', { type: 'float' }), 'COMBINE');

      expect(error).toHaveBeenCalledWith(
        "[odml:merge] Merge error: cannot merge property 'Count' of type 'int' with type 'float'"
      );
    });

    it('compares names case-insensitively', () => {
      expect(checkMergePreconditions(new Property('Rate'), new Property('rate'))).toBeNull();

      const result = checkMergePreconditions(new Property('Rate'), new Property('Gain'));
      expect(result?.ok === false ? result.conflict : null).toBe('name');
    });

    it('refuses mappings into different terminology documents', () => {
      const target = new Property('Rate', { mapping: 'https://terms.example.org/a.yaml#Rate' });
      const sameDocument = new Property('Rate', { mapping: 'https://terms.example.org/a.yaml#SamplingRate' });
      const otherDocument = new Property('Rate', { mapping: 'https://terms.example.org/b.yaml#Rate' });

      expect(checkMergePreconditions(target, sameDocument)).toBeNull();
      const result = checkMergePreconditions(target, otherDocument);
      expect(result?.ok === false ? result.conflict : null).toBe('mapping');
    });

    it('compares definitions case-insensitively', () => {
      const target = new Property('Rate', { definition: 'Sampling rate' });

      expect(checkMergePreconditions(target, new Property('Rate', { definition: 'SAMPLING RATE' }))).toBeNull();
      const result = checkMergePreconditions(target, new Property('Rate', { definition: 'Gain' }));
      expect(result?.ok === false ? result.conflict : null).toBe('definition');
    });

    it('compares units case-insensitively', () => {
      const target = new Property('Voltage', { type: 'float', unit: 'mV', values: [1] });

      expect(checkMergePreconditions(target, new Property('Voltage', { type: 'float', unit: 'MV', values: [2] }))).toBeNull();
      const result = checkMergePreconditions(target, new Property('Voltage', { type: 'float', unit: 'V', values: [2] }));
      expect(result?.ok === false ? result.conflict : null).toBe('unit');
    });
  });

  describe('scalar fields', () => {
    it('fills in what the target lacks', () => {
      const target = new Property('Rate', { values: [1] });
      const other = new Property('Rate', {
        definition: 'The rate',
        type: 'int',
        unit: 'Hz',
        mapping: 'https://terms.example.org/ephys.yaml#Rate',
        dependency: 'Mode',
        dependencyValue: 'continuous',
        values: [1],
      });

      const result = mergeProperties(target, other, 'THIS_OVERRIDES_OTHER');

      expect(result).toEqual({ ok: true, appended: 0, replaced: 0, reconciled: 1 });
      expect(target.getDefinition()).toBe('The rate');
      expect(target.getType()).toBe('int');
      expect(target.getValues()).toEqual([1]);
      expect(target.getUnit()).toBe('Hz');
      expect(target.getMapping()?.href).toBe('https://terms.example.org/ephys.yaml#Rate');
      expect(target.getMapping()).not.toBe(other.getMapping());
      expect(target.getDependency()).toBe('Mode');
      expect(target.getDependencyValue()).toBe('continuous');
    });

    it.each<[MergePolicy, string, string]>([
      ['THIS_OVERRIDES_OTHER', 'Mode', 'continuous'],
      ['COMBINE', 'Mode', 'continuous'],
      ['OTHER_OVERRIDES_THIS', 'Protocol', 'pulsed'],
    ])('resolves dependencies under %s', (policy, dependency, dependencyValue) => {
      const target = new Property('Gain', { dependency: 'Mode', dependencyValue: 'continuous' });
      const other = new Property('Gain', { dependency: 'Protocol', dependencyValue: 'pulsed' });

      mergeProperties(target, other, policy);

      expect(target.getDependency()).toBe(dependency);
      expect(target.getDependencyValue()).toBe(dependencyValue);
    });

    it('overrides the dependency value on its own', () => {
      const target = new Property('Gain', { dependency: 'Mode', dependencyValue: 'continuous' });
      const other = new Property('Gain', { dependencyValue: 'pulsed' });

      mergeProperties(target, other, 'OTHER_OVERRIDES_THIS');

      expect(target.getDependency()).toBe('Mode');
      expect(target.getDependencyValue()).toBe('pulsed');
    });
  });

  describe('COMBINE', () => {
    it('appends the values the target lacks', () => {
      const target = new Property('Electrode', { type: 'text', values: ['a', 'b'] });
      const other = new Property('Electrode', { type: 'text', values: ['c'] });

      const result = mergeProperties(target, other, 'COMBINE');

      expect(result).toEqual({ ok: true, appended: 1, replaced: 0, reconciled: 0 });
      expect(target.getValues()).toEqual(['a', 'b', 'c']);
    });

    it('adds no duplicates when repeated', () => {
      const target = new Property('Electrode', { type: 'text', values: ['a', 'b'] });
      const other = new Property('Electrode', { type: 'text', values: ['c'] });

      mergeProperties(target, other, 'COMBINE');
      const again = mergeProperties(target, other, 'COMBINE');

      expect(again).toEqual({ ok: true, appended: 0, replaced: 0, reconciled: 1 });
      expect(target.getValues()).toEqual(['a', 'b', 'c']);
    });

    it('never changes the other property', () => {
      const target = new Property('Electrode', { values: ['a'] });
      const other = new Property('Electrode', { values: ['c'] });

      mergeProperties(target, other, 'COMBINE');

      expect(other.getValues()).toEqual(['c']);
      expect(other.getWholeValue(0)?.property).toBe(other);
      expect(target.getWholeValue(1)?.property).toBe(target);
    });

    it('concatenates value definitions on every merge', () => {
      const target = new Property('Electrode', { values: [{ content: 'a', definition: 'first' }] });
      const other = new Property('Electrode', { values: [{ content: 'a', definition: 'second' }] });

      mergeProperties(target, other, 'COMBINE');
      expect(target.getValueDefinition(0)).toBe('first\nsecond');

      mergeProperties(target, other, 'COMBINE');
      expect(target.getValueDefinition(0)).toBe('first\nsecond\nsecond');
    });

    it('doubles the definition of an appended value on the second merge', () => {
      const target = new Property('Electrode', { values: ['x'] });
      const other = new Property('Electrode', { values: [{ content: 'y', definition: 'd' }] });

      mergeProperties(target, other, 'COMBINE');
      expect(target.getValueDefinition(1)).toBe('d');

      mergeProperties(target, other, 'COMBINE');
      expect(target.getValueDefinition(1)).toBe('d\nd');
    });

    it('carries side fields and the local unit onto appended values', () => {
      const target = new Property('Voltage', { type: 'float', unit: 'mV', values: [1] });
      const other = new Property('Voltage', {
        type: 'float',
        values: [{ content: 2, reference: 'r', uncertainty: 0.1, definition: 'second' }],
      });

      mergeProperties(target, other, 'COMBINE');

      expect(target.getValues()).toEqual([1, 2]);
      expect(target.getUnit(1)).toBe('mV');
      expect(target.getValueReference(1)).toBe('r');
      expect(target.getValueUncertainty(1)).toBe(0.1);
      expect(target.getValueDefinition(1)).toBe('second');
    });
  });

  describe('one-sided types', () => {
    it('types untyped local values that fit the incoming type', () => {
      const target = new Property('Count', { values: ['5'] });
      const other = new Property('Count', { type: 'int', values: [5, 6] });

      const result = mergeProperties(target, other, 'COMBINE');

      expect(result).toEqual({ ok: true, appended: 1, replaced: 0, reconciled: 1 });
      expect(target.getType()).toBe('int');
      expect(target.getValues()).toEqual([5, 6]);
    });

    it('unites untyped local values with typed incoming ones', () => {
      const warn = vi.mocked(console.warn);
      const target = new Property('Count', { values: ['abc'] });
      const other = new Property('Count', { type: 'int', values: [1] });

      const result = mergeProperties(target, other, 'COMBINE');

      expect(result).toEqual({ ok: true, appended: 1, replaced: 0, reconciled: 0 });
      expect(target.getValues()).toEqual(['abc', 1]);
      expect(target.getType()).toBeNull();
      expect(target.getWholeValue(1)?.type).toBeNull();
      expect(warn).toHaveBeenCalledWith(
        "[odml:merge] Property 'Count' stays untyped: value 'abc' cannot be converted to int; incoming values are added untyped"
      );

      expect(mergeProperties(target, other, 'COMBINE')).toEqual({ ok: true, appended: 0, replaced: 0, reconciled: 1 });
      expect(target.getValues()).toEqual(['abc', 1]);
    });

    it('appends untyped incoming values that do not fit the local type', () => {
      const warn = vi.mocked(console.warn);
      const target = new Property('Count', { type: 'int', values: [1] });
      const other = new Property('Count', { definition: 'How many', values: ['2', 'many'] });

      const result = mergeProperties(target, other, 'COMBINE');

      expect(result).toEqual({ ok: true, appended: 2, replaced: 0, reconciled: 0 });
      expect(target.getValues()).toEqual([1, 2, 'many']);
      expect(target.getType()).toBe('int');
      expect(target.getWholeValue(1)?.type).toBe('int');
      expect(target.getWholeValue(2)?.type).toBeNull();
      expect(target.getDefinition()).toBe('How many');
      expect(warn).toHaveBeenCalledWith(
        "[odml:property] Property 'Count': type of newly added value (untyped) differs from the property type (int); index of the new value is 2"
      );
    });
  });

  describe('value placement', () => {
    it('refuses a replacement that does not fit and changes nothing', () => {
      const target = new Property('Count', { type: 'int', values: [1] });
      const other = new Property('Count', {
        definition: 'd',
        type: 'int',
        values: [2, { content: 'x', type: 'text' }],
      });

      const result = mergeProperties(target, other, 'OTHER_OVERRIDES_THIS');

      expect(result).toEqual({
        ok: false,
        conflict: 'value',
        message: "incoming value 'x' cannot replace the int value of property 'Count'",
      });
      expect(target.getValues()).toEqual([1]);
      expect(target.getDefinition()).toBeNull();
    });

    it('appends a mismatching incoming value under COMBINE', () => {
      const target = new Property('Count', { type: 'int', values: [1] });
      const other = new Property('Count', { type: 'int', values: [2, { content: 'x', type: 'text' }] });

      const result = mergeProperties(target, other, 'COMBINE');

      expect(result).toEqual({ ok: true, appended: 2, replaced: 0, reconciled: 0 });
      expect(target.getValues()).toEqual([1, 2, 'x']);
      expect(target.getWholeValue(2)?.type).toBe('text');
    });
  });

  describe('value reconciliation', () => {
    function pair(otherReference: string | null = 'r2'): [Property, Property] {
      return [
        new Property('Electrode', { values: [{ content: 'a', definition: 'mine', reference: 'r1' }] }),
        new Property('Electrode', {
          values: [{ content: 'a', definition: 'theirs', uncertainty: 0.5, reference: otherReference }],
        }),
      ];
    }

    it.each<[MergePolicy, string, string]>([
      ['THIS_OVERRIDES_OTHER', 'mine', 'r1'],
      ['OTHER_OVERRIDES_THIS', 'theirs', 'r2'],
      ['COMBINE', 'mine\ntheirs', 'r1'],
    ])('resolves side fields under %s', (policy, definition, reference) => {
      const [target, other] = pair();

      const result = mergeProperties(target, other, policy);

      expect(result).toEqual({ ok: true, appended: 0, replaced: 0, reconciled: 1 });
      expect(target.getValueDefinition(0)).toBe(definition);
      expect(target.getValueReference(0)).toBe(reference);
      expect(target.getValueUncertainty(0)).toBe(0.5);
    });

    it('keeps local fields the other side leaves empty', () => {
      const [target, other] = pair(null);

      mergeProperties(target, other, 'OTHER_OVERRIDES_THIS');

      expect(target.getValueReference(0)).toBe('r1');
    });

    it('fills in file names of binary values', () => {
      const target = new Property('Trace', { type: 'binary', values: ['AAA='] });
      const other = new Property('Trace', { type: 'binary', values: [{ content: 'AAA=', filename: 'trace.bin' }] });

      mergeProperties(target, other, 'THIS_OVERRIDES_OTHER');

      expect(target.getValueFilename(0)).toBe('trace.bin');
    });

    it('reconciles text values without file name errors', () => {
      const error = vi.mocked(console.error);
      const target = new Property('Electrode', { type: 'text', values: ['a'] });
      const other = new Property('Electrode', { type: 'text', values: [{ content: 'a', filename: 'a.txt' }, 'b'] });

      const result = mergeProperties(target, other, 'COMBINE');

      expect(result).toEqual({ ok: true, appended: 1, replaced: 0, reconciled: 1 });
      expect(target.getValueFilename(0)).toBeNull();
      expect(error).not.toHaveBeenCalled();
    });
  });

  describe('unmatched values without COMBINE', () => {
    it('replaces a single local value under OTHER_OVERRIDES_THIS', () => {
      const target = new Property('Electrode', {
        type: 'text',
        values: [{ content: 'old', definition: 'd-old', reference: 'r-old' }],
      });
      const other = new Property('Electrode', { type: 'text', values: [{ content: 'new', definition: 'd-new' }] });

      const result = mergeProperties(target, other, 'OTHER_OVERRIDES_THIS');

      expect(result).toEqual({ ok: true, appended: 0, replaced: 1, reconciled: 0 });
      expect(target.getValues()).toEqual(['new']);
      expect(target.getValueDefinition(0)).toBe('d-new');
      expect(target.getValueReference(0)).toBe('r-old');
    });

    it('lets the last incoming value win a single slot', () => {
      const target = new Property('Electrode', { values: ['a'] });
      const other = new Property('Electrode', { values: ['x', 'y'] });

      const result = mergeProperties(target, other, 'OTHER_OVERRIDES_THIS');

      expect(result).toEqual({ ok: true, appended: 0, replaced: 2, reconciled: 0 });
      expect(target.getValues()).toEqual(['y']);
    });

    it('leaves multi-valued targets alone under OTHER_OVERRIDES_THIS', () => {
      const target = new Property('Electrode', { values: ['a', 'b'] });
      const other = new Property('Electrode', { values: ['c'] });

      const result = mergeProperties(target, other, 'OTHER_OVERRIDES_THIS');

      expect(result).toEqual({ ok: true, appended: 0, replaced: 0, reconciled: 0 });
      expect(target.getValues()).toEqual(['a', 'b']);
    });

    it('drops unmatched values under THIS_OVERRIDES_OTHER', () => {
      const target = new Property('Electrode', { values: ['a'] });
      const other = new Property('Electrode', { values: ['b'] });

      mergeProperties(target, other, 'THIS_OVERRIDES_OTHER');

      expect(target.getValues()).toEqual(['a']);
    });
  });

  it('is reachable from Property.merge', () => {
    const target = new Property('Electrode', { values: ['a'] });

    expect(target.merge(new Property('Electrode', { values: ['b'] }), 'COMBINE').ok).toBe(true);
    expect(target.getValues()).toEqual(['a', 'b']);
  });
});

describe('sameTerminologyEntry', () => {
  it('ignores the fragment', () => {
    expect(sameTerminologyEntry(
      new URL('https://terms.example.org/a.yaml#Rate'),
      new URL('https://terms.example.org/a.yaml#Gain')
    )).toBe(true);
    expect(sameTerminologyEntry(
      new URL('https://terms.example.org/a.yaml'),
      new URL('https://terms.example.org/b.yaml')
    )).toBe(false);
  });
});
