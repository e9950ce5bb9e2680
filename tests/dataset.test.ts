/**
 * Dataset Tests
 *
 * Tagged values, dataset construction and the schema policy
 */

import { describe, it, expect } from 'vitest';
import {
  asBoolean,
  asNumber,
  isMissing,
  toRaw,
  toScalar,
  valueKey,
} from '../src/dataset/values.js';
import { buildDataset } from '../src/dataset/dataset.js';
import { EmptyDatasetError, MalformedRowError } from '../src/core/errors.js';

describe('Scalar values', () => {
  it('should tag raw JSON scalars', () => {
    expect(toScalar(3)).toEqual({ kind: 'number', value: 3 });
    expect(toScalar('x')).toEqual({ kind: 'text', value: 'x' });
    expect(toScalar(false)).toEqual({ kind: 'bool', value: false });
    expect(toScalar(null)).toEqual({ kind: 'null' });
    expect(toScalar(undefined)).toEqual({ kind: 'null' });
  });

  it('should treat non-finite numbers as null', () => {
    expect(toScalar(Number.NaN)).toEqual({ kind: 'null' });
  });

  it('should treat null and blank text as missing', () => {
    expect(isMissing(toScalar(null))).toBe(true);
    expect(isMissing(toScalar('   '))).toBe(true);
    expect(isMissing(toScalar(0))).toBe(false);
    expect(isMissing(toScalar(false))).toBe(false);
  });

  it('should read numbers from numeric text', () => {
    expect(asNumber(toScalar(' 42 '))).toBe(42);
    expect(asNumber(toScalar('3.5e2'))).toBe(350);
    expect(asNumber(toScalar('abc'))).toBeUndefined();
    expect(asNumber(toScalar('Infinity'))).toBeUndefined();
    expect(asNumber(toScalar(true))).toBeUndefined();
  });

  it('should only read decimal and exponent notation from text', () => {
    expect(asNumber(toScalar('-.5'))).toBe(-0.5);
    expect(asNumber(toScalar('+7.'))).toBe(7);
    expect(asNumber(toScalar('0x1F'))).toBeUndefined();
    expect(asNumber(toScalar('0b101'))).toBeUndefined();
    expect(asNumber(toScalar('0o17'))).toBeUndefined();
    expect(asNumber(toScalar('1_000'))).toBeUndefined();
  });

  it('should read booleans from bool values and true/false text', () => {
    expect(asBoolean(toScalar(true))).toBe(true);
    expect(asBoolean(toScalar('FALSE'))).toBe(false);
    expect(asBoolean(toScalar('yes'))).toBeUndefined();
  });

  it('should distinguish kinds in value keys', () => {
    expect(valueKey(toScalar(1))).not.toBe(valueKey(toScalar('1')));
    expect(valueKey(toScalar('a'))).toBe(valueKey(toScalar('a')));
  });

  it('should convert back to raw scalars', () => {
    expect(toRaw(toScalar('x'))).toBe('x');
    expect(toRaw(toScalar(null))).toBeNull();
  });
});

describe('buildDataset', () => {
  it('should build a frozen dataset from consistent rows', () => {
    const dataset = buildDataset('d', [{ a: 1, b: 'x' }, { b: 'y', a: 2 }], { schemaPolicy: 'drop' });

    expect(dataset.columns).toEqual(['a', 'b']);
    expect(dataset.rows).toHaveLength(2);
    expect(dataset.rows[1].a).toEqual({ kind: 'number', value: 2 });
    expect(dataset.droppedRowCount).toBe(0);
    expect(Object.isFrozen(dataset.rows)).toBe(true);
    expect(Object.isFrozen(dataset.rows[0])).toBe(true);
  });

  it('should fail on an empty row list', () => {
    expect(() => buildDataset('d', [], { schemaPolicy: 'drop' })).toThrow(EmptyDatasetError);
  });

  it('should fail when rows have no columns', () => {
    expect(() => buildDataset('d', [{}, {}], { schemaPolicy: 'drop' })).toThrow(EmptyDatasetError);
  });

  it('should drop rows that disagree with the majority schema', () => {
    const dataset = buildDataset(
      'd',
      [{ a: 1, b: 2 }, { a: 1 }, { a: 2, b: 3 }],
      { schemaPolicy: 'drop' }
    );

    expect(dataset.columns).toEqual(['a', 'b']);
    expect(dataset.rows).toHaveLength(2);
    expect(dataset.droppedRowCount).toBe(1);
  });

  it('should not let empty rows decide the schema', () => {
    const dataset = buildDataset('d', [{}, {}, { a: 1 }], { schemaPolicy: 'drop' });
    expect(dataset.columns).toEqual(['a']);
    expect(dataset.rows).toHaveLength(1);
    expect(dataset.droppedRowCount).toBe(2);
  });

  it('should break schema ties by first appearance', () => {
    const dataset = buildDataset('d', [{ a: 1 }, { b: 2 }], { schemaPolicy: 'drop' });
    expect(dataset.columns).toEqual(['a']);
    expect(dataset.droppedRowCount).toBe(1);
  });

  it('should reject the run under the reject policy', () => {
    try {
      buildDataset('d', [{ a: 1, b: 2 }, { a: 1 }, { a: 2, b: 3 }], { schemaPolicy: 'reject' });
      expect.unreachable('buildDataset should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedRowError);
      if (error instanceof MalformedRowError) {
        expect(error.rowIndex).toBe(1);
      }
    }
  });
});
