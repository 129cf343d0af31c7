import { describe, expect, test } from 'vitest';
import {
  coerceBoolean,
  coerceNumber,
  coerceSelect,
  coerceText,
  isOnStep,
  validateSelectorValue,
  type NumberSelector,
  type SelectSelector
} from '../src/index';

const weightSelector: NumberSelector = { type: 'number', min: 0, max: 10000, step: 0.1 };
const unitSelector: SelectSelector = { type: 'select', options: ['g', 'kg', 'oz', 'lb'] };

describe('text selector', () => {
  test('passes strings through unchanged', () => {
    expect(coerceText({ type: 'text', multiline: true }, '  Pinkie  ')).toEqual({ ok: true, value: '  Pinkie  ' });
  });

  test('stringifies finite numbers and booleans', () => {
    expect(coerceText({ type: 'text', multiline: false }, 42)).toEqual({ ok: true, value: '42' });
    expect(coerceText({ type: 'text', multiline: false }, false)).toEqual({ ok: true, value: 'false' });
  });

  test('rejects values with no string form', () => {
    for (const value of [null, { food: 'mouse' }, ['mouse'], Number.NaN]) {
      const result = coerceText({ type: 'text', multiline: false }, value);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('invalid_type');
      }
    }
  });
});

describe('boolean selector', () => {
  test('accepts native booleans and true/false strings in any case', () => {
    expect(coerceBoolean({ type: 'boolean' }, true)).toEqual({ ok: true, value: true });
    expect(coerceBoolean({ type: 'boolean' }, 'TRUE')).toEqual({ ok: true, value: true });
    expect(coerceBoolean({ type: 'boolean' }, 'False')).toEqual({ ok: true, value: false });
  });

  test('rejects other representations', () => {
    expect(coerceBoolean({ type: 'boolean' }, 'yes')).toEqual({
      ok: false,
      error: { code: 'invalid_type', message: "Expected a boolean, received 'yes'" }
    });
    expect(coerceBoolean({ type: 'boolean' }, 1)).toEqual({
      ok: false,
      error: { code: 'invalid_type', message: 'Expected a boolean, received number' }
    });
  });
});

describe('number selector', () => {
  test('accepts both bounds', () => {
    expect(coerceNumber(weightSelector, 0)).toEqual({ ok: true, value: 0 });
    expect(coerceNumber(weightSelector, 10000)).toEqual({ ok: true, value: 10000 });
  });

  test('rejects values outside the range', () => {
    expect(coerceNumber(weightSelector, -0.1)).toEqual({
      ok: false,
      error: { code: 'out_of_range', message: '-0.1 is below the minimum of 0' }
    });
    expect(coerceNumber(weightSelector, 10000.1)).toEqual({
      ok: false,
      error: { code: 'out_of_range', message: '10000.1 is above the maximum of 10000' }
    });
  });

  test('checks the step within tolerance', () => {
    expect(coerceNumber(weightSelector, 5.1)).toEqual({ ok: true, value: 5.1 });
    expect(coerceNumber(weightSelector, 5.05)).toEqual({
      ok: false,
      error: { code: 'invalid_step', message: '5.05 is not a multiple of 0.1' }
    });
  });

  test('parses numeric strings', () => {
    expect(coerceNumber(weightSelector, ' 150 ')).toEqual({ ok: true, value: 150 });
    expect(coerceNumber(weightSelector, '+.5')).toEqual({ ok: true, value: 0.5 });
    expect(coerceNumber(weightSelector, '1.5e2')).toEqual({ ok: true, value: 150 });
  });

  test('reports hex and binary strings as a type mismatch', () => {
    expect(coerceNumber({ type: 'number' }, '0x10')).toEqual({
      ok: false,
      error: { code: 'invalid_type', message: "Expected a number, received '0x10'" }
    });
  });

  test('rejects non-numeric input', () => {
    for (const value of ['heavy', '', true, Number.POSITIVE_INFINITY, null, '0x10', '0b11', '0o7', 'Infinity']) {
      const result = coerceNumber(weightSelector, value);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('invalid_type');
      }
    }
  });

  test('measures steps from the minimum', () => {
    const selector: NumberSelector = { type: 'number', min: 1, step: 2 };
    expect(coerceNumber(selector, 5).ok).toBe(true);
    expect(coerceNumber(selector, 4)).toEqual({
      ok: false,
      error: { code: 'invalid_step', message: '4 is not a multiple of 2' }
    });
  });

  test('applies no bounds when none are declared', () => {
    expect(coerceNumber({ type: 'number' }, -12.345)).toEqual({ ok: true, value: -12.345 });
  });

  test('isOnStep tolerates floating-point drift', () => {
    expect(isOnStep(0.3, 0.1)).toBe(true);
    expect(isOnStep(0.35, 0.1)).toBe(false);
  });

  test('isOnStep scales its tolerance with large magnitudes', () => {
    expect(isOnStep(1e15 + 1, 0.1)).toBe(true);
    expect(coerceNumber({ type: 'number', step: 0.1 }, 1e15 + 1)).toEqual({ ok: true, value: 1e15 + 1 });
    expect(isOnStep(1e12 + 0.5, 1)).toBe(false);
  });
});

describe('select selector', () => {
  test('accepts an exact option', () => {
    expect(coerceSelect(unitSelector, 'kg')).toEqual({ ok: true, value: 'kg' });
  });

  test('rejects strings outside the options', () => {
    expect(coerceSelect(unitSelector, 'ml')).toEqual({
      ok: false,
      error: { code: 'invalid_option', message: "'ml' is not one of g, kg, oz, lb" }
    });
    expect(coerceSelect(unitSelector, 'KG').ok).toBe(false);
  });

  test('rejects non-string values as a type mismatch', () => {
    const result = coerceSelect(unitSelector, 1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('invalid_type');
    }
  });
});

test('validateSelectorValue routes on the selector type', () => {
  expect(validateSelectorValue({ type: 'boolean' }, 'true')).toEqual({ ok: true, value: true });
  expect(validateSelectorValue(weightSelector, '2.5')).toEqual({ ok: true, value: 2.5 });
  expect(validateSelectorValue(unitSelector, 'oz')).toEqual({ ok: true, value: 'oz' });
  expect(validateSelectorValue({ type: 'text', multiline: false }, 'cricket')).toEqual({ ok: true, value: 'cricket' });
});
