import type {
  BooleanSelector,
  FieldValue,
  NumberSelector,
  Result,
  SelectSelector,
  SelectorKind,
  TextSelector
} from './types';

export const STEP_TOLERANCE = 1e-6;

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export type SelectorFailureCode = 'invalid_type' | 'out_of_range' | 'invalid_step' | 'invalid_option';

export interface SelectorFailure {
  code: SelectorFailureCode;
  message: string;
}

type SelectorResult<T extends FieldValue = FieldValue> = Result<T, SelectorFailure>;

const ok = <T extends FieldValue>(value: T): SelectorResult<T> => ({ ok: true, value });

const fail = (code: SelectorFailureCode, message: string): SelectorResult<never> => ({
  ok: false,
  error: { code, message }
});

const describeValue = (value: unknown): string => {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
};

export function coerceText(_selector: TextSelector, value: unknown): SelectorResult<string> {
  if (typeof value === 'string') {
    return ok(value);
  }
  if ((typeof value === 'number' && Number.isFinite(value)) || typeof value === 'boolean') {
    return ok(String(value));
  }
  return fail('invalid_type', `Expected text, received ${describeValue(value)}`);
}

export function coerceBoolean(_selector: BooleanSelector, value: unknown): SelectorResult<boolean> {
  if (typeof value === 'boolean') {
    return ok(value);
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') {
      return ok(true);
    }
    if (normalized === 'false') {
      return ok(false);
    }
    return fail('invalid_type', `Expected a boolean, received '${value}'`);
  }
  return fail('invalid_type', `Expected a boolean, received ${describeValue(value)}`);
}

function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Within `STEP_TOLERANCE`, widened to a few ulps of `value` at large magnitudes. */
export function isOnStep(value: number, step: number, base = 0): boolean {
  const steps = Math.round((value - base) / step);
  const tolerance = Math.max(STEP_TOLERANCE, Math.abs(value) * Number.EPSILON * 16);
  return Math.abs(value - (base + steps * step)) <= tolerance;
}

export function coerceNumber(selector: NumberSelector, value: unknown): SelectorResult<number> {
  const parsed = parseNumber(value);
  if (parsed === null) {
    const shown = typeof value === 'string' ? `'${value}'` : describeValue(value);
    return fail('invalid_type', `Expected a number, received ${shown}`);
  }
  if (selector.min !== undefined && parsed < selector.min) {
    return fail('out_of_range', `${parsed} is below the minimum of ${selector.min}`);
  }
  if (selector.max !== undefined && parsed > selector.max) {
    return fail('out_of_range', `${parsed} is above the maximum of ${selector.max}`);
  }
  if (selector.step !== undefined && !isOnStep(parsed, selector.step, selector.min ?? 0)) {
    return fail('invalid_step', `${parsed} is not a multiple of ${selector.step}`);
  }
  return ok(parsed);
}

export function coerceSelect(selector: SelectSelector, value: unknown): SelectorResult<string> {
  if (typeof value !== 'string') {
    return fail('invalid_type', `Expected one of ${selector.options.join(', ')}, received ${describeValue(value)}`);
  }
  if (!selector.options.includes(value)) {
    return fail('invalid_option', `'${value}' is not one of ${selector.options.join(', ')}`);
  }
  return ok(value);
}

export function validateSelectorValue(selector: SelectorKind, value: unknown): SelectorResult {
  switch (selector.type) {
    case 'text':
      return coerceText(selector, value);
    case 'boolean':
      return coerceBoolean(selector, value);
    case 'number':
      return coerceNumber(selector, value);
    case 'select':
      return coerceSelect(selector, value);
  }
}
