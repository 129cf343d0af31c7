import { ValidationError } from './errors';
import { validateSelectorValue } from './selectors';
import type { FieldValue, Result, ServiceSpec, ValidatedArgs } from './types';

export type ValidationResult = Result<ValidatedArgs, ValidationError>;

const hasOwn = (target: object, key: string): boolean => Object.prototype.hasOwnProperty.call(target, key);

function isArgumentRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(error: ValidationError): ValidationResult {
  return { ok: false, error };
}

/**
 * Checks raw caller arguments against a service's fields. Declared fields are
 * visited in order and the first failure is returned; undeclared keys are only
 * reported once every declared field has passed.
 */
export function validateServiceArgs(spec: ServiceSpec, raw: unknown): ValidationResult {
  const input = raw === undefined ? {} : raw;
  if (!isArgumentRecord(input)) {
    return invalid(
      new ValidationError(
        'invalid_arguments',
        '',
        `Arguments for '${spec.id}' must be an object`,
        input
      )
    );
  }

  const validated: Record<string, FieldValue> = {};

  for (const [name, field] of Object.entries(spec.fields)) {
    const value = hasOwn(input, name) ? input[name] : undefined;

    if (value === undefined) {
      if (field.required) {
        return invalid(new ValidationError('missing_field', name, `Field '${name}' is required`));
      }
      if (field.default !== undefined) {
        validated[name] = field.default;
      }
      continue;
    }

    const outcome = validateSelectorValue(field.selector, value);
    if (!outcome.ok) {
      return invalid(
        new ValidationError(outcome.error.code, name, `Field '${name}': ${outcome.error.message}`, value)
      );
    }
    validated[name] = outcome.value;
  }

  for (const key of Object.keys(input)) {
    if (!hasOwn(spec.fields, key) && input[key] !== undefined) {
      return invalid(
        new ValidationError('unknown_field', key, `Field '${key}' is not defined for '${spec.id}'`, input[key])
      );
    }
  }

  return { ok: true, value: Object.freeze(validated) };
}
