import { z } from 'zod';

import type { SchemaErrorCode } from './errors';
import { validateSelectorValue } from './selectors';
import type { FieldValue, SelectorKind, SelectorType } from './types';

const IDENTIFIER_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9._-]*$/;

export const serviceIdSchema = z
  .string()
  .min(1, 'Service id must not be empty')
  .max(120, 'Service id must be at most 120 characters long')
  .regex(
    IDENTIFIER_PATTERN,
    'Service id must start with an alphanumeric character and contain only alphanumerics, dot, underscore, or dash'
  );

export const fieldKeySchema = z
  .string()
  .min(1, 'Field name must not be empty')
  .max(120, 'Field name must be at most 120 characters long')
  .regex(
    IDENTIFIER_PATTERN,
    'Field name must start with an alphanumeric character and contain only alphanumerics, dot, underscore, or dash'
  );

export const fieldValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const textSelectorSchema = z
  .object({
    multiline: z.boolean().optional()
  })
  .strict();

const booleanSelectorSchema = z.object({}).strict();

const numberSelectorSchema = z
  .object({
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
    step: z.number().finite().optional(),
    unit_of_measurement: z.string().optional(),
    mode: z.enum(['box', 'slider']).optional()
  })
  .strict();

const selectSelectorSchema = z
  .object({
    options: z.array(z.string().min(1, 'Select options must not be empty strings')).nonempty(
      'Select selector needs at least one option'
    )
  })
  .strict();

const SELECTOR_TYPES: readonly SelectorType[] = ['text', 'boolean', 'number', 'select'];

/**
 * `selector` blocks name their kind as the single key, e.g. `{ number: { min: 0 } }`.
 * Kinds without parameters may be left empty (`text:` parses to null).
 */
export const selectorDefinitionSchema = z
  .object({
    text: textSelectorSchema.nullish(),
    boolean: booleanSelectorSchema.nullish(),
    number: numberSelectorSchema.nullish(),
    select: selectSelectorSchema.optional()
  })
  .strict()
  .transform((value, ctx): SelectorKind => {
    const declared = SELECTOR_TYPES.filter((type) => type in value);
    if (declared.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Selector must declare exactly one of ${SELECTOR_TYPES.join(', ')}`,
        fatal: true
      });
      return z.NEVER;
    }

    switch (declared[0]) {
      case 'text':
        return { type: 'text', multiline: value.text?.multiline ?? false };
      case 'boolean':
        return { type: 'boolean' };
      case 'number': {
        const params = value.number ?? {};
        return {
          type: 'number',
          ...(params.min !== undefined ? { min: params.min } : {}),
          ...(params.max !== undefined ? { max: params.max } : {}),
          ...(params.step !== undefined ? { step: params.step } : {}),
          ...(params.unit_of_measurement !== undefined
            ? { unitOfMeasurement: params.unit_of_measurement }
            : {}),
          ...(params.mode !== undefined ? { mode: params.mode } : {})
        };
      }
      default: {
        if (!value.select) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'Select selector needs an options list',
            fatal: true
          });
          return z.NEVER;
        }
        return { type: 'select', options: value.select.options };
      }
    }
  });

function addSchemaIssue(
  ctx: z.RefinementCtx,
  schemaCode: SchemaErrorCode,
  message: string,
  path: Array<string | number> = []
): void {
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message,
    path,
    params: { schemaCode }
  });
}

function defaultTypeMatches(selector: SelectorKind, value: FieldValue): boolean {
  switch (selector.type) {
    case 'boolean':
      return typeof value === 'boolean';
    case 'number':
      return typeof value === 'number';
    case 'text':
    case 'select':
      return typeof value === 'string';
  }
}

type FieldDefinitionOutput = {
  required: boolean;
  default?: FieldValue;
  selector: SelectorKind;
};

function refineFieldDefinition(field: FieldDefinitionOutput, ctx: z.RefinementCtx): void {
  const { selector } = field;

  if (selector.type === 'number') {
    if (selector.min !== undefined && selector.max !== undefined && selector.min > selector.max) {
      addSchemaIssue(ctx, 'invalid_range', `min (${selector.min}) must not exceed max (${selector.max})`, [
        'selector',
        'number'
      ]);
    }
    if (selector.step !== undefined && selector.step <= 0) {
      addSchemaIssue(ctx, 'invalid_range', `step must be greater than 0, received ${selector.step}`, [
        'selector',
        'number',
        'step'
      ]);
    }
  }

  if (selector.type === 'select') {
    const seen = new Set<string>();
    for (const option of selector.options) {
      if (seen.has(option)) {
        addSchemaIssue(ctx, 'invalid_definition', `Select option '${option}' is listed more than once`, [
          'selector',
          'select',
          'options'
        ]);
        break;
      }
      seen.add(option);
    }
  }

  if (field.default === undefined) {
    return;
  }

  if (field.required) {
    addSchemaIssue(ctx, 'invalid_default', 'A required field cannot declare a default', ['default']);
    return;
  }

  if (!defaultTypeMatches(selector, field.default)) {
    addSchemaIssue(
      ctx,
      'invalid_default',
      `Default ${JSON.stringify(field.default)} does not match the ${selector.type} selector`,
      ['default']
    );
    return;
  }

  const checked = validateSelectorValue(selector, field.default);
  if (!checked.ok) {
    addSchemaIssue(ctx, 'invalid_default', `Default is not accepted by its selector: ${checked.error.message}`, [
      'default'
    ]);
  }
}

const fieldDefinitionShape = {
  name: z.string().trim().min(1).optional(),
  description: z.string().nullish(),
  required: z.boolean().default(false),
  default: fieldValueSchema.optional(),
  example: fieldValueSchema.transform((value) => String(value)).optional(),
  selector: selectorDefinitionSchema
};

export const fieldDefinitionSchema = z.object(fieldDefinitionShape).superRefine(refineFieldDefinition);

export const keyedFieldDefinitionSchema = z
  .object({
    key: fieldKeySchema,
    ...fieldDefinitionShape
  })
  .superRefine(refineFieldDefinition);

export const serviceDefinitionSchema = z.object({
  name: z.string().trim().min(1).optional(),
  description: z.string().nullish(),
  fields: z.unknown().optional()
});

export type FieldDefinition = z.infer<typeof fieldDefinitionSchema>;
export type KeyedFieldDefinition = z.infer<typeof keyedFieldDefinitionSchema>;
export type ServiceDefinition = z.infer<typeof serviceDefinitionSchema>;

const SCHEMA_ERROR_CODES: readonly SchemaErrorCode[] = [
  'invalid_definition',
  'invalid_default',
  'invalid_range',
  'duplicate_field_name',
  'duplicate_service_id'
];

function isSchemaErrorCode(value: unknown): value is SchemaErrorCode {
  return SCHEMA_ERROR_CODES.some((code) => code === value);
}

export function schemaCodeForIssue(issue: z.ZodIssue): SchemaErrorCode {
  if (issue.code === z.ZodIssueCode.custom) {
    const code: unknown = issue.params?.schemaCode;
    if (isSchemaErrorCode(code)) {
      return code;
    }
  }
  return 'invalid_definition';
}

export function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}
