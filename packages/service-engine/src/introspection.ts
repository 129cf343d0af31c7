import { z, type ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import type { FieldSpec, FieldValue, SelectorKind, ServiceSpec } from './types';

export type WidgetKind = 'textbox' | 'textarea' | 'checkbox' | 'stepper' | 'slider' | 'dropdown';

export interface FieldWidget {
  field: string;
  widget: WidgetKind;
  label: string;
  description: string;
  required: boolean;
  default?: FieldValue;
  example?: string;
  min?: number;
  max?: number;
  step?: number;
  unit?: string;
  options?: string[];
}

export interface ServiceForm {
  serviceId: string;
  title: string;
  description: string;
  fields: FieldWidget[];
}

function widgetFor(selector: SelectorKind): WidgetKind {
  switch (selector.type) {
    case 'text':
      return selector.multiline ? 'textarea' : 'textbox';
    case 'boolean':
      return 'checkbox';
    case 'number':
      return selector.mode === 'slider' ? 'slider' : 'stepper';
    case 'select':
      return 'dropdown';
  }
}

export function describeField(field: FieldSpec): FieldWidget {
  const widget: FieldWidget = {
    field: field.name,
    widget: widgetFor(field.selector),
    label: field.displayName,
    description: field.description,
    required: field.required
  };
  if (field.default !== undefined) {
    widget.default = field.default;
  }
  if (field.example !== undefined) {
    widget.example = field.example;
  }

  const { selector } = field;
  if (selector.type === 'number') {
    if (selector.min !== undefined) {
      widget.min = selector.min;
    }
    if (selector.max !== undefined) {
      widget.max = selector.max;
    }
    if (selector.step !== undefined) {
      widget.step = selector.step;
    }
    if (selector.unitOfMeasurement !== undefined) {
      widget.unit = selector.unitOfMeasurement;
    }
  } else if (selector.type === 'select') {
    widget.options = [...selector.options];
  }
  return widget;
}

/** One input-widget description per field, in declaration order. */
export function describeServiceForm(spec: ServiceSpec): ServiceForm {
  return {
    serviceId: spec.id,
    title: spec.displayName,
    description: spec.description,
    fields: Object.values(spec.fields).map(describeField)
  };
}

function selectorSchema(selector: SelectorKind): ZodTypeAny {
  switch (selector.type) {
    case 'text':
      return z.string();
    case 'boolean':
      return z.boolean();
    case 'number': {
      let schema = z.number();
      if (selector.min !== undefined) {
        schema = schema.min(selector.min);
      }
      if (selector.max !== undefined) {
        schema = schema.max(selector.max);
      }
      if (selector.step !== undefined && (selector.min ?? 0) === 0) {
        schema = schema.multipleOf(selector.step);
      }
      return schema;
    }
    case 'select':
      return z.enum(selector.options);
  }
}

function fieldSchema(field: FieldSpec): ZodTypeAny {
  let schema = selectorSchema(field.selector);
  if (field.description) {
    schema = schema.describe(field.description);
  }
  if (field.required) {
    return schema;
  }
  if (field.default !== undefined) {
    return schema.default(field.default);
  }
  return schema.optional();
}

/** Zod mirror of a service's argument contract, used for schema export. */
export function buildServiceArgsSchema(spec: ServiceSpec) {
  const shape: Record<string, ZodTypeAny> = {};
  for (const field of Object.values(spec.fields)) {
    shape[field.name] = fieldSchema(field);
  }
  return z.object(shape).strict();
}

export interface ServiceJsonSchemaOptions {
  title?: string;
}

export const buildServiceArgsJsonSchema = (spec: ServiceSpec, options: ServiceJsonSchemaOptions = {}) =>
  zodToJsonSchema(buildServiceArgsSchema(spec), { name: options.title ?? spec.id });
