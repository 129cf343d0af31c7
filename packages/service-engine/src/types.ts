export type FieldValue = string | number | boolean;

export type TextSelector = {
  type: 'text';
  multiline: boolean;
};

export type BooleanSelector = {
  type: 'boolean';
};

export type NumberSelector = {
  type: 'number';
  min?: number;
  max?: number;
  step?: number;
  unitOfMeasurement?: string;
  mode?: 'box' | 'slider';
};

export type SelectSelector = {
  type: 'select';
  options: [string, ...string[]];
};

export type SelectorKind = TextSelector | BooleanSelector | NumberSelector | SelectSelector;

export type SelectorType = SelectorKind['type'];

export interface FieldSpec {
  name: string;
  displayName: string;
  description: string;
  required: boolean;
  default?: FieldValue;
  example?: string;
  selector: SelectorKind;
}

export interface ServiceSpec {
  id: string;
  displayName: string;
  description: string;
  /** Keyed by field name; key order only matters for display. */
  fields: Record<string, FieldSpec>;
}

export type ValidatedArgs = Readonly<Record<string, FieldValue>>;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface ServiceCallContext {
  serviceId: string;
  callId: string;
  signal: AbortSignal;
}

export type ServiceHandler<TResult = unknown> = (
  args: ValidatedArgs,
  context: ServiceCallContext
) => TResult | Promise<TResult>;

export interface RegisteredService {
  spec: ServiceSpec;
  handler: ServiceHandler;
  registeredAt: string;
}
