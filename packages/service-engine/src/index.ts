export type {
  BooleanSelector,
  FieldSpec,
  FieldValue,
  NumberSelector,
  RegisteredService,
  Result,
  SelectSelector,
  SelectorKind,
  SelectorType,
  ServiceCallContext,
  ServiceHandler,
  ServiceSpec,
  TextSelector,
  ValidatedArgs
} from './types';
export {
  ServiceEngineError,
  SchemaError,
  ValidationError,
  DispatchError,
  InvalidArgumentsError,
  CallTimeoutError,
  DefinitionParseError,
  RegistryDisposedError
} from './errors';
export type {
  SchemaErrorCode,
  ValidationErrorCode,
  DispatchErrorCode,
  TimeoutReason
} from './errors';
export {
  STEP_TOLERANCE,
  coerceText,
  coerceBoolean,
  coerceNumber,
  coerceSelect,
  isOnStep,
  validateSelectorValue
} from './selectors';
export type { SelectorFailure, SelectorFailureCode } from './selectors';
export { validateServiceArgs } from './validator';
export type { ValidationResult } from './validator';
export {
  serviceIdSchema,
  fieldKeySchema,
  selectorDefinitionSchema,
  fieldDefinitionSchema,
  keyedFieldDefinitionSchema,
  serviceDefinitionSchema
} from './schema';
export type { FieldDefinition, KeyedFieldDefinition, ServiceDefinition } from './schema';
export {
  loadServiceSpecs,
  parseServiceDefinitions,
  readServiceDefinitionsFile,
  readServiceDefinitionFiles
} from './loader';
export type { LoadServiceSpecsOptions, ServiceSpecLoadResult, ServiceDefinitionFile } from './loader';
export { ServiceRegistry } from './registry';
export type { ServiceRegistryOptions, RegisterServiceOptions, ServiceHandlerMap } from './registry';
export { ServiceDispatcher } from './dispatcher';
export type { DispatchResult, ServiceDispatcherOptions, CallOptions } from './dispatcher';
export {
  describeField,
  describeServiceForm,
  buildServiceArgsSchema,
  buildServiceArgsJsonSchema
} from './introspection';
export type { FieldWidget, ServiceForm, WidgetKind, ServiceJsonSchemaOptions } from './introspection';
export { createLogger, createLoggerOptions, silentLogger } from './logger';
export type { Logger, CreateLoggerOptions } from './logger';
