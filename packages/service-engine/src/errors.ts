export class ServiceEngineError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ServiceEngineError';
    this.code = code;
  }
}

export type SchemaErrorCode =
  | 'invalid_definition'
  | 'invalid_default'
  | 'invalid_range'
  | 'duplicate_field_name'
  | 'duplicate_service_id';

/**
 * Raised while loading a service definition. Fatal to that one definition
 * only; the loader keeps going with the rest of the document.
 */
export class SchemaError extends ServiceEngineError {
  declare readonly code: SchemaErrorCode;
  readonly serviceId: string;
  readonly field?: string;
  readonly issues?: unknown;

  constructor(
    code: SchemaErrorCode,
    message: string,
    details: { serviceId: string; field?: string; issues?: unknown }
  ) {
    super(code, message);
    this.name = 'SchemaError';
    this.serviceId = details.serviceId;
    this.field = details.field;
    this.issues = details.issues;
  }
}

export type ValidationErrorCode =
  | 'invalid_arguments'
  | 'missing_field'
  | 'unknown_field'
  | 'invalid_type'
  | 'out_of_range'
  | 'invalid_step'
  | 'invalid_option';

export class ValidationError extends ServiceEngineError {
  declare readonly code: ValidationErrorCode;
  readonly field: string;
  readonly value?: unknown;

  constructor(code: ValidationErrorCode, field: string, message: string, value?: unknown) {
    super(code, message);
    this.name = 'ValidationError';
    this.field = field;
    this.value = value;
  }
}

export type DispatchErrorCode = 'service_not_found' | 'invalid_arguments' | 'handler_failed' | 'timeout';

export class DispatchError extends ServiceEngineError {
  declare readonly code: DispatchErrorCode;
  readonly serviceId: string;

  constructor(code: DispatchErrorCode, serviceId: string, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'DispatchError';
    this.serviceId = serviceId;
  }

  static serviceNotFound(serviceId: string): DispatchError {
    return new DispatchError('service_not_found', serviceId, `Service '${serviceId}' is not registered`);
  }

  static invalid(serviceId: string, validationError: ValidationError): InvalidArgumentsError {
    return new InvalidArgumentsError(serviceId, validationError);
  }

  static handlerFailed(serviceId: string, cause: unknown): DispatchError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new DispatchError('handler_failed', serviceId, `Handler for '${serviceId}' failed: ${reason}`, {
      cause
    });
  }

  static timeout(serviceId: string, reason: TimeoutReason, timeoutMs?: number): CallTimeoutError {
    return new CallTimeoutError(serviceId, reason, timeoutMs);
  }
}

export class InvalidArgumentsError extends DispatchError {
  declare readonly code: 'invalid_arguments';
  readonly validationError: ValidationError;

  constructor(serviceId: string, validationError: ValidationError) {
    super('invalid_arguments', serviceId, `Invalid arguments for '${serviceId}': ${validationError.message}`);
    this.name = 'InvalidArgumentsError';
    this.validationError = validationError;
  }
}

export type TimeoutReason = 'elapsed' | 'aborted';

export class CallTimeoutError extends DispatchError {
  declare readonly code: 'timeout';
  readonly reason: TimeoutReason;
  readonly timeoutMs?: number;

  constructor(serviceId: string, reason: TimeoutReason, timeoutMs?: number) {
    const message =
      reason === 'elapsed'
        ? `Call to '${serviceId}' timed out after ${timeoutMs}ms`
        : `Call to '${serviceId}' was aborted`;
    super('timeout', serviceId, message);
    this.name = 'CallTimeoutError';
    this.reason = reason;
    this.timeoutMs = timeoutMs;
  }
}

export class DefinitionParseError extends ServiceEngineError {
  readonly source?: string;

  constructor(message: string, source?: string, options?: { cause?: unknown }) {
    super('definition_parse_failed', source ? `${source}: ${message}` : message, options);
    this.name = 'DefinitionParseError';
    this.source = source;
  }
}

export class RegistryDisposedError extends ServiceEngineError {
  constructor() {
    super('registry_disposed', 'Service registry has been disposed');
    this.name = 'RegistryDisposedError';
  }
}
