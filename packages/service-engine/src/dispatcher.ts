import { randomUUID } from 'node:crypto';

import { CallTimeoutError, DispatchError } from './errors';
import { silentLogger, type Logger } from './logger';
import type { ServiceRegistry } from './registry';
import type { Result, ServiceCallContext, ServiceHandler, ValidatedArgs } from './types';
import { validateServiceArgs } from './validator';

export type DispatchResult<T = unknown> = Result<T, DispatchError>;

export interface ServiceDispatcherOptions {
  registry: ServiceRegistry;
  logger?: Logger;
  /** Applied to calls that do not pass their own `timeoutMs`. */
  defaultTimeoutMs?: number;
}

export interface CallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  callId?: string;
}

type Settled = { kind: 'value'; value: unknown } | { kind: 'error'; error: unknown } | { kind: 'timeout'; error: CallTimeoutError };

export class ServiceDispatcher {
  private readonly registry: ServiceRegistry;
  private readonly logger: Logger;
  private readonly defaultTimeoutMs?: number;

  constructor(options: ServiceDispatcherOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? silentLogger;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
  }

  /**
   * Looks up, validates and invokes one service. Every failure comes back as
   * a `DispatchError` value; nothing thrown by a handler escapes.
   */
  async call(serviceId: string, rawArgs: unknown, options: CallOptions = {}): Promise<DispatchResult> {
    const callId = options.callId ?? randomUUID();
    const log = this.logger.child({ serviceId, callId });

    const entry = this.registry.lookup(serviceId);
    if (!entry) {
      log.warn('Service not found');
      return { ok: false, error: DispatchError.serviceNotFound(serviceId) };
    }

    const validation = validateServiceArgs(entry.spec, rawArgs);
    if (!validation.ok) {
      log.warn(
        { code: validation.error.code, field: validation.error.field },
        'Service call rejected: invalid arguments'
      );
      return { ok: false, error: DispatchError.invalid(serviceId, validation.error) };
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const startedAt = Date.now();
    log.debug({ args: validation.value }, 'Invoking service handler');

    const settled = await this.invoke(entry.handler, validation.value, {
      serviceId,
      callId,
      timeoutMs,
      signal: options.signal
    });
    const durationMs = Date.now() - startedAt;

    switch (settled.kind) {
      case 'value':
        log.debug({ durationMs }, 'Service call succeeded');
        return { ok: true, value: settled.value };
      case 'timeout':
        log.warn({ durationMs, reason: settled.error.reason }, 'Service call timed out');
        return { ok: false, error: settled.error };
      case 'error':
        log.error({ err: settled.error, durationMs }, 'Service handler failed');
        return { ok: false, error: DispatchError.handlerFailed(serviceId, settled.error) };
    }
  }

  private async invoke(
    handler: ServiceHandler,
    args: ValidatedArgs,
    options: { serviceId: string; callId: string; timeoutMs?: number; signal?: AbortSignal }
  ): Promise<Settled> {
    const { serviceId, callId, timeoutMs, signal } = options;
    const controller = new AbortController();
    const context: ServiceCallContext = { serviceId, callId, signal: controller.signal };

    if (signal?.aborted) {
      return { kind: 'timeout', error: DispatchError.timeout(serviceId, 'aborted') };
    }

    const execution: Promise<Settled> = Promise.resolve()
      .then(() => handler(args, context))
      .then(
        (value): Settled => ({ kind: 'value', value }),
        (error: unknown): Settled => ({ kind: 'error', error })
      );

    if (timeoutMs === undefined && !signal) {
      return execution;
    }

    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;
    const interruption = new Promise<Settled>((resolve) => {
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          resolve({ kind: 'timeout', error: DispatchError.timeout(serviceId, 'elapsed', timeoutMs) });
        }, timeoutMs);
      }
      if (signal) {
        onAbort = () => resolve({ kind: 'timeout', error: DispatchError.timeout(serviceId, 'aborted') });
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });

    try {
      const outcome = await Promise.race([execution, interruption]);
      if (outcome.kind === 'timeout') {
        controller.abort(outcome.error);
        void execution.then((late) => {
          if (late.kind === 'error') {
            this.logger.debug({ serviceId, callId, err: late.error }, 'Handler failed after its call timed out');
          }
        });
      }
      return outcome;
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      if (signal && onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }
}
