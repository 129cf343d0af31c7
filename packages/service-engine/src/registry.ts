import { EventEmitter } from 'node:events';

import { RegistryDisposedError, SchemaError } from './errors';
import { silentLogger, type Logger } from './logger';
import type { RegisteredService, ServiceHandler, ServiceSpec } from './types';

export interface ServiceRegistryOptions {
  logger?: Logger;
}

export interface RegisterServiceOptions {
  /** Swap out an existing entry with the same id instead of failing. */
  replace?: boolean;
}

type ServiceRegistryEvents = {
  'service:registered': [entry: RegisteredService, replaced: boolean];
  'service:unregistered': [serviceId: string];
  'registry:disposed': [];
};

export type ServiceHandlerMap = Record<string, ServiceHandler>;

/**
 * Table of service specs and their bound handlers.
 *
 * Every change builds a new map and swaps it in whole, so a reader holding the
 * result of `lookup` or `list` never observes a half-applied registration.
 */
export class ServiceRegistry extends EventEmitter<ServiceRegistryEvents> {
  private readonly logger: Logger;
  private entries: ReadonlyMap<string, RegisteredService> = new Map();
  private disposed = false;

  constructor(options: ServiceRegistryOptions = {}) {
    super();
    this.logger = options.logger ?? silentLogger;
  }

  register(spec: ServiceSpec, handler: ServiceHandler, options: RegisterServiceOptions = {}): RegisteredService {
    this.ensureActive();
    const existing = this.entries.get(spec.id);
    if (existing && !options.replace) {
      throw new SchemaError('duplicate_service_id', `Service '${spec.id}' is already registered`, {
        serviceId: spec.id
      });
    }

    const entry: RegisteredService = Object.freeze({
      spec,
      handler,
      registeredAt: new Date().toISOString()
    });
    const next = new Map(this.entries);
    next.set(spec.id, entry);
    this.entries = next;

    this.logger.debug({ serviceId: spec.id, replaced: Boolean(existing) }, 'Service registered');
    this.emit('service:registered', entry, Boolean(existing));
    return entry;
  }

  /**
   * Binds a handler to each spec. Every spec needs a handler and every handler
   * needs a spec; nothing is registered when either side has a leftover.
   */
  registerAll(specs: readonly ServiceSpec[], handlers: ServiceHandlerMap, options: RegisterServiceOptions = {}): void {
    this.ensureActive();
    const specIds = new Set(specs.map((spec) => spec.id));
    for (const spec of specs) {
      if (!Object.prototype.hasOwnProperty.call(handlers, spec.id)) {
        throw new Error(`No handler provided for service '${spec.id}'`);
      }
    }
    for (const serviceId of Object.keys(handlers)) {
      if (!specIds.has(serviceId)) {
        throw new Error(`Handler '${serviceId}' does not match any service definition`);
      }
    }
    for (const spec of specs) {
      if (!options.replace && this.entries.has(spec.id)) {
        throw new SchemaError('duplicate_service_id', `Service '${spec.id}' is already registered`, {
          serviceId: spec.id
        });
      }
    }
    for (const spec of specs) {
      this.register(spec, handlers[spec.id], options);
    }
  }

  unregister(serviceId: string): boolean {
    if (!this.entries.has(serviceId)) {
      return false;
    }
    const next = new Map(this.entries);
    next.delete(serviceId);
    this.entries = next;

    this.logger.debug({ serviceId }, 'Service unregistered');
    this.emit('service:unregistered', serviceId);
    return true;
  }

  lookup(serviceId: string): RegisteredService | undefined {
    return this.entries.get(serviceId);
  }

  has(serviceId: string): boolean {
    return this.entries.has(serviceId);
  }

  list(): ServiceSpec[] {
    return Array.from(this.entries.values(), (entry) => entry.spec);
  }

  get size(): number {
    return this.entries.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.entries = new Map();
    this.disposed = true;
    this.logger.debug('Service registry disposed');
    this.emit('registry:disposed');
    this.removeAllListeners();
  }

  private ensureActive(): void {
    if (this.disposed) {
      throw new RegistryDisposedError();
    }
  }
}
