import { describe, expect, test, vi } from 'vitest';
import {
  RegistryDisposedError,
  SchemaError,
  ServiceRegistry,
  type RegisteredService,
  type ServiceHandler
} from '../src/index';
import { loadReptileSpecs } from './fixtures';

const specs = loadReptileSpecs();
const noop: ServiceHandler = () => undefined;

describe('ServiceRegistry', () => {
  test('registers and looks up services', () => {
    const registry = new ServiceRegistry();
    const entry = registry.register(specs.log_weight, noop);

    expect(registry.lookup('log_weight')).toBe(entry);
    expect(entry.spec).toBe(specs.log_weight);
    expect(entry.handler).toBe(noop);
    expect(Number.isNaN(Date.parse(entry.registeredAt))).toBe(false);
    expect(registry.has('log_weight')).toBe(true);
    expect(registry.lookup('nonexistent')).toBeUndefined();
    expect(registry.size).toBe(1);
  });

  test('rejects a second registration under the same id', () => {
    const registry = new ServiceRegistry();
    const first = registry.register(specs.log_weight, noop);

    expect(() => registry.register(specs.log_weight, () => 'other')).toThrow(SchemaError);
    try {
      registry.register(specs.log_weight, noop);
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError);
      if (err instanceof SchemaError) {
        expect(err.code).toBe('duplicate_service_id');
        expect(err.serviceId).toBe('log_weight');
        expect(err.message).toBe("Service 'log_weight' is already registered");
      }
    }
    expect(registry.lookup('log_weight')).toBe(first);
  });

  test('replaces an entry when asked to', () => {
    const registry = new ServiceRegistry();
    const replacement: ServiceHandler = () => 'replaced';
    registry.register(specs.log_weight, noop);
    registry.register(specs.log_weight, replacement, { replace: true });

    expect(registry.lookup('log_weight')?.handler).toBe(replacement);
    expect(registry.size).toBe(1);
  });

  test('unregister reports whether an entry was removed', () => {
    const registry = new ServiceRegistry();
    registry.register(specs.log_weight, noop);

    expect(registry.unregister('log_weight')).toBe(true);
    expect(registry.unregister('log_weight')).toBe(false);
    expect(registry.lookup('log_weight')).toBeUndefined();
  });

  test('lists specs in registration order', () => {
    const registry = new ServiceRegistry();
    registry.register(specs.log_weight, noop);
    registry.register(specs.log_feeding, noop);
    registry.register(specs.log_shedding, noop);

    expect(registry.list().map((spec) => spec.id)).toEqual(['log_weight', 'log_feeding', 'log_shedding']);
  });

  test('a listing taken earlier is unaffected by later changes', () => {
    const registry = new ServiceRegistry();
    registry.register(specs.log_weight, noop);
    const before = registry.list();

    registry.register(specs.log_feeding, noop);
    registry.unregister('log_weight');

    expect(before.map((spec) => spec.id)).toEqual(['log_weight']);
    expect(registry.list().map((spec) => spec.id)).toEqual(['log_feeding']);
  });

  test('emits events for registrations and removals', () => {
    const registry = new ServiceRegistry();
    const registered = vi.fn<(entry: RegisteredService, replaced: boolean) => void>();
    const unregistered = vi.fn<(serviceId: string) => void>();
    registry.on('service:registered', registered);
    registry.on('service:unregistered', unregistered);

    registry.register(specs.log_weight, noop);
    registry.register(specs.log_weight, noop, { replace: true });
    registry.unregister('log_weight');
    registry.unregister('log_weight');

    expect(registered).toHaveBeenCalledTimes(2);
    expect(registered.mock.calls.map(([entry, replaced]) => [entry.spec.id, replaced])).toEqual([
      ['log_weight', false],
      ['log_weight', true]
    ]);
    expect(unregistered).toHaveBeenCalledTimes(1);
    expect(unregistered).toHaveBeenCalledWith('log_weight');
  });

  describe('registerAll', () => {
    const all = [specs.log_feeding, specs.log_shedding, specs.log_weight];

    test('binds one handler per spec', () => {
      const registry = new ServiceRegistry();
      registry.registerAll(all, { log_feeding: noop, log_shedding: noop, log_weight: noop });
      expect(registry.list().map((spec) => spec.id)).toEqual(['log_feeding', 'log_shedding', 'log_weight']);
    });

    test('fails without registering anything when a handler is missing', () => {
      const registry = new ServiceRegistry();
      expect(() => registry.registerAll(all, { log_feeding: noop, log_weight: noop })).toThrow(
        "No handler provided for service 'log_shedding'"
      );
      expect(registry.size).toBe(0);
    });

    test('fails when a handler has no matching spec', () => {
      const registry = new ServiceRegistry();
      expect(() =>
        registry.registerAll([specs.log_weight], { log_weight: noop, log_temperature: noop })
      ).toThrow("Handler 'log_temperature' does not match any service definition");
      expect(registry.size).toBe(0);
    });

    test('fails without partial registration when an id is taken', () => {
      const registry = new ServiceRegistry();
      registry.register(specs.log_weight, noop);
      expect(() => registry.registerAll(all, { log_feeding: noop, log_shedding: noop, log_weight: noop })).toThrow(
        SchemaError
      );
      expect(registry.list().map((spec) => spec.id)).toEqual(['log_weight']);
    });
  });

  test('refuses registrations after dispose', () => {
    const registry = new ServiceRegistry();
    const disposed = vi.fn();
    registry.on('registry:disposed', disposed);
    registry.register(specs.log_weight, noop);

    registry.dispose();
    registry.dispose();

    expect(disposed).toHaveBeenCalledTimes(1);
    expect(registry.isDisposed).toBe(true);
    expect(registry.size).toBe(0);
    expect(registry.listenerCount('registry:disposed')).toBe(0);
    expect(() => registry.register(specs.log_weight, noop)).toThrow(RegistryDisposedError);
  });
});
