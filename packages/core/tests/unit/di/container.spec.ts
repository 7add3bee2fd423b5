/**
 * @fileoverview Container Unit Tests
 *
 * Tests for registration, setup, lookup and lifecycle rules.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  ComponentScope,
  AmbiguousComponentError,
  InvalidArgumentError,
  InvalidStateError,
  NameConflictError,
  NotInitializedError,
  UnknownComponentError,
  byName,
  byType,
  type ComponentType,
} from '../../../src/domain/di';
import { Container, toComponentKey } from '../../../src/infrastructure/di';

// ============================================================================
// Test Fixtures
// ============================================================================

class Engine {}

class Wheel {}

class Car {
  constructor(
    readonly engine: Engine,
    readonly wheel: Wheel,
  ) {}
}

class Garage {
  static inject = [Wheel];

  constructor(readonly wheel: Wheel) {}
}

abstract class Database {}
class PostgresDatabase extends Database {}
class SqliteDatabase extends Database {}

let constructed: string[] = [];

class Tracked {
  constructor() {
    constructed.push('tracked');
  }
}

class TrackedPrototype {
  constructor() {
    constructed.push('prototype');
  }
}

describe('Container', () => {
  let container: Container;

  beforeEach(() => {
    constructed = [];
    container = new Container();
  });

  // ============================================================================
  // Construction
  // ============================================================================

  describe('constructor', () => {
    it('should register itself as a component', () => {
      expect(container.exists('container')).toBe(true);
      expect(container.getComponent('container')).toBe(container);
      expect(container.getComponent(Container)).toBe(container);
    });

    it('should accept a custom naming strategy', () => {
      const custom = new Container({
        namingStrategy: { toComponentName: (type: ComponentType) => `my${type.name}` },
      });

      custom.registerType(Engine);

      expect(custom.exists('myEngine')).toBe(true);
      expect(custom.exists('engine')).toBe(false);
    });
  });

  // ============================================================================
  // Registration
  // ============================================================================

  describe('registerType', () => {
    it('should derive the component name from the type', () => {
      container.registerType(PostgresDatabase);

      expect(container.exists('postgres_database')).toBe(true);
    });

    it('should use an explicit name', () => {
      container.registerType(Engine, 'main_engine');

      expect(container.exists('main_engine')).toBe(true);
      expect(container.exists('engine')).toBe(false);
    });

    it('should be chainable', () => {
      expect(container.registerType(Engine).registerType(Wheel)).toBe(container);
    });

    it('should register singletons by default', () => {
      container.registerType(Engine);
      container.setup();

      expect(container.getComponent(Engine)).toBe(container.getComponent(Engine));
    });

    it('should register prototypes on request', () => {
      container.registerType(Engine, undefined, ComponentScope.Prototype);
      container.setup();

      expect(container.getComponent(Engine)).not.toBe(container.getComponent(Engine));
    });

    it('should reject the static scope', () => {
      expect(() => container.registerType(Engine, undefined, ComponentScope.Static)).toThrow(
        'Types cannot be registered with scope Static. Use registerInstance() for pre-built instances.',
      );
    });

    it('should reject values that are not constructors', () => {
      expect(() => container.registerType('Engine' as never)).toThrow(InvalidArgumentError);
    });

    it('should reject an empty name', () => {
      expect(() => container.registerType(Engine, '')).toThrow(InvalidArgumentError);
    });

    it('should reject a name that is already taken', () => {
      container.registerType(Engine);

      expect(() => container.registerType(Engine)).toThrow(NameConflictError);
      expect(() => container.registerType(Wheel, 'container')).toThrow(
        "Component 'container' is already registered.",
      );
    });
  });

  describe('registerTypes', () => {
    it('should register every type under its derived name', () => {
      container.registerTypes(Engine, Wheel, Car);

      expect(container.exists('engine')).toBe(true);
      expect(container.exists('wheel')).toBe(true);
      expect(container.exists('car')).toBe(true);
    });

    it('should require at least one type', () => {
      expect(() => container.registerTypes()).toThrow(InvalidArgumentError);
    });

    it('should validate every argument before registering any', () => {
      expect(() => container.registerTypes(Engine, 'Wheel' as never)).toThrow(
        'Invalid argument #1: expected a type, got string.',
      );
      expect(container.exists('engine')).toBe(false);
    });
  });

  describe('registerInstance', () => {
    it('should return the same instance on every lookup', () => {
      const engine = new Engine();
      container.registerInstance(engine, 'engine');

      expect(container.getComponent('engine')).toBe(engine);
      expect(container.getComponent(Engine)).toBe(engine);
    });

    it('should accept primitive values', () => {
      container.registerInstance('postgres://localhost/test', 'database_url');
      container.setup();

      expect(container.getComponent<string>('database_url')).toBe('postgres://localhost/test');
    });

    it('should reject null and undefined', () => {
      expect(() => container.registerInstance(null, 'nothing')).toThrow(
        "Cannot register null as component 'nothing'.",
      );
      expect(() => container.registerInstance(undefined, 'nothing')).toThrow(InvalidArgumentError);
    });

    it('should reject an empty name', () => {
      expect(() => container.registerInstance(new Engine(), '')).toThrow(
        'Component names must be non-empty strings.',
      );
    });
  });

  // ============================================================================
  // Setup
  // ============================================================================

  describe('setup', () => {
    it('should only run once', () => {
      container.setup();

      expect(() => container.setup()).toThrow(InvalidStateError);
    });

    it('should close registration', () => {
      container.setup();

      expect(() => container.registerType(Engine)).toThrow(
        'Cannot register components after setup(). Register everything before calling setup().',
      );
      expect(() => container.registerInstance(new Engine(), 'engine')).toThrow(InvalidStateError);
    });

    it('should fail when a requirement is missing', () => {
      container.registerTypes(Engine, Garage);

      try {
        container.setup();
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownComponentError);
        expect((error as UnknownComponentError).message).toBe(
          "Unknown component: 'wheel' (Wheel) required by 'garage' (parameter #0).",
        );
      }
    });

    it('should wire nothing when any requirement fails to resolve', () => {
      container.registerTypes(Engine, Garage);

      expect(() => container.setup()).toThrow(UnknownComponentError);
      expect(() => container.getComponent(Engine)).toThrow(NotInitializedError);
    });

    it('should allow a retry once the missing component is registered', () => {
      container.registerTypes(Engine, Garage);
      expect(() => container.setup()).toThrow(UnknownComponentError);

      container.registerType(Wheel);
      container.setup();

      expect(container.getComponent(Garage).wheel).toBe(container.getComponent(Wheel));
      expect(container.getComponent(Engine)).toBeInstanceOf(Engine);
    });

    it('should not build anything by default', () => {
      container.registerType(Tracked);
      container.setup();

      expect(constructed).toEqual([]);

      container.getComponent(Tracked);
      expect(constructed).toEqual(['tracked']);
    });

    it('should build singletons eagerly on request', () => {
      container.registerType(Tracked);
      container.registerType(TrackedPrototype, undefined, ComponentScope.Prototype);
      container.setup({ eagerSingletons: true });

      expect(constructed).toEqual(['tracked']);

      container.getComponent(Tracked);
      expect(constructed).toEqual(['tracked']);
    });
  });

  // ============================================================================
  // Lookup
  // ============================================================================

  describe('getComponent', () => {
    beforeEach(() => {
      container.registerTypes(Engine, Wheel, Car);
    });

    it('should refuse lookups of unwired components', () => {
      expect(() => container.getComponent(Engine)).toThrow(NotInitializedError);
    });

    it('should look components up by name, type and explicit key', () => {
      container.setup();

      const car = container.getComponent(Car);

      expect(container.getComponent('car')).toBe(car);
      expect(container.getComponent(byName('car'))).toBe(car);
      expect(container.getComponent(byType(Car))).toBe(car);
    });

    it('should inject requirements by parameter name', () => {
      container.setup();

      const car = container.getComponent(Car);

      expect(car.engine).toBe(container.getComponent(Engine));
      expect(car.wheel).toBe(container.getComponent(Wheel));
    });

    it('should report unknown names', () => {
      container.setup();

      expect(() => container.getComponent('missing')).toThrow("Unknown component: 'missing'.");
    });

    it('should report unknown types', () => {
      container.setup();

      expect(() => container.getComponent(Database)).toThrow('Unknown component: type Database.');
    });

    it('should reject unsupported keys', () => {
      expect(() => container.getComponent(42 as never)).toThrow(InvalidArgumentError);
    });
  });

  describe('lookup by supertype', () => {
    it('should resolve the only subtype', () => {
      container.registerType(PostgresDatabase);
      container.setup();

      expect(container.getComponent(Database)).toBeInstanceOf(PostgresDatabase);
    });

    it('should refuse to choose between several subtypes', () => {
      container.registerTypes(PostgresDatabase, SqliteDatabase);
      container.setup();

      try {
        container.getComponent(Database);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(AmbiguousComponentError);
        expect((error as AmbiguousComponentError).candidates).toEqual([
          'postgres_database',
          'sqlite_database',
        ]);
      }
      expect(container.getComponent('sqlite_database')).toBeInstanceOf(SqliteDatabase);
    });
  });

  describe('tryGetComponent', () => {
    beforeEach(() => {
      container.registerTypes(PostgresDatabase, SqliteDatabase);
      container.setup();
    });

    it('should return undefined for missing components', () => {
      expect(container.tryGetComponent('missing')).toBeUndefined();
      expect(container.tryGetComponent(Engine)).toBeUndefined();
    });

    it('should return existing components', () => {
      expect(container.tryGetComponent(PostgresDatabase)).toBe(
        container.getComponent(PostgresDatabase),
      );
    });

    it('should still report ambiguity', () => {
      expect(() => container.tryGetComponent(Database)).toThrow(AmbiguousComponentError);
    });
  });

  describe('exists', () => {
    it('should check names, types and explicit keys', () => {
      container.registerType(PostgresDatabase);

      expect(container.exists('postgres_database')).toBe(true);
      expect(container.exists(Database)).toBe(true);
      expect(container.exists(byType(SqliteDatabase))).toBe(false);
      expect(container.exists(byName('sqlite_database'))).toBe(false);
    });

    it('should count ambiguous types as existing', () => {
      container.registerTypes(PostgresDatabase, SqliteDatabase);

      expect(container.exists(Database)).toBe(true);
    });
  });

  describe('toComponentKey', () => {
    it('should normalize names and types', () => {
      expect(toComponentKey('engine')).toEqual({ kind: 'name', name: 'engine' });
      expect(toComponentKey(Engine)).toEqual({ kind: 'type', type: Engine });
    });

    it('should pass explicit keys through', () => {
      const key = byName('engine');

      expect(toComponentKey(key)).toBe(key);
    });

    it('should reject anything else', () => {
      expect(() => toComponentKey({ kind: 'name' } as never)).toThrow(InvalidArgumentError);
    });
  });

  // ============================================================================
  // Dispose
  // ============================================================================

  describe('dispose', () => {
    beforeEach(() => {
      container.registerType(Engine);
      container.setup();
    });

    it('should refuse lookups afterwards', async () => {
      await container.dispose();

      expect(() => container.getComponent(Engine)).toThrow('Container has been disposed.');
      expect(() => container.tryGetComponent('missing')).toThrow(InvalidStateError);
      expect(() => container.exists('engine')).toThrow('Container has been disposed.');
    });

    it('should refuse setup afterwards', async () => {
      await container.dispose();

      expect(() => container.setup()).toThrow(InvalidStateError);
    });

    it('should be idempotent', async () => {
      await container.dispose();

      await expect(container.dispose()).resolves.toBeUndefined();
    });
  });
});
