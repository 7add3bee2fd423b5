/**
 * @fileoverview ComponentRepository Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  ANY_TYPE,
  InvalidArgumentError,
  NameConflictError,
  byName,
  byType,
} from '../../../src/domain/di';
import {
  ComponentRepository,
  SingletonComponentFactory,
  StaticComponentFactory,
} from '../../../src/infrastructure/di';

// ============================================================================
// Test Fixtures
// ============================================================================

class Animal {}
class Dog extends Animal {}
class Cat extends Animal {}
class Puppy extends Dog {}

describe('ComponentRepository', () => {
  let repository: ComponentRepository;

  beforeEach(() => {
    repository = new ComponentRepository();
  });

  // ============================================================================
  // register
  // ============================================================================

  describe('register', () => {
    it('should keep factories in registration order', () => {
      repository.register(new StaticComponentFactory('rex', new Dog()));
      repository.register(new StaticComponentFactory('tom', new Cat()));

      expect(repository.size).toBe(2);
      expect(repository.factories.map((factory) => factory.componentName)).toEqual(['rex', 'tom']);
    });

    it('should reject a duplicate name', () => {
      repository.register(new StaticComponentFactory('pet', new Dog()));

      expect(() => repository.register(new StaticComponentFactory('pet', new Cat()))).toThrow(
        NameConflictError,
      );
      expect(() => repository.register(new StaticComponentFactory('pet', new Cat()))).toThrow(
        "Component 'pet' is already registered.",
      );
      expect(repository.size).toBe(1);
    });
  });

  // ============================================================================
  // findByName
  // ============================================================================

  describe('findByName', () => {
    it('should return the factory registered under a name', () => {
      const factory = new StaticComponentFactory('rex', new Dog());
      repository.register(factory);

      expect(repository.findByName('rex')).toBe(factory);
    });

    it('should return undefined for an unknown name', () => {
      expect(repository.findByName('missing')).toBeUndefined();
    });
  });

  // ============================================================================
  // findByType
  // ============================================================================

  describe('findByType', () => {
    beforeEach(() => {
      repository.register(new StaticComponentFactory('rex', new Dog()));
      repository.register(new StaticComponentFactory('tom', new Cat()));
      repository.register(new SingletonComponentFactory('bolt', Puppy, []));
      repository.register(new StaticComponentFactory('fido', new Dog()));
    });

    const namesOf = (type: Parameters<ComponentRepository['findByType']>[0]): string[] =>
      repository.findByType(type).map((factory) => factory.componentName);

    it('should match the exact type', () => {
      expect(namesOf(Cat)).toEqual(['tom']);
    });

    it('should match subtypes, grouped by produced type', () => {
      expect(namesOf(Dog)).toEqual(['rex', 'fido', 'bolt']);
      expect(namesOf(Animal)).toEqual(['rex', 'fido', 'tom', 'bolt']);
    });

    it('should not match supertypes', () => {
      expect(namesOf(Puppy)).toEqual(['bolt']);
    });

    it('should match everything for the any type', () => {
      expect(namesOf(ANY_TYPE)).toHaveLength(4);
    });

    it('should return an empty list when nothing matches', () => {
      expect(namesOf(String)).toEqual([]);
    });
  });

  // ============================================================================
  // exists
  // ============================================================================

  describe('exists', () => {
    beforeEach(() => {
      repository.register(new StaticComponentFactory('rex', new Dog()));
    });

    it('should check names', () => {
      expect(repository.exists(byName('rex'))).toBe(true);
      expect(repository.exists(byName('tom'))).toBe(false);
    });

    it('should check types and subtypes', () => {
      expect(repository.exists(byType(Dog))).toBe(true);
      expect(repository.exists(byType(Animal))).toBe(true);
      expect(repository.exists(byType(Cat))).toBe(false);
    });

    it('should reject malformed keys', () => {
      expect(() => repository.exists({ kind: 'tag', tag: 'pets' } as never)).toThrow(
        InvalidArgumentError,
      );
    });
  });
});
