/**
 * @fileoverview Container - Registration, Wiring and Lookup
 *
 * @packageDocumentation
 * @module @lazywire/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The container is the single entry point of the library. It owns a
 * repository of factories and drives their lifecycle.
 *
 * ## Lookup Algorithm
 *
 * ```
 * getComponent(key)
 *   1. Normalize key (name | type | ComponentKey)
 *   2. Find factory
 *      - by name: exact match, else UnknownComponentError
 *      - by type: exactly one factory of that type or a subtype
 *   3. Reuse the in-flight ResolutionContext (re-entrant lookup from a
 *      constructor) or create a fresh one
 *   4. factory.produce(context)
 * ```
 *
 * @version 1.0.0
 */

import {
  type ComponentClass,
  type ComponentKey,
  type ComponentKeyLike,
  type ComponentType,
  type IComponentFactory,
  type IContainer,
  type IContainerOptions,
  type INamingStrategy,
  type ISetupOptions,
  ComponentScope,
  CONTAINER_COMPONENT_NAME,
  AmbiguousComponentError,
  InvalidArgumentError,
  InvalidStateError,
  UnknownComponentError,
  byName,
  byType,
  describeKey,
  getScopeName,
  isComponentKey,
  isComponentType,
  isContainerOwned,
  isCreatingFactory,
  isDisposable,
} from '../../domain/di';

import { StaticComponentFactory } from './component-factory';
import { PrototypeComponentFactory, SingletonComponentFactory } from './creating-factories';
import { SnakeCaseNamingStrategy } from './naming-strategy';
import { ComponentRepository } from './repository';
import { extractRequirements } from './requirement-extractor';
import { ResolutionContext } from './resolution-context';

/**
 * Normalize anything accepted as a lookup key.
 *
 * @throws InvalidArgumentError for any other value
 */
export function toComponentKey<T>(key: ComponentKeyLike<T>): ComponentKey<T> {
  if (typeof key === 'string') {
    return byName(key);
  }
  if (isComponentKey(key)) {
    return key;
  }
  if (isComponentType(key)) {
    return byType(key);
  }

  throw new InvalidArgumentError(
    `Unsupported key: ${String(key)}. Expected a component name or a component type.`,
  );
}

/**
 * Container - IContainer implementation.
 *
 * @remarks
 * **Lifecycle:**
 *
 * 1. Registration: `registerType`, `registerTypes`, `registerInstance`
 * 2. `setup()`: every creating factory resolves its requirements to other
 *    factories. The dependency graph is fixed from then on. If any
 *    requirement fails to resolve, no factory is wired and registration
 *    stays open, so the caller can register what is missing and retry.
 * 3. Lookups: `getComponent`, `tryGetComponent`, `exists`
 * 4. `dispose()`
 *
 * The container registers itself under {@link CONTAINER_COMPONENT_NAME}, so
 * components may require it.
 *
 * **Cycle Detection:**
 *
 * Every top-level lookup gets its own {@link ResolutionContext}. The context
 * is held by this container instance only while the lookup runs; separate
 * containers never share it.
 *
 * @example
 * ```typescript
 * class SampleClass {}
 *
 * class InjectableComponent {
 *   static inject = [SampleClass] as const;
 *   constructor(readonly sample: SampleClass) {}
 * }
 *
 * const container = new Container();
 * container.registerTypes(SampleClass, InjectableComponent);
 * container.setup();
 *
 * container.getComponent(InjectableComponent).sample; // SampleClass
 * ```
 */
export class Container implements IContainer {
  private readonly repository = new ComponentRepository();

  private readonly namingStrategy: INamingStrategy;

  /**
   * Context of the lookup in progress, if any.
   */
  private activeContext: ResolutionContext | undefined;

  private isSetUp = false;

  private disposed = false;

  constructor(options?: IContainerOptions) {
    this.namingStrategy = options?.namingStrategy ?? new SnakeCaseNamingStrategy();

    // Register self as a component
    this.registerInstance(this, CONTAINER_COMPONENT_NAME);
  }

  // ============================================================================
  // Registration
  // ============================================================================

  registerType<T>(
    type: ComponentClass<T>,
    name?: string,
    scope: ComponentScope = ComponentScope.Singleton,
  ): this {
    this.ensureRegistrationOpen();

    if (!isComponentType(type)) {
      throw new InvalidArgumentError(
        `Invalid registration: expected a constructor, got ${typeof type}.`,
      );
    }

    const componentName = name ?? this.namingStrategy.toComponentName(type);
    this.ensureValidName(componentName);

    const requirements = extractRequirements(type);

    switch (scope) {
      case ComponentScope.Singleton:
        this.repository.register(new SingletonComponentFactory(componentName, type, requirements));
        break;
      case ComponentScope.Prototype:
        this.repository.register(new PrototypeComponentFactory(componentName, type, requirements));
        break;
      default:
        throw new InvalidArgumentError(
          `Types cannot be registered with scope ${getScopeName(scope)}. ` +
            'Use registerInstance() for pre-built instances.',
        );
    }

    return this;
  }

  registerTypes(...types: ComponentClass[]): this {
    this.ensureRegistrationOpen();

    if (types.length === 0) {
      throw new InvalidArgumentError('registerTypes() requires at least one type.');
    }

    types.forEach((type, index) => {
      if (!isComponentType(type)) {
        throw new InvalidArgumentError(
          `Invalid argument #${index}: expected a type, got ${typeof type}.`,
        );
      }
    });

    for (const type of types) {
      this.registerType(type);
    }

    return this;
  }

  registerInstance<T>(instance: T, name: string): this {
    this.ensureRegistrationOpen();
    this.ensureValidName(name);

    if (instance === null || instance === undefined) {
      throw new InvalidArgumentError(`Cannot register ${String(instance)} as component '${name}'.`);
    }

    this.repository.register(new StaticComponentFactory(name, instance));
    return this;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  setup(options?: ISetupOptions): void {
    this.ensureNotDisposed();
    if (this.isSetUp) {
      throw new InvalidStateError('Container is already set up; setup() runs only once.');
    }

    // Resolve everything first: a failure leaves every factory unwired.
    const plans = this.repository.factories.filter(isCreatingFactory).map((factory) => ({
      factory,
      dependencies: factory.resolveRequirements(this.repository),
    }));

    for (const { factory, dependencies } of plans) {
      factory.bind(dependencies);
    }
    this.isSetUp = true;

    if (options?.eagerSingletons ?? false) {
      for (const factory of this.repository.factories) {
        if (factory.scope === ComponentScope.Singleton) {
          this.produce(factory);
        }
      }
    }
  }

  /**
   * Dispose every singleton built by this container.
   *
   * @remarks
   * Singletons are released in reverse registration order. Those
   * implementing `IDisposable` are disposed; a failing `dispose()` is
   * logged and does not stop the others. Static instances are left alone.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;

    const owned = this.repository.factories.filter((factory) => isContainerOwned(factory.scope));
    for (const factory of owned.reverse()) {
      if (!(factory instanceof SingletonComponentFactory)) {
        continue;
      }

      const instance: unknown = factory.release();
      if (isDisposable(instance)) {
        try {
          await instance.dispose();
        } catch (error) {
          console.error(`Error disposing component '${factory.componentName}':`, error);
        }
      }
    }
  }

  // ============================================================================
  // Lookup
  // ============================================================================

  getComponent<T>(key: ComponentType<T> | ComponentKey<T>): T;
  getComponent<T = unknown>(name: string): T;
  getComponent<T>(key: ComponentKeyLike<T>): T {
    this.ensureNotDisposed();

    const factory = this.findFactory(toComponentKey(key));
    return this.produce(factory) as T;
  }

  tryGetComponent<T>(key: ComponentType<T> | ComponentKey<T>): T | undefined;
  tryGetComponent<T = unknown>(name: string): T | undefined;
  tryGetComponent<T>(key: ComponentKeyLike<T>): T | undefined {
    this.ensureNotDisposed();

    const normalized = toComponentKey(key);
    if (!this.repository.exists(normalized)) {
      return undefined;
    }
    return this.produce(this.findFactory(normalized)) as T;
  }

  exists(key: ComponentKeyLike): boolean {
    this.ensureNotDisposed();

    return this.repository.exists(toComponentKey(key));
  }

  // ============================================================================
  // Internal
  // ============================================================================

  private findFactory(key: ComponentKey): IComponentFactory {
    switch (key.kind) {
      case 'name': {
        const factory = this.repository.findByName(key.name);
        if (!factory) {
          throw new UnknownComponentError(describeKey(key));
        }
        return factory;
      }

      case 'type': {
        const [match, ...others] = this.repository.findByType(key.type);
        if (!match) {
          throw new UnknownComponentError(describeKey(key));
        }
        if (others.length > 0) {
          throw new AmbiguousComponentError(
            describeKey(key),
            [match, ...others].map((factory) => factory.componentName),
          );
        }
        return match;
      }
    }
  }

  /**
   * Produce a component, sharing the context with any lookup already in
   * progress on this container.
   */
  private produce(factory: IComponentFactory): unknown {
    const outer = this.activeContext;
    const context = outer ?? new ResolutionContext();

    this.activeContext = context;
    try {
      return factory.produce(context);
    } finally {
      this.activeContext = outer;
    }
  }

  private ensureRegistrationOpen(): void {
    this.ensureNotDisposed();
    if (this.isSetUp) {
      throw new InvalidStateError(
        'Cannot register components after setup(). Register everything before calling setup().',
      );
    }
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new InvalidStateError('Container has been disposed.');
    }
  }

  private ensureValidName(name: unknown): void {
    if (typeof name !== 'string' || name.length === 0) {
      throw new InvalidArgumentError('Component names must be non-empty strings.');
    }
  }
}
