/**
 * @fileoverview DI Interfaces - Core Container Contracts
 *
 * @packageDocumentation
 * @module @lazywire/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the contracts of the container, its factories, its
 * repository and its collaborators. They define WHAT the container does;
 * `infrastructure/di` defines HOW.
 *
 * ## Lifecycle
 *
 * ```
 * register*() ──► setup() ──► getComponent() ... ──► dispose()
 *  (factories     (wiring:     (produce, guarded
 *   not ready)     ready)       by a ResolutionContext)
 * ```
 *
 * @version 1.0.0
 */

import { type ComponentScope } from './component-scope';
import {
  type ComponentClass,
  type ComponentKey,
  type ComponentKeyLike,
  type ComponentType,
} from './component-type';
import { type Requirement } from './requirement';

// ============================================================================
// IDisposable - Resource Cleanup Interface
// ============================================================================

/**
 * Interface for components that need cleanup when the container is disposed.
 *
 * @remarks
 * Only singletons built by the container are disposed. Static instances
 * belong to whoever registered them, prototypes to whoever looked them up.
 *
 * @example
 * ```typescript
 * class ConnectionPool implements IDisposable {
 *   async dispose(): Promise<void> {
 *     await this.pool.end();
 *   }
 * }
 * ```
 */
export interface IDisposable {
  dispose(): void | Promise<void>;
}

/**
 * Check if an object implements IDisposable.
 */
export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'dispose' in obj &&
    typeof (obj as IDisposable).dispose === 'function'
  );
}

// ============================================================================
// IResolutionContext - Cycle Detection
// ============================================================================

/**
 * Stack of components under construction during one top-level lookup.
 */
export interface IResolutionContext {
  /**
   * Components currently under construction, outermost first.
   */
  readonly path: readonly string[];

  /**
   * Mark `name` as under construction.
   *
   * @throws CyclicDependencyError if `name` is already under construction
   */
  push(name: string): void;

  /**
   * Unmark `name`, which must be the innermost entry.
   *
   * @throws InternalInconsistencyError if the stack is empty or out of order
   */
  pop(name: string): void;

  /**
   * Run `action` with `name` pushed, popping it on every exit path.
   */
  guard<T>(name: string, action: () => T): T;
}

// ============================================================================
// IComponentFactory - Component Production
// ============================================================================

/**
 * Producer of one component.
 *
 * @template T - Component type
 */
export interface IComponentFactory<T = unknown> {
  readonly componentName: string;

  readonly componentType: ComponentType<T>;

  readonly scope: ComponentScope;

  /**
   * `false` until the factory has been wired (static factories: always `true`).
   */
  readonly isReady: boolean;

  /**
   * Whether this factory produces `type` or one of its subtypes.
   */
  isTypeOf(type: ComponentType): boolean;

  /**
   * Produce (or return the cached) component.
   *
   * @throws NotInitializedError if called before wiring
   * @throws CyclicDependencyError if construction revisits a component
   */
  produce(context: IResolutionContext): T;
}

/**
 * A factory that builds its component from resolved requirements.
 *
 * @template T - Component type
 */
export interface ICreatingComponentFactory<T = unknown> extends IComponentFactory<T> {
  readonly requirements: readonly Requirement[];

  /**
   * Names of the components each requirement resolved to, in order.
   * Empty before wiring.
   */
  readonly dependencyNames: readonly string[];

  /**
   * Resolve every requirement to a factory without changing any state.
   *
   * @throws TypeMismatchError if a named requirement has an incompatible type
   * @throws UnknownComponentError if a requirement matches nothing
   * @throws AmbiguousComponentError if a by-type requirement matches several
   */
  resolveRequirements(repository: IComponentRepository): IComponentFactory[];

  /**
   * Keep the factories returned by {@link resolveRequirements} and become ready.
   *
   * @throws InvalidStateError if the factory is already wired
   */
  bind(dependencies: readonly IComponentFactory[]): void;

  /**
   * `resolveRequirements` followed by `bind`.
   */
  wire(repository: IComponentRepository): void;
}

/**
 * Check if a factory builds its component from requirements.
 */
export function isCreatingFactory(
  factory: IComponentFactory,
): factory is ICreatingComponentFactory {
  return 'wire' in factory && typeof (factory as ICreatingComponentFactory).wire === 'function';
}

// ============================================================================
// IComponentRepository - Factory Lookup
// ============================================================================

/**
 * Store of every factory of one container.
 *
 * @remarks
 * Pure lookup: no construction happens here.
 */
export interface IComponentRepository {
  /**
   * Registered factories, in registration order.
   */
  readonly factories: readonly IComponentFactory[];

  readonly size: number;

  /**
   * @throws NameConflictError if the factory's name is already bound
   */
  register(factory: IComponentFactory): void;

  findByName(name: string): IComponentFactory | undefined;

  /**
   * Every factory producing `type` or one of its subtypes. May be empty.
   */
  findByType(type: ComponentType): IComponentFactory[];

  exists(key: ComponentKey): boolean;
}

// ============================================================================
// INamingStrategy - Type to Name Conversion
// ============================================================================

/**
 * Derives a component name from a type registered without an explicit name.
 */
export interface INamingStrategy {
  toComponentName(type: ComponentType): string;
}

// ============================================================================
// IContainer - Public Facade
// ============================================================================

/**
 * Options applied when a container is created.
 */
export interface IContainerOptions {
  /**
   * Name derivation for `registerType()` calls without a name.
   *
   * @default SnakeCaseNamingStrategy
   */
  namingStrategy?: INamingStrategy;
}

/**
 * Options applied by `setup()`.
 */
export interface ISetupOptions {
  /**
   * Build every singleton right after wiring, so that construction errors
   * (cycles included) surface from `setup()` instead of the first lookup.
   *
   * @default false
   */
  eagerSingletons?: boolean;
}

/**
 * IContainer - Registration, wiring and lookup of components.
 *
 * @example
 * ```typescript
 * const container = new Container();
 *
 * container
 *   .registerType(Database)
 *   .registerType(ReportService)
 *   .registerInstance({ url: 'postgres://localhost/test' }, 'config');
 *
 * container.setup();
 *
 * const reports = container.getComponent(ReportService);
 * ```
 */
export interface IContainer {
  /**
   * Register a type. The name is derived by the naming strategy when omitted.
   *
   * @throws NameConflictError if the name is already registered
   * @throws InvalidArgumentError if `type` is not a constructor
   */
  registerType<T>(type: ComponentClass<T>, name?: string, scope?: ComponentScope): this;

  /**
   * Register several types at once, each under its derived name.
   *
   * @throws InvalidArgumentError if any argument is not a constructor
   */
  registerTypes(...types: ComponentClass[]): this;

  /**
   * Register a pre-built instance.
   *
   * @throws NameConflictError if the name is already registered
   */
  registerInstance<T>(instance: T, name: string): this;

  /**
   * Wire every creating factory. Must run once, after all registrations.
   */
  setup(options?: ISetupOptions): void;

  getComponent<T>(key: ComponentType<T> | ComponentKey<T>): T;
  getComponent<T = unknown>(name: string): T;

  /**
   * Like `getComponent`, but `undefined` when nothing matches.
   */
  tryGetComponent<T>(key: ComponentType<T> | ComponentKey<T>): T | undefined;
  tryGetComponent<T = unknown>(name: string): T | undefined;

  exists(key: ComponentKeyLike): boolean;

  /**
   * Dispose every singleton the container built.
   */
  dispose(): Promise<void>;
}
