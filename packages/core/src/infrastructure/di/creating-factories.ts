/**
 * @fileoverview Creating Factories - Singleton and Prototype Production
 *
 * @packageDocumentation
 * @module @lazywire/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Wiring Algorithm (once, during `setup()`)
 *
 * `resolveRequirements()` only looks factories up; `bind()` commits them.
 * The container resolves every factory before binding any.
 *
 * ```
 * for each requirement, in declared order:
 *   1. Name present → findByName(name)
 *        found, produced type not a subtype → TypeMismatchError
 *   2. No name, or name not found → findByType(type)
 *        0 matches → UnknownComponentError
 *        2+ matches → AmbiguousComponentError
 *   3. Keep a reference to the matching factory
 * ```
 *
 * ## Production Algorithm (every `produce()`)
 *
 * ```
 * 1. Not wired → NotInitializedError
 * 2. Push own name on the context (cycle → CyclicDependencyError)
 * 3. Produce each dependency, in declared order
 * 4. new ComponentClass(...dependencies)
 * 5. Pop own name (always, even on failure)
 * ```
 *
 * **Thread Safety:**
 *
 * Production is synchronous and JavaScript runs it on one thread, so the
 * singleton check-then-create below cannot interleave with another lookup.
 * No lock is taken and no duplicate instance can be built.
 *
 * @version 1.0.0
 */

import {
  type ComponentClass,
  type IComponentFactory,
  type IComponentRepository,
  type ICreatingComponentFactory,
  type IResolutionContext,
  type Requirement,
  ComponentScope,
  ContainerError,
  AmbiguousComponentError,
  ComponentCreationError,
  InvalidArgumentError,
  InvalidStateError,
  NotInitializedError,
  TypeMismatchError,
  UnknownComponentError,
  describeRequirement,
  getTypeName,
} from '../../domain/di';

import { ComponentFactory } from './component-factory';

/**
 * Common parent of the factories that build new components.
 */
export abstract class AbstractCreatingComponentFactory<T>
  extends ComponentFactory<T>
  implements ICreatingComponentFactory<T>
{
  readonly componentClass: ComponentClass<T>;

  readonly requirements: readonly Requirement[];

  /**
   * Factories satisfying each requirement. Populated by `wire()`.
   */
  private dependencies: readonly IComponentFactory[] = [];

  private resolvedNames: readonly string[] = [];

  protected constructor(
    componentName: string,
    componentClass: ComponentClass<T>,
    scope: ComponentScope,
    requirements: readonly Requirement[],
  ) {
    super(componentName, componentClass, scope);
    this.componentClass = componentClass;
    this.requirements = requirements;
  }

  get dependencyNames(): readonly string[] {
    return this.resolvedNames;
  }

  resolveRequirements(repository: IComponentRepository): IComponentFactory[] {
    return this.requirements.map((requirement, index) =>
      this.resolveRequirement(repository, requirement, index),
    );
  }

  bind(dependencies: readonly IComponentFactory[]): void {
    if (this.isReady) {
      throw new InvalidStateError(`Component '${this.componentName}' is already wired.`);
    }
    if (dependencies.length !== this.requirements.length) {
      throw new InvalidArgumentError(
        `Component '${this.componentName}' has ${this.requirements.length} requirements ` +
          `but ${dependencies.length} dependencies were given.`,
      );
    }

    this.dependencies = [...dependencies];
    this.resolvedNames = dependencies.map((factory) => factory.componentName);
    this.markReady();
  }

  wire(repository: IComponentRepository): void {
    if (this.isReady) {
      throw new InvalidStateError(`Component '${this.componentName}' is already wired.`);
    }

    this.bind(this.resolveRequirements(repository));
  }

  /**
   * Build a new component from freshly produced dependencies.
   */
  protected createComponent(context: IResolutionContext): T {
    if (!this.isReady) {
      throw new NotInitializedError(this.componentName, [...context.path]);
    }

    return context.guard(this.componentName, () => {
      const args = this.dependencies.map((factory) => factory.produce(context));
      return this.instantiate(args, context);
    });
  }

  private instantiate(args: unknown[], context: IResolutionContext): T {
    try {
      return new this.componentClass(...args);
    } catch (error) {
      if (error instanceof ContainerError) {
        throw error;
      }

      throw new ComponentCreationError(
        this.componentName,
        error instanceof Error ? error : new Error(String(error)),
        context.path.slice(0, -1),
      );
    }
  }

  private resolveRequirement(
    repository: IComponentRepository,
    requirement: Requirement,
    index: number,
  ): IComponentFactory {
    if (requirement.name !== undefined) {
      const named = repository.findByName(requirement.name);
      if (named) {
        if (!named.isTypeOf(requirement.type)) {
          throw new TypeMismatchError(
            this.componentName,
            index,
            getTypeName(requirement.type),
            getTypeName(named.componentType),
          );
        }
        return named;
      }
    }

    const key = `${describeRequirement(requirement)} required by '${this.componentName}' (parameter #${index})`;
    const [match, ...others] = repository.findByType(requirement.type);

    if (!match) {
      throw new UnknownComponentError(key, [this.componentName]);
    }
    if (others.length > 0) {
      throw new AmbiguousComponentError(
        key,
        [match, ...others].map((factory) => factory.componentName),
        [this.componentName],
      );
    }

    return match;
  }
}

/**
 * Builds its component on the first `produce()` and returns the cached
 * instance afterwards, without producing requirements again.
 */
export class SingletonComponentFactory<T> extends AbstractCreatingComponentFactory<T> {
  private cache: { readonly value: T } | undefined;

  constructor(
    componentName: string,
    componentClass: ComponentClass<T>,
    requirements: readonly Requirement[],
  ) {
    super(componentName, componentClass, ComponentScope.Singleton, requirements);
  }

  get isCreated(): boolean {
    return this.cache !== undefined;
  }

  produce(context: IResolutionContext): T {
    if (this.cache === undefined) {
      this.cache = { value: this.createComponent(context) };
    }

    return this.cache.value;
  }

  /**
   * Drop the cached instance and hand it to the caller.
   *
   * @internal Used by container disposal.
   */
  release(): T | undefined {
    const instance = this.cache?.value;
    this.cache = undefined;
    return instance;
  }
}

/**
 * Builds a new component on every `produce()`.
 */
export class PrototypeComponentFactory<T> extends AbstractCreatingComponentFactory<T> {
  constructor(
    componentName: string,
    componentClass: ComponentClass<T>,
    requirements: readonly Requirement[],
  ) {
    super(componentName, componentClass, ComponentScope.Prototype, requirements);
  }

  produce(context: IResolutionContext): T {
    return this.createComponent(context);
  }
}
