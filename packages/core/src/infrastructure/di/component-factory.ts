/**
 * @fileoverview ComponentFactory - Base Factory and Static Factory
 *
 * @packageDocumentation
 * @module @lazywire/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Every component is produced by exactly one factory:
 *
 * ```
 * ComponentFactory
 * ├─ StaticComponentFactory          (pre-built instance)
 * └─ AbstractCreatingComponentFactory (builds from requirements)
 *    ├─ SingletonComponentFactory    (build once, cache)
 *    └─ PrototypeComponentFactory    (build on every lookup)
 * ```
 *
 * @version 1.0.0
 */

import {
  type ComponentType,
  type IComponentFactory,
  type IResolutionContext,
  ComponentScope,
  getInstanceType,
  getScopeName,
  getTypeName,
  isSubtypeOf,
} from '../../domain/di';

export abstract class ComponentFactory<T = unknown> implements IComponentFactory<T> {
  readonly componentName: string;

  readonly componentType: ComponentType<T>;

  readonly scope: ComponentScope;

  private ready: boolean;

  protected constructor(
    componentName: string,
    componentType: ComponentType<T>,
    scope: ComponentScope,
    ready = false,
  ) {
    this.componentName = componentName;
    this.componentType = componentType;
    this.scope = scope;
    this.ready = ready;
  }

  get isReady(): boolean {
    return this.ready;
  }

  isTypeOf(type: ComponentType): boolean {
    return isSubtypeOf(this.componentType, type);
  }

  abstract produce(context: IResolutionContext): T;

  toString(): string {
    return (
      `[${this.constructor.name}] ${this.componentName}: ` +
      `${getTypeName(this.componentType)} (${getScopeName(this.scope)})`
    );
  }

  protected markReady(): void {
    this.ready = true;
  }
}

/**
 * Factory wrapping a pre-built instance. Always ready; always returns the
 * same instance.
 *
 * @example
 * ```typescript
 * const factory = new StaticComponentFactory('config', { port: 3000 });
 * factory.produce(new ResolutionContext()); // { port: 3000 }
 * ```
 */
export class StaticComponentFactory<T> extends ComponentFactory<T> {
  private readonly instance: T;

  constructor(componentName: string, instance: T) {
    super(componentName, getInstanceType(instance), ComponentScope.Static, true);
    this.instance = instance;
  }

  produce(_context: IResolutionContext): T {
    return this.instance;
  }
}
