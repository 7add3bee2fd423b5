/**
 * @fileoverview Repository - Factory Store of a Container
 *
 * @packageDocumentation
 * @module @lazywire/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Holds every factory of one container, indexed by component name and by
 * produced type. It never constructs anything.
 *
 * **Thread Safety:**
 *
 * The indices are only written while registering, before `setup()`.
 * Afterwards the repository is read-only.
 *
 * @version 1.0.0
 */

import {
  type ComponentKey,
  type ComponentType,
  type IComponentFactory,
  type IComponentRepository,
  NameConflictError,
  InvalidArgumentError,
  isComponentKey,
  isSubtypeOf,
} from '../../domain/di';

export class ComponentRepository implements IComponentRepository {
  /**
   * All factories, in registration order.
   */
  private readonly ordered: IComponentFactory[] = [];

  private readonly byName = new Map<string, IComponentFactory>();

  /**
   * Factories grouped by the exact type they produce.
   */
  private readonly byType = new Map<ComponentType, IComponentFactory[]>();

  get factories(): readonly IComponentFactory[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }

  register(factory: IComponentFactory): void {
    const name = factory.componentName;
    if (this.byName.has(name)) {
      throw new NameConflictError(name);
    }

    this.byName.set(name, factory);
    this.ordered.push(factory);

    const sameType = this.byType.get(factory.componentType);
    if (sameType) {
      sameType.push(factory);
    } else {
      this.byType.set(factory.componentType, [factory]);
    }
  }

  findByName(name: string): IComponentFactory | undefined {
    return this.byName.get(name);
  }

  /**
   * Every factory producing `type` or a subtype of it.
   *
   * @remarks
   * Subtype checks run once per distinct produced type, not once per factory.
   * Results are grouped by produced type, in the order each type was first
   * registered.
   */
  findByType(type: ComponentType): IComponentFactory[] {
    const matches: IComponentFactory[] = [];
    for (const [producedType, factories] of this.byType) {
      if (isSubtypeOf(producedType, type)) {
        matches.push(...factories);
      }
    }
    return matches;
  }

  exists(key: ComponentKey): boolean {
    if (!isComponentKey(key)) {
      throw new InvalidArgumentError(
        `Unsupported key: ${String(key)}. Expected a component name or a component type.`,
      );
    }

    switch (key.kind) {
      case 'name':
        return this.byName.has(key.name);
      case 'type':
        return this.findByType(key.type).length > 0;
    }
  }
}
