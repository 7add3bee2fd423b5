/**
 * @fileoverview Requirement - Declared Component Dependencies
 *
 * @packageDocumentation
 * @module @lazywire/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A requirement is one constructor argument a component needs from the
 * container. It carries an optional component name and a required type.
 *
 * ## Zero-Reflection Declaration
 *
 * TypeScript erases parameter types, so the container reads parameter
 * NAMES from the constructor itself and parameter TYPES from a static
 * `inject` list, position by position:
 *
 * ```typescript
 * class InvoiceService {
 *   static inject = [Database, 'mailer'] as const;
 *
 *   constructor(
 *     private readonly database: Database, // name 'database', type Database
 *     private readonly mailer: Mailer,     // name 'mailer', any type
 *   ) {}
 * }
 * ```
 *
 * A name given in the `inject` list always wins. Names read from the
 * constructor are best effort: the source is whatever the runtime returns
 * after transpilation, and a bundler or minifier may rename parameters
 * (`container` → `container2`). A renamed parameter misses by name and falls
 * back to its declared type, so declare a type, or name the component with a
 * string or {@link named}, wherever the name matters.
 *
 * @version 1.0.0
 */

import {
  type ComponentType,
  ANY_TYPE,
  getTypeName,
  isComponentType,
} from './component-type';

/**
 * A resolved requirement, created once at registration time.
 *
 * @remarks
 * Resolution is name-first when `name` is set: the named component must
 * produce a subtype of `type`. Without a name, or when no component carries
 * that name, exactly one component of `type` must exist.
 */
export interface Requirement {
  readonly name?: string | undefined;
  readonly type: ComponentType;
}

/**
 * Explicit requirement declaration.
 */
export interface IRequirementSpec {
  /**
   * Component name to look up first. Defaults to the parameter name.
   */
  readonly name?: string;

  /**
   * Required component type. Defaults to any type.
   */
  readonly type?: ComponentType;
}

/**
 * One entry of a static `inject` list.
 *
 * - a type: parameter name + that type
 * - a string: that component name + any type
 * - an {@link IRequirementSpec}: explicit name and/or type
 */
export type InjectionPoint = ComponentType | string | IRequirementSpec;

/**
 * A constructor declaring its requirement types via a static `inject` list.
 */
export interface IInjectable {
  inject?: readonly InjectionPoint[];
}

/**
 * Declare a named requirement.
 *
 * @example
 * ```typescript
 * class ReportService {
 *   static inject = [named('primary_db', Database)] as const;
 *   constructor(private readonly db: Database) {}
 * }
 * ```
 */
export function named(name: string, type: ComponentType = ANY_TYPE): IRequirementSpec {
  return { name, type };
}

/**
 * Create an immutable requirement.
 */
export function createRequirement(name: string | undefined, type: ComponentType): Requirement {
  return Object.freeze({ name, type });
}

/**
 * Check if a value is a well-formed {@link InjectionPoint}.
 */
export function isInjectionPoint(value: unknown): value is InjectionPoint {
  if (typeof value === 'string' || isComponentType(value)) {
    return true;
  }
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const name: unknown = Reflect.get(value, 'name');
  const type: unknown = Reflect.get(value, 'type');

  return (
    (name === undefined || typeof name === 'string') &&
    (type === undefined || isComponentType(type))
  );
}

/**
 * Read the static `inject` list of a target, if it declares one.
 */
export function getInjectDeclarations(target: unknown): readonly unknown[] {
  if (typeof target !== 'function') {
    return [];
  }

  const inject: unknown = Reflect.get(target, 'inject');
  return Array.isArray(inject) ? inject : [];
}

/**
 * Describe a requirement for error messages.
 *
 * @example
 * ```typescript
 * describeRequirement(createRequirement('db', Database)); // "'db' (Database)"
 * describeRequirement(createRequirement(undefined, Database)); // 'Database'
 * ```
 */
export function describeRequirement(requirement: Requirement): string {
  const typeName = getTypeName(requirement.type);
  return requirement.name !== undefined ? `'${requirement.name}' (${typeName})` : typeName;
}
