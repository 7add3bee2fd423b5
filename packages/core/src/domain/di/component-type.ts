/**
 * @fileoverview ComponentType - Runtime Type Model and Lookup Keys
 *
 * @packageDocumentation
 * @module @lazywire/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Components are identified either by their unique name or by their type.
 * A type is a constructor value; subtyping follows the prototype chain, so a
 * factory producing `PostgresDatabase` satisfies a lookup for `Database`
 * when `PostgresDatabase extends Database`.
 *
 * ## Lookup Keys
 *
 * ```typescript
 * container.getComponent('print_service');           // by name
 * container.getComponent(PrintService);               // by type
 * container.getComponent(byName('print_service'));    // explicit key
 * ```
 *
 * @version 1.0.0
 */

/**
 * A concrete constructor that the container can instantiate.
 *
 * @template T - The instance type created by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ComponentClass<T = any> = new (...args: any[]) => T;

/**
 * Any constructor usable as a lookup type, abstract classes included.
 *
 * @template T - The instance type
 *
 * @example
 * ```typescript
 * abstract class Database {
 *   abstract query(sql: string): unknown;
 * }
 *
 * class PostgresDatabase extends Database {
 *   query(sql: string) { return { sql }; }
 * }
 *
 * container.registerType(PostgresDatabase);
 * container.setup();
 *
 * const db = container.getComponent(Database); // PostgresDatabase
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ComponentType<T = any> = abstract new (...args: any[]) => T;

/**
 * The unconstrained type. Every component type is a subtype of it.
 */
export const ANY_TYPE: ComponentType = Object;

/**
 * Name under which every container registers itself.
 */
export const CONTAINER_COMPONENT_NAME = 'container';

/**
 * Check if a value can be used as a component type.
 */
export function isComponentType(value: unknown): value is ComponentType {
  return typeof value === 'function';
}

/**
 * Check whether `type` equals `base` or inherits from it.
 *
 * @example
 * ```typescript
 * isSubtypeOf(PostgresDatabase, Database); // true
 * isSubtypeOf(Database, PostgresDatabase); // false
 * isSubtypeOf(Database, ANY_TYPE);         // true
 * ```
 */
export function isSubtypeOf(type: ComponentType, base: ComponentType): boolean {
  if (type === base || base === ANY_TYPE) {
    return true;
  }

  const baseProto: unknown = base.prototype;
  const typeProto: unknown = type.prototype;
  if (typeof baseProto !== 'object' || baseProto === null) {
    return false;
  }
  if (typeof typeProto !== 'object' || typeProto === null) {
    return false;
  }

  return baseProto.isPrototypeOf(typeProto);
}

/**
 * Resolve the runtime type of an instance.
 *
 * @remarks
 * Primitives report their wrapper type (`'abc'` → `String`). Objects without
 * a usable `constructor` (e.g. `Object.create(null)`) report {@link ANY_TYPE}.
 */
export function getInstanceType(instance: unknown): ComponentType {
  if (instance === null || instance === undefined) {
    return ANY_TYPE;
  }

  const boxed: object = Object(instance);
  const ctor: unknown = Reflect.get(boxed, 'constructor');

  return isComponentType(ctor) ? ctor : ANY_TYPE;
}

/**
 * Get a human-readable name for a component type.
 *
 * @example
 * ```typescript
 * getTypeName(PrintService); // 'PrintService'
 * getTypeName(class {});     // 'AnonymousClass'
 * ```
 */
export function getTypeName(type: ComponentType): string {
  return type.name || 'AnonymousClass';
}

// ============================================================================
// Component Keys
// ============================================================================

/**
 * Lookup by component name.
 */
export interface IComponentNameKey {
  readonly kind: 'name';
  readonly name: string;
}

/**
 * Lookup by component type (equal or subtype).
 */
export interface IComponentTypeKey<T = unknown> {
  readonly kind: 'type';
  readonly type: ComponentType<T>;
}

/**
 * Tagged lookup key accepted by `getComponent` and `exists`.
 */
export type ComponentKey<T = unknown> = IComponentNameKey | IComponentTypeKey<T>;

/**
 * Anything the container accepts as a key: a bare name, a bare type or an
 * explicit {@link ComponentKey}.
 */
export type ComponentKeyLike<T = unknown> = string | ComponentType<T> | ComponentKey<T>;

export function byName(name: string): IComponentNameKey {
  return { kind: 'name', name };
}

export function byType<T>(type: ComponentType<T>): IComponentTypeKey<T> {
  return { kind: 'type', type };
}

/**
 * Check if a value is an explicit {@link ComponentKey}.
 */
export function isComponentKey(value: unknown): value is ComponentKey {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const kind: unknown = Reflect.get(value, 'kind');
  if (kind === 'name') {
    return typeof Reflect.get(value, 'name') === 'string';
  }
  if (kind === 'type') {
    return isComponentType(Reflect.get(value, 'type'));
  }
  return false;
}

/**
 * Describe a key for error messages.
 *
 * @example
 * ```typescript
 * describeKey(byName('print_service')); // "'print_service'"
 * describeKey(byType(PrintService));    // 'type PrintService'
 * ```
 */
export function describeKey(key: ComponentKey): string {
  switch (key.kind) {
    case 'name':
      return `'${key.name}'`;
    case 'type':
      return `type ${getTypeName(key.type)}`;
  }
}
