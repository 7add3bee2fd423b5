/**
 * @fileoverview DI Errors - Container Error Classes
 *
 * @packageDocumentation
 * @module @lazywire/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines error classes for container failures.
 * None of them is recoverable by the container: they describe
 * programming or configuration mistakes and are surfaced to the caller.
 *
 * @version 1.0.0
 */

/**
 * Base error class for all container errors.
 *
 * @remarks
 * All container errors extend this class for consistent error handling:
 *
 * ```typescript
 * try {
 *   container.getComponent(ReportService);
 * } catch (error) {
 *   if (error instanceof ContainerError) {
 *     console.error('Container error:', error.message);
 *     console.error('Resolution path:', error.resolutionPath);
 *   }
 * }
 * ```
 */
export abstract class ContainerError extends Error {
  /**
   * The chain of components under construction when the error occurred.
   *
   * @remarks
   * ```
   * report_service -> database (FAILED)
   * ```
   */
  public readonly resolutionPath: string[];

  /**
   * Indented rendering of {@link resolutionPath}.
   *
   * @remarks
   * ```
   * report_service
   *   └─ database
   *     └─ connection_pool (CREATION FAILED)
   * ```
   */
  public readonly dependencyGraph: string;

  constructor(message: string, resolutionPath: string[] = []) {
    super(message);
    this.name = this.constructor.name;
    this.resolutionPath = resolutionPath;
    this.dependencyGraph = this.buildDependencyGraph();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * @internal
   */
  private buildDependencyGraph(): string {
    if (this.resolutionPath.length === 0) {
      return '';
    }

    const lines: string[] = [];
    for (let i = 0; i < this.resolutionPath.length; i++) {
      const indent = '  '.repeat(i);
      const prefix = i === 0 ? '' : '└─ ';
      lines.push(`${indent}${prefix}${this.resolutionPath[i]}`);
    }
    return lines.join('\n');
  }
}

/**
 * Error thrown for malformed caller input.
 *
 * @remarks
 * **Causes:**
 * - A lookup key that is neither a name, a type nor a `ComponentKey`
 * - Registering something that is not a constructor
 * - Extracting requirements from a non-function or a native function
 */
export class InvalidArgumentError extends ContainerError {}

/**
 * Error thrown when an operation runs out of its lifecycle order.
 *
 * @remarks
 * **Causes:**
 * - Registering after `setup()`
 * - Calling `setup()` twice
 * - Looking up components after `dispose()`
 */
export class InvalidStateError extends ContainerError {}

/**
 * Error thrown when a factory produces before it has been wired.
 *
 * @example
 * ```typescript
 * container.registerType(PrintService);
 * container.getComponent(PrintService); // NotInitializedError
 *
 * // Fix:
 * container.setup();
 * container.getComponent(PrintService);
 * ```
 */
export class NotInitializedError extends InvalidStateError {
  public readonly componentName: string;

  constructor(componentName: string, resolutionPath: string[] = []) {
    super(
      `Component '${componentName}' is not initialized. ` +
        'Call container.setup() after all registrations and before any lookup.',
      [...resolutionPath, `${componentName} (NOT INITIALIZED)`],
    );
    this.componentName = componentName;
  }
}

/**
 * Error thrown when the resolution stack is popped out of order.
 *
 * @remarks
 * Indicates a bug in guard scoping inside the container, never a user error.
 */
export class InternalInconsistencyError extends InvalidStateError {}

/**
 * Error thrown when a component name is registered twice.
 */
export class NameConflictError extends ContainerError {
  public readonly componentName: string;

  constructor(componentName: string) {
    super(`Component '${componentName}' is already registered.`);
    this.componentName = componentName;
  }
}

/**
 * Error thrown when a lookup by name or by type matches nothing.
 *
 * @remarks
 * **Causes:**
 * - Component was never registered
 * - Name typo, or the name was derived by the naming strategy
 *   (`PrintService` is registered as `print_service`)
 * - A requirement whose parameter name matches no component and whose type
 *   matches no component either
 */
export class UnknownComponentError extends ContainerError {
  /**
   * Description of the key that was not found.
   */
  public readonly key: string;

  constructor(key: string, resolutionPath: string[] = []) {
    super(`Unknown component: ${key}.`, [...resolutionPath, `${key} (UNREGISTERED)`]);
    this.key = key;
  }
}

/**
 * Error thrown when a by-type lookup matches more than one component.
 *
 * @example
 * ```typescript
 * container.registerType(PostgresDatabase);
 * container.registerType(SqliteDatabase);
 * container.setup();
 *
 * container.getComponent(Database); // AmbiguousComponentError
 *
 * // Fix: look up by name
 * container.getComponent('postgres_database');
 * ```
 */
export class AmbiguousComponentError extends ContainerError {
  public readonly key: string;

  /**
   * Names of every matching component.
   */
  public readonly candidates: string[];

  constructor(key: string, candidates: string[], resolutionPath: string[] = []) {
    super(
      `Ambiguous component: ${key} matches ${candidates.length} components ` +
        `(${candidates.join(', ')}); exactly one was expected.`,
      [...resolutionPath, `${key} (AMBIGUOUS)`],
    );
    this.key = key;
    this.candidates = candidates;
  }
}

/**
 * Error thrown when a named requirement resolves to a component of an
 * incompatible type.
 */
export class TypeMismatchError extends ContainerError {
  public readonly componentName: string;

  /**
   * Position of the offending constructor parameter.
   */
  public readonly parameterIndex: number;

  public readonly expectedType: string;

  public readonly actualType: string;

  constructor(
    componentName: string,
    parameterIndex: number,
    expectedType: string,
    actualType: string,
  ) {
    super(
      `Component '${componentName}' (parameter #${parameterIndex}) requires ` +
        `${expectedType} but the matching component produces ${actualType}.`,
      [componentName, `#${parameterIndex} ${actualType} (TYPE MISMATCH)`],
    );
    this.componentName = componentName;
    this.parameterIndex = parameterIndex;
    this.expectedType = expectedType;
    this.actualType = actualType;
  }
}

/**
 * Error thrown when construction revisits a component already under
 * construction.
 *
 * @remarks
 * **Example:**
 * ```
 * a requires b
 * b requires c
 * c requires a  ← CYCLIC!
 * ```
 *
 * `cyclePath` holds the cycle in traversal order, starting and ending with
 * the revisited component: `['a', 'b', 'c', 'a']`.
 *
 * **Solutions:**
 * 1. Refactor to break the cycle
 * 2. Inject the container and look the component up lazily
 * 3. Extract the shared logic into a third component
 */
export class CyclicDependencyError extends ContainerError {
  public readonly cyclePath: string[];

  constructor(cyclePath: string[]) {
    super(`Cyclic dependency detected: ${cyclePath.join(' -> ')}`, [
      ...cyclePath.slice(0, -1),
      `${cyclePath[cyclePath.length - 1] ?? ''} (CYCLIC!)`,
    ]);
    this.cyclePath = cyclePath;
  }
}

/**
 * Error thrown when a component's own constructor fails.
 *
 * @remarks
 * The original error is preserved as `cause`. Container errors raised while
 * producing requirements are never wrapped.
 */
export class ComponentCreationError extends ContainerError {
  public readonly componentName: string;

  public readonly cause: Error;

  constructor(componentName: string, cause: Error, resolutionPath: string[] = []) {
    super(`Failed to create component '${componentName}': ${cause.message}`, [
      ...resolutionPath,
      `${componentName} (CREATION FAILED)`,
    ]);
    this.componentName = componentName;
    this.cause = cause;
  }
}
