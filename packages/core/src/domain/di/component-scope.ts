/**
 * @fileoverview ComponentScope - Component Instance Lifecycle
 *
 * @packageDocumentation
 * @module @lazywire/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines how often a factory creates its component.
 *
 * @version 1.0.0
 */

/**
 * ComponentScope - Defines when component instances are created.
 *
 * @remarks
 * | Scope | Created | Shared | Owned by container |
 * |-------|---------|--------|--------------------|
 * | Static | Before registration | Always | No |
 * | Singleton | First lookup | Always | Yes |
 * | Prototype | Every lookup | Never | No |
 *
 * @example
 * ```typescript
 * container.registerInstance(config, 'config');                      // Static
 * container.registerType(PrintService);                              // Singleton
 * container.registerType(PrintJob, 'print_job', ComponentScope.Prototype);
 * ```
 */
export enum ComponentScope {
  /**
   * Static: a pre-built instance handed to the container.
   *
   * @remarks
   * The container never constructs nor disposes it; the caller owns it.
   */
  Static = 'static',

  /**
   * Singleton: built on first lookup, then cached for the container's lifetime.
   *
   * @remarks
   * Requirements are produced once, when the instance is built. Instances
   * implementing `IDisposable` are disposed with the container.
   */
  Singleton = 'singleton',

  /**
   * Prototype: a fresh instance on every lookup.
   *
   * @remarks
   * Wiring still happens once, at `setup()`. Each lookup produces the
   * requirements again, so a prototype depending on a prototype gets a fresh
   * dependency as well.
   */
  Prototype = 'prototype',
}

/**
 * Check if the container keeps the instances of a scope.
 *
 * @internal
 */
export function isContainerOwned(scope: ComponentScope): boolean {
  return scope === ComponentScope.Singleton;
}

/**
 * Get a human-readable name for a scope.
 */
export function getScopeName(scope: ComponentScope): string {
  switch (scope) {
    case ComponentScope.Static:
      return 'Static';
    case ComponentScope.Singleton:
      return 'Singleton';
    case ComponentScope.Prototype:
      return 'Prototype';
    default:
      return 'Unknown';
  }
}
