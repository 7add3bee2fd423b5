/**
 * @fileoverview Domain DI Module Exports
 *
 * @packageDocumentation
 * @module @lazywire/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module exports the container's types, contracts and error classes.
 * The Infrastructure layer implements them.
 *
 * ## Zero-Reflection Pattern
 *
 * ```typescript
 * import { named } from '@lazywire/core/domain/di';
 *
 * class ReportService {
 *   static inject = [named('primary_db', Database), Mailer] as const;
 *   constructor(private db: Database, private mailer: Mailer) {}
 * }
 * ```
 */

// ============================================================================
// Component Types and Keys
// ============================================================================

export {
  type ComponentClass,
  type ComponentType,
  type ComponentKey,
  type ComponentKeyLike,
  type IComponentNameKey,
  type IComponentTypeKey,
  ANY_TYPE,
  CONTAINER_COMPONENT_NAME,
  isComponentType,
  isSubtypeOf,
  getInstanceType,
  getTypeName,
  byName,
  byType,
  isComponentKey,
  describeKey,
} from './component-type';

// ============================================================================
// Component Scope
// ============================================================================

export { ComponentScope, isContainerOwned, getScopeName } from './component-scope';

// ============================================================================
// Requirements
// ============================================================================

export {
  type Requirement,
  type IRequirementSpec,
  type InjectionPoint,
  type IInjectable,
  named,
  createRequirement,
  isInjectionPoint,
  getInjectDeclarations,
  describeRequirement,
} from './requirement';

// ============================================================================
// DI Interfaces
// ============================================================================

export {
  type IDisposable,
  type IResolutionContext,
  type IComponentFactory,
  type ICreatingComponentFactory,
  type IComponentRepository,
  type INamingStrategy,
  type IContainerOptions,
  type ISetupOptions,
  type IContainer,
  isDisposable,
  isCreatingFactory,
} from './di.interface';

// ============================================================================
// DI Errors
// ============================================================================

export {
  ContainerError,
  InvalidArgumentError,
  InvalidStateError,
  NotInitializedError,
  InternalInconsistencyError,
  NameConflictError,
  UnknownComponentError,
  AmbiguousComponentError,
  TypeMismatchError,
  CyclicDependencyError,
  ComponentCreationError,
} from './di.errors';
