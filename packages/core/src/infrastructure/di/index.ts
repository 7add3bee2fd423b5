/**
 * @fileoverview Infrastructure DI Module Exports
 *
 * @packageDocumentation
 * @module @lazywire/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module exports the concrete container, its factories and the
 * resolution machinery.
 *
 * ## Usage
 *
 * ```typescript
 * import { Container } from '@lazywire/core/infrastructure/di';
 *
 * const container = new Container();
 * container
 *   .registerType(ConfigService)
 *   .registerType(PrintService)
 *   .registerInstance(new Printer('lp0'), 'printer');
 *
 * container.setup();
 *
 * const printing = container.getComponent(PrintService);
 * ```
 */

// ============================================================================
// Container - Public Facade
// ============================================================================

export { Container, toComponentKey } from './container';

// ============================================================================
// Repository and Factories
// ============================================================================

export { ComponentRepository } from './repository';

export { ComponentFactory, StaticComponentFactory } from './component-factory';

export {
  AbstractCreatingComponentFactory,
  SingletonComponentFactory,
  PrototypeComponentFactory,
} from './creating-factories';

// ============================================================================
// Requirements and Resolution
// ============================================================================

export { extractRequirements } from './requirement-extractor';

export { readParameterNames } from './parameter-reader';

export { ResolutionContext } from './resolution-context';

// ============================================================================
// Naming
// ============================================================================

export { SnakeCaseNamingStrategy } from './naming-strategy';
