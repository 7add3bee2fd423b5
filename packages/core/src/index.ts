/**
 * @fileoverview @lazywire/core - Main Entry Point
 *
 * Lazy, name- and type-addressed dependency injection for Node.js.
 *
 * @packageDocumentation
 * @module @lazywire/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import { Container, named } from '@lazywire/core';
 *
 * class Database {}
 *
 * class ReportService {
 *   static inject = [named('database', Database)] as const;
 *   constructor(readonly db: Database) {}
 * }
 *
 * const container = new Container();
 * container.registerTypes(Database, ReportService);
 * container.setup();
 *
 * const reports = container.getComponent(ReportService);
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Types, contracts and errors - NO runtime dependencies
// ============================================================================
export * from './domain';

// ============================================================================
// Infrastructure Layer Exports
// Container, factories, resolution
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
