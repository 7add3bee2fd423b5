/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer contains the container implementation.
 *
 * @module @lazywire/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// DI - Container implementation
// ============================================================================
export * from './di';
