/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer holds the container's types, contracts and errors.
 * NO infrastructure dependencies are allowed here (Hexagonal Architecture).
 *
 * @module @lazywire/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// DI - Types, interfaces and errors
// ============================================================================
export * from './di';
