/**
 * @fileoverview SnakeCaseNamingStrategy Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import { type ComponentType, InvalidArgumentError } from '../../../src/domain/di';
import { SnakeCaseNamingStrategy } from '../../../src/infrastructure/di';

class PrintService {}
class A {}
class HTTPClient {}
class lowercase {}
class Version2Handler {}

function anonymousType(): ComponentType {
  return class {};
}

describe('SnakeCaseNamingStrategy', () => {
  const strategy = new SnakeCaseNamingStrategy();

  it('should convert PascalCase type names to snake_case', () => {
    expect(strategy.toComponentName(PrintService)).toBe('print_service');
  });

  it('should lowercase a single-letter name', () => {
    expect(strategy.toComponentName(A)).toBe('a');
  });

  it('should separate every interior capital', () => {
    expect(strategy.toComponentName(HTTPClient)).toBe('h_t_t_p_client');
  });

  it('should keep lowercase names unchanged', () => {
    expect(strategy.toComponentName(lowercase)).toBe('lowercase');
  });

  it('should keep digits in place', () => {
    expect(strategy.toComponentName(Version2Handler)).toBe('version2_handler');
  });

  it('should reject anonymous types', () => {
    expect(() => strategy.toComponentName(anonymousType())).toThrow(InvalidArgumentError);
  });
});
