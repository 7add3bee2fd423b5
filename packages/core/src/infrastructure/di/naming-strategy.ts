/**
 * @fileoverview Naming Strategies - Type Name to Component Name
 *
 * @packageDocumentation
 * @module @lazywire/core/infrastructure/di
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

import { type ComponentType, type INamingStrategy, InvalidArgumentError } from '../../domain/di';

/**
 * Converts a PascalCase type name into a snake_case component name.
 *
 * @remarks
 * A separator is inserted before each interior uppercase letter, which is
 * then lowercased. Runs of capitals are not grouped: `HTTPClient` becomes
 * `h_t_t_p_client`.
 *
 * @example
 * ```typescript
 * const naming = new SnakeCaseNamingStrategy();
 * naming.toComponentName(PrintService); // 'print_service'
 * naming.toComponentName(A);            // 'a'
 * ```
 */
export class SnakeCaseNamingStrategy implements INamingStrategy {
  toComponentName(type: ComponentType): string {
    const typeName = type.name;
    if (!typeName) {
      throw new InvalidArgumentError(
        'Cannot derive a component name from an anonymous type. Pass an explicit name.',
      );
    }

    let componentName = '';
    for (const ch of typeName) {
      const lower = ch.toLowerCase();
      if (ch !== lower) {
        if (componentName.length > 0) {
          componentName += '_';
        }
        componentName += lower;
      } else {
        componentName += ch;
      }
    }

    return componentName;
  }
}
