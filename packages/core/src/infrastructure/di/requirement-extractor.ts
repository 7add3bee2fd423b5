/**
 * @fileoverview Requirement Extractor - Constructor Requirements
 *
 * @packageDocumentation
 * @module @lazywire/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Combines the parameter NAMES read from a constructor's source with the
 * parameter TYPES declared in its static `inject` list:
 *
 * ```typescript
 * class ReportService {
 *   static inject = [Database, named('smtp', Mailer)] as const;
 *   constructor(db: Database, mailer: Mailer, clock?: Clock) {}
 * }
 *
 * extractRequirements(ReportService);
 * // [
 * //   { name: 'db',    type: Database },
 * //   { name: 'smtp',  type: Mailer },
 * //   { name: 'clock', type: Object },   // undeclared: any type
 * // ]
 * ```
 *
 * Declared names (a string entry, or `name` in a `{ name?, type? }` entry)
 * replace the parameter name. Parameter names are only a best-effort default.
 *
 * @version 1.0.0
 */

import {
  type Requirement,
  ANY_TYPE,
  InvalidArgumentError,
  createRequirement,
  getInjectDeclarations,
  isComponentType,
  isInjectionPoint,
} from '../../domain/di';

import { readParameterNames } from './parameter-reader';

/**
 * Derive the ordered requirements of a constructor or function.
 *
 * @param target - Class, function or method to inspect
 * @param declarations - Positional type declarations; defaults to `target.inject`
 * @returns One requirement per non-rest parameter, plus one per extra declaration
 * @throws InvalidArgumentError if `target` is not a function, exposes no
 *   source, or a declaration is malformed
 */
export function extractRequirements(
  target: unknown,
  declarations?: readonly unknown[],
): Requirement[] {
  if (typeof target !== 'function') {
    throw new InvalidArgumentError(
      `Expected a constructor or a function to extract requirements from, got ${describeValue(target)}.`,
    );
  }

  const names = readParameterNames(target);
  const declared = declarations ?? getInjectDeclarations(target);
  const count = Math.max(names.length, declared.length);
  const ownerName = target.name || 'anonymous';

  const requirements: Requirement[] = [];
  for (let index = 0; index < count; index++) {
    const parameterName = names[index];
    const declaration = declared[index];

    if (declaration === undefined) {
      requirements.push(createRequirement(parameterName, ANY_TYPE));
      continue;
    }
    if (!isInjectionPoint(declaration)) {
      throw new InvalidArgumentError(
        `Invalid inject entry #${index} of '${ownerName}': expected a type, a component name ` +
          `or { name?, type? }, got ${describeValue(declaration)}.`,
      );
    }

    if (typeof declaration === 'string') {
      requirements.push(createRequirement(declaration, ANY_TYPE));
    } else if (isComponentType(declaration)) {
      requirements.push(createRequirement(parameterName, declaration));
    } else {
      requirements.push(
        createRequirement(declaration.name ?? parameterName, declaration.type ?? ANY_TYPE),
      );
    }
  }

  return requirements;
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'an array';
  }
  return typeof value;
}
