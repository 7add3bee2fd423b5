/**
 * @fileoverview ResolutionContext - Cyclic Reference Detection
 *
 * @packageDocumentation
 * @module @lazywire/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * One context is created per top-level `getComponent()` call and passed
 * down through every `produce()`. It holds the names of the components
 * currently under construction; revisiting one of them is a cycle.
 *
 * ```
 * getComponent(A)
 *   push a        [a]
 *   push b        [a, b]
 *   push c        [a, b, c]
 *   push a        → CyclicDependencyError ['a', 'b', 'c', 'a']
 * ```
 *
 * @version 1.0.0
 */

import {
  type IResolutionContext,
  CyclicDependencyError,
  InternalInconsistencyError,
} from '../../domain/di';

export class ResolutionContext implements IResolutionContext {
  private readonly stack: string[] = [];

  get path(): readonly string[] {
    return this.stack;
  }

  get depth(): number {
    return this.stack.length;
  }

  push(name: string): void {
    const index = this.stack.indexOf(name);
    if (index !== -1) {
      throw new CyclicDependencyError([...this.stack.slice(index), name]);
    }

    this.stack.push(name);
  }

  pop(name: string): void {
    if (this.stack.length === 0) {
      throw new InternalInconsistencyError(
        `Cannot pop '${name}' from the resolution stack: the stack is empty.`,
      );
    }

    const top = this.stack[this.stack.length - 1];
    if (top !== name) {
      throw new InternalInconsistencyError(
        `Cannot pop '${name}' from the resolution stack: '${top}' is on top.`,
        [...this.stack],
      );
    }

    this.stack.pop();
  }

  guard<T>(name: string, action: () => T): T {
    this.push(name);
    try {
      return action();
    } finally {
      this.pop(name);
    }
  }

  toString(): string {
    return `ResolutionContext(${this.stack.join(' -> ')})`;
  }
}
