/**
 * Value Stack
 *
 * Fixed-capacity LIFO of 32-bit signed integers. Height always stays in
 * [0, capacity]; a failing operation leaves the stack unchanged.
 */

import { StackOverflowError, StackUnderflowError } from '../../types.js';

/** Default number of cells */
export const DEFAULT_STACK_CAPACITY = 256;

export class ValueStack {
  private readonly cells: number[] = [];

  constructor(readonly capacity: number = DEFAULT_STACK_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Stack capacity must be a positive integer, got ${capacity}`
      );
    }
  }

  push(value: number): void {
    if (this.cells.length >= this.capacity) {
      throw new StackOverflowError(this.capacity);
    }
    this.cells.push(value);
  }

  pop(): number {
    const value = this.cells.pop();
    if (value === undefined) {
      throw new StackUnderflowError('pop', 1, 0);
    }
    return value;
  }

  peek(): number {
    const value = this.cells.at(-1);
    if (value === undefined) {
      throw new StackUnderflowError('peek', 1, 0);
    }
    return value;
  }

  depth(): number {
    return this.cells.length;
  }

  /** Free cells left before overflow */
  room(): number {
    return this.capacity - this.cells.length;
  }

  clear(): void {
    this.cells.length = 0;
  }

  /** Copy of the cells, bottom first */
  toArray(): number[] {
    return [...this.cells];
  }
}
