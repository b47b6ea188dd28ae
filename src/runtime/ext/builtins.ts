/**
 * Built-in Words
 *
 * Each built-in declares how many values it consumes and produces. The
 * dispatcher checks both against the stack before the action runs, so a
 * failing built-in never changes the stack.
 */

import {
  type BuiltinWord,
  RuntimeError,
  type SourceLocation,
  StackOverflowError,
  StackUnderflowError,
} from '../../types.js';
import type { ValueStack } from '../core/stack.js';
import type { RuntimeContext } from '../core/types.js';

export interface BuiltinDefinition {
  readonly description: string;
  /** Values popped */
  readonly consumes: number;
  /** Values pushed */
  readonly produces: number;
  /** Runs after depth and capacity have been checked */
  readonly run: (
    stack: ValueStack,
    ctx: RuntimeContext,
    location?: SourceLocation
  ) => void;
}

/** Wrap a result to a 32-bit signed cell */
function cell(value: number): number {
  return value | 0;
}

function binary(
  description: string,
  fn: (a: number, b: number) => number
): BuiltinDefinition {
  return {
    description,
    consumes: 2,
    produces: 1,
    run: (stack) => {
      const b = stack.pop();
      const a = stack.pop();
      stack.push(fn(a, b));
    },
  };
}

function dividing(
  word: BuiltinWord,
  description: string,
  fn: (a: number, b: number) => number
): BuiltinDefinition {
  return {
    description,
    consumes: 2,
    produces: 1,
    run: (stack, _ctx, location) => {
      if (stack.peek() === 0) {
        throw new RuntimeError('SW-R005', { word }, location);
      }
      const b = stack.pop();
      const a = stack.pop();
      stack.push(fn(a, b));
    },
  };
}

function comparison(
  description: string,
  fn: (a: number, b: number) => boolean
): BuiltinDefinition {
  return binary(description, (a, b) => (fn(a, b) ? 1 : 0));
}

export const BUILTINS: Readonly<Record<BuiltinWord, BuiltinDefinition>> = {
  DUP: {
    description: 'Duplicate the top value',
    consumes: 1,
    produces: 2,
    run: (stack) => stack.push(stack.peek()),
  },
  DROP: {
    description: 'Discard the top value',
    consumes: 1,
    produces: 0,
    run: (stack) => {
      stack.pop();
    },
  },
  SWAP: {
    description: 'Exchange the top two values',
    consumes: 2,
    produces: 2,
    run: (stack) => {
      const b = stack.pop();
      const a = stack.pop();
      stack.push(b);
      stack.push(a);
    },
  },
  CL: {
    description: 'Clear the stack',
    consumes: 0,
    produces: 0,
    run: (stack) => stack.clear(),
  },
  ABS: {
    description: 'Replace the top value with its absolute value',
    consumes: 1,
    produces: 1,
    run: (stack) => stack.push(cell(Math.abs(stack.pop()))),
  },
  '+': binary('Add', (a, b) => cell(a + b)),
  '-': binary('Subtract the top value from the one below', (a, b) =>
    cell(a - b)
  ),
  '*': binary('Multiply', (a, b) => Math.imul(a, b)),
  '/': dividing('/', 'Divide, truncating toward zero', (a, b) =>
    cell(Math.trunc(a / b))
  ),
  MOD: dividing('MOD', 'Remainder, with the sign of the dividend', (a, b) =>
    cell(a % b)
  ),
  '.': {
    description: 'Pop and print the top value',
    consumes: 1,
    produces: 0,
    run: (stack, ctx) => ctx.callbacks.onOutput(stack.pop()),
  },
  '=': comparison('1 if equal, else 0', (a, b) => a === b),
  '<': comparison('1 if below is less than top, else 0', (a, b) => a < b),
  '>': comparison('1 if below is greater than top, else 0', (a, b) => a > b),
};

/**
 * Run a built-in against the context stack.
 *
 * @throws StackUnderflowError when fewer than `consumes` values are present
 * @throws StackOverflowError when the result would not fit
 */
export function runBuiltin(
  word: BuiltinWord,
  ctx: RuntimeContext,
  location?: SourceLocation
): void {
  const builtin = BUILTINS[word];
  const { stack } = ctx;
  const depth = stack.depth();

  if (depth < builtin.consumes) {
    throw new StackUnderflowError(word, builtin.consumes, depth, location);
  }
  if (builtin.produces - builtin.consumes > stack.room()) {
    throw new StackOverflowError(stack.capacity, location);
  }

  builtin.run(stack, ctx, location);
}
