/**
 * Runtime Context Factory
 *
 * Creates the interpreter context for line execution.
 * Public API for host applications.
 */

import { Dictionary } from './dictionary.js';
import { DEFAULT_STACK_CAPACITY, ValueStack } from './stack.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';

/** Default maximum nesting of user word calls */
export const DEFAULT_RECURSION_LIMIT = 256;

const defaultCallbacks: RuntimeCallbacks = {
  onOutput: (value) => {
    console.log(String(value));
  },
};

/**
 * Create a runtime context for line execution.
 * The stack and dictionary it owns persist across every line run against it.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const recursionLimit = options.recursionLimit ?? DEFAULT_RECURSION_LIMIT;
  if (!Number.isInteger(recursionLimit) || recursionLimit < 1) {
    throw new RangeError(
      `Recursion limit must be a positive integer, got ${recursionLimit}`
    );
  }

  return {
    stack: new ValueStack(options.stackCapacity ?? DEFAULT_STACK_CAPACITY),
    dictionary: new Dictionary(),
    recursionLimit,
    callbacks: {
      ...defaultCallbacks,
      ...options.callbacks,
    },
    observability: options.observability ?? {},
    state: { mode: 'execute' },
    callDepth: 0,
  };
}
