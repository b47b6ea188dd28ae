/**
 * Line Interpretation
 *
 * Lex-and-execute for one input line, reporting failure as a value so a
 * read-eval-print loop can carry on after an error.
 */

import { tokenize } from '../../lexer/index.js';
import { isStackwordError, type StackwordError } from '../../types.js';
import { execute } from './execute.js';
import type { RuntimeContext } from './types.js';

/** Options for interpretLine */
export interface InterpretOptions {
  /** Tokens kept per line (default 128) */
  maxTokens?: number | undefined;
  /** Line number recorded in error locations */
  line?: number | undefined;
}

export type LineOutcome =
  | {
      readonly status: 'ok';
      readonly stack: number[];
      readonly defined: string[];
      /** True when tokens past maxTokens were dropped */
      readonly truncated: boolean;
    }
  | {
      readonly status: 'error';
      readonly error: StackwordError;
      readonly truncated: boolean;
    };

/**
 * Lex and execute one line.
 * Engine failures come back as `{ status: 'error' }`; anything else thrown
 * is a defect and propagates.
 */
export function interpretLine(
  line: string,
  ctx: RuntimeContext,
  options: InterpretOptions = {}
): LineOutcome {
  const { tokens, truncated } = tokenize(line, {
    maxTokens: options.maxTokens,
    line: options.line,
  });

  try {
    const result = execute(tokens, ctx);
    return { status: 'ok', ...result, truncated };
  } catch (err) {
    if (isStackwordError(err)) {
      return { status: 'error', error: err, truncated };
    }
    throw err;
  }
}
