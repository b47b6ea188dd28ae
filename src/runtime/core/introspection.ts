/**
 * Introspection
 *
 * Read-only views of the dictionary for hosts and the CLI.
 */

import { BUILTINS } from '../ext/builtins.js';
import type { Instruction, RuntimeContext, UserEntry } from './types.js';

export interface WordMetadata {
  readonly name: string;
  readonly kind: 'builtin' | 'user';
  /** Built-in description, or the decompiled body of a user word */
  readonly description: string;
}

/** Render one instruction; `self` names the word a `recurse` calls */
export function formatInstruction(
  instruction: Instruction,
  self: string
): string {
  switch (instruction.op) {
    case 'literal':
      return String(instruction.value);
    case 'builtin':
      return instruction.word;
    case 'call':
      return instruction.entry.name;
    case 'recurse':
      return self;
    case 'branch-if-zero':
      return `?BRANCH(${instruction.target})`;
    case 'branch':
      return `BRANCH(${instruction.target})`;
  }
}

/**
 * Decompile a user word body.
 *
 * @example
 * formatBody(ABSIFY) // "DUP 0 < ?BRANCH(7) 0 SWAP -"
 */
export function formatBody(entry: UserEntry): string {
  return entry.body
    .map((instruction) => formatInstruction(instruction, entry.name))
    .join(' ');
}

/** Every word in the dictionary: built-ins first, then user words */
export function getWords(ctx: RuntimeContext): WordMetadata[] {
  const builtins = Object.entries(BUILTINS).map(
    ([name, definition]): WordMetadata => ({
      name,
      kind: 'builtin',
      description: definition.description,
    })
  );
  const userWords = ctx.dictionary.userWords().map(
    (entry): WordMetadata => ({
      name: entry.name,
      kind: 'user',
      description: formatBody(entry),
    })
  );
  return [...builtins, ...userWords];
}
