/**
 * Dictionary
 *
 * Name-to-entry mapping seeded with the built-in words. User entries are
 * immutable once installed; defining a name again replaces the entry, and
 * bodies compiled against the old entry keep using it.
 */

import { BUILTIN_WORDS, CompileError } from '../../types.js';
import { RESERVED_NAMES } from '../../lexer/index.js';
import type { BuiltinEntry, DictionaryEntry, UserEntry } from './types.js';

export class Dictionary {
  private readonly entries = new Map<string, DictionaryEntry>();

  constructor() {
    for (const word of BUILTIN_WORDS) {
      const entry: BuiltinEntry = { kind: 'builtin', name: word };
      this.entries.set(word, entry);
    }
  }

  lookup(name: string): DictionaryEntry | undefined {
    return this.entries.get(name.toUpperCase());
  }

  has(name: string): boolean {
    return this.entries.has(name.toUpperCase());
  }

  /** True for names a definition may not take */
  isReserved(name: string): boolean {
    const upper = name.toUpperCase();
    return (
      RESERVED_NAMES.has(upper) ||
      this.entries.get(upper)?.kind === 'builtin'
    );
  }

  /**
   * Install a user entry.
   *
   * @returns true when an earlier definition of the name was replaced
   * @throws CompileError (SW-C002) for a reserved name
   */
  define(entry: UserEntry): boolean {
    const name = entry.name.toUpperCase();
    if (this.isReserved(name)) {
      throw new CompileError('SW-C002', { name });
    }
    const replaced = this.entries.delete(name);
    // Re-inserted so userWords() follows definition order
    this.entries.set(name, Object.freeze(entry));
    return replaced;
  }

  /** User entries, oldest definition first */
  userWords(): UserEntry[] {
    const words: UserEntry[] = [];
    for (const entry of this.entries.values()) {
      if (entry.kind === 'user') words.push(entry);
    }
    return words;
  }

  get size(): number {
    return this.entries.size;
  }
}
