/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { BuiltinWord, SourceLocation, Token } from '../../types.js';
import type { Dictionary } from './dictionary.js';
import type { ValueStack } from './stack.js';

// ============================================================
// COMPILED CODE
// ============================================================

/** Branch target of a placeholder that has not been backpatched yet */
export const UNRESOLVED = -1;

/**
 * One step of a compiled word body.
 * `call` is bound to the callee entry at compile time; `recurse` calls the
 * word the body belongs to.
 */
export type Instruction =
  | { readonly op: 'literal'; readonly value: number }
  | { readonly op: 'builtin'; readonly word: BuiltinWord }
  | { readonly op: 'call'; readonly entry: UserEntry }
  | { readonly op: 'recurse' }
  | { readonly op: 'branch-if-zero'; readonly target: number }
  | { readonly op: 'branch'; readonly target: number };

export interface BuiltinEntry {
  readonly kind: 'builtin';
  readonly name: BuiltinWord;
}

export interface UserEntry {
  readonly kind: 'user';
  readonly name: string;
  readonly body: readonly Instruction[];
}

export type DictionaryEntry = BuiltinEntry | UserEntry;

// ============================================================
// INTERPRETER STATE
// ============================================================

/** Forward branch awaiting its target */
export interface PatchSite {
  /** Index of the placeholder in the body */
  readonly index: number;
  readonly openedBy: 'IF' | 'ELSE';
}

/** Definition being compiled between ":" and ";" */
export interface PendingDefinition {
  readonly name: string;
  readonly location: SourceLocation;
  readonly body: Instruction[];
  readonly patches: PatchSite[];
}

export type InterpreterState =
  | { readonly mode: 'execute' }
  | { readonly mode: 'compile'; readonly definition: PendingDefinition };

export type InterpreterMode = InterpreterState['mode'];

// ============================================================
// CALLBACKS
// ============================================================

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called when "." prints a value */
  onOutput: (value: number) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before a user word body runs */
  onWordCall?: (event: WordCallEvent) => void;
  /** Called after a user word body returns */
  onWordReturn?: (event: WordReturnEvent) => void;
  /** Called when ";" installs a definition */
  onDefine?: (event: DefineEvent) => void;
  /** Called when a line fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a user word runs */
export interface WordCallEvent {
  name: string;
  /** Nesting depth, 1 for a word called from the line itself */
  depth: number;
}

/** Event emitted after a user word returns */
export interface WordReturnEvent {
  name: string;
  depth: number;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted when a definition is installed */
export interface DefineEvent {
  name: string;
  /** Compiled body */
  body: readonly Instruction[];
  /** True when an earlier definition was shadowed */
  replaced: boolean;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: Error;
  /** Token being processed when the error occurred */
  token?: Token | undefined;
}

// ============================================================
// CONTEXT
// ============================================================

/** Options for createRuntimeContext */
export interface RuntimeOptions {
  /** Value stack cells (default 256) */
  stackCapacity?: number | undefined;
  /** Maximum nesting of user word calls (default 256) */
  recursionLimit?: number | undefined;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks> | undefined;
  /** Observability callbacks */
  observability?: ObservabilityCallbacks | undefined;
}

/** Interpreter context owning the value stack, dictionary and compiler state */
export interface RuntimeContext {
  readonly stack: ValueStack;
  readonly dictionary: Dictionary;
  readonly recursionLimit: number;
  /** I/O callbacks */
  readonly callbacks: RuntimeCallbacks;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
  /** Current mode, with the pending definition while compiling */
  state: InterpreterState;
  /** Nested user word calls in progress */
  callDepth: number;
}

/** Result of executing one line of tokens */
export interface ExecutionResult {
  /** Value stack after the line, bottom first */
  readonly stack: number[];
  /** Names installed by definitions on the line, in order */
  readonly defined: string[];
}
