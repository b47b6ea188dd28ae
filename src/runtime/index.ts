/**
 * Runtime
 *
 * Public API for running lines against an interpreter context.
 *
 * Module Structure:
 * - core/: Execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, Instruction, etc.)
 *   - stack.ts: Fixed-capacity value stack
 *   - dictionary.ts: Built-in and user word entries
 *   - context.ts: Runtime context factory
 *   - compile.ts: Definition compiler with branch backpatching
 *   - execute.ts: Token execution (execute)
 *   - interpret.ts: Lex-and-execute for one line (interpretLine)
 *   - introspection.ts: Dictionary listings and body decompiling
 * - ext/: Built-in word table
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  BuiltinEntry,
  DefineEvent,
  DictionaryEntry,
  ErrorEvent,
  ExecutionResult,
  Instruction,
  InterpreterMode,
  InterpreterState,
  ObservabilityCallbacks,
  PatchSite,
  PendingDefinition,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  UserEntry,
  WordCallEvent,
  WordReturnEvent,
} from './core/types.js';

export { UNRESOLVED } from './core/types.js';

// ============================================================
// ENGINE
// ============================================================

export { ValueStack, DEFAULT_STACK_CAPACITY } from './core/stack.js';
export { Dictionary } from './core/dictionary.js';
export {
  createRuntimeContext,
  DEFAULT_RECURSION_LIMIT,
} from './core/context.js';
export { execute, resetInterpreter } from './core/execute.js';
export {
  interpretLine,
  type InterpretOptions,
  type LineOutcome,
} from './core/interpret.js';

// ============================================================
// INTROSPECTION
// ============================================================

export {
  formatBody,
  formatInstruction,
  getWords,
  type WordMetadata,
} from './core/introspection.js';

// ============================================================
// BUILT-INS
// ============================================================

export {
  BUILTINS,
  runBuiltin,
  type BuiltinDefinition,
} from './ext/builtins.js';
