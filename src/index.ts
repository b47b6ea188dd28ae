/**
 * Stackword Module
 * Exports lexer, runtime, configuration and error types
 */

export {
  createLexerState,
  DEFAULT_MAX_TOKENS,
  KEYWORDS,
  nextToken,
  RESERVED_NAMES,
  SINGLE_CHAR_OPERATORS,
  toCell,
  tokenize,
  type LexerState,
  type TokenizeOptions,
  type TokenizeResult,
} from './lexer/index.js';

export {
  type BuiltinDefinition,
  type BuiltinEntry,
  BUILTINS,
  createRuntimeContext,
  DEFAULT_RECURSION_LIMIT,
  DEFAULT_STACK_CAPACITY,
  type DefineEvent,
  Dictionary,
  type DictionaryEntry,
  type ErrorEvent,
  execute,
  type ExecutionResult,
  formatBody,
  formatInstruction,
  getWords,
  type Instruction,
  interpretLine,
  type InterpreterMode,
  type InterpreterState,
  type InterpretOptions,
  type LineOutcome,
  type ObservabilityCallbacks,
  type PatchSite,
  type PendingDefinition,
  resetInterpreter,
  runBuiltin,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
  UNRESOLVED,
  type UserEntry,
  ValueStack,
  type WordCallEvent,
  type WordMetadata,
  type WordReturnEvent,
} from './runtime/index.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  DEFAULT_MAX_LINE_LENGTH,
  loadConfig,
  parseConfig,
  type StackwordConfig,
  validateConfig,
} from './config.js';

export * from './types.js';
