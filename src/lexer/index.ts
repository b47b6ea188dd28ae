/**
 * Lexer Module
 * Converts one input line into tokens
 */

export { createLexerState, type LexerState } from './state.js';
export {
  DEFAULT_MAX_TOKENS,
  nextToken,
  tokenize,
  type TokenizeOptions,
  type TokenizeResult,
} from './tokenizer.js';
export { KEYWORDS, RESERVED_NAMES, SINGLE_CHAR_OPERATORS } from './operators.js';
export { toCell } from './readers.js';
