/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { isAlpha, isDigit, isSign, isWhitespace, makeSpan } from './helpers.js';
import { SINGLE_CHAR_OPERATORS } from './operators.js';
import { readNumber, readWord } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Default token buffer size for one line */
export const DEFAULT_MAX_TOKENS = 128;

export interface TokenizeOptions {
  /** Tokens kept per line; later tokens are dropped */
  readonly maxTokens?: number | undefined;
  /** Line number recorded in token spans */
  readonly line?: number | undefined;
}

export interface TokenizeResult {
  readonly tokens: Token[];
  /** True when the line held more than maxTokens tokens */
  readonly truncated: boolean;
}

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

/**
 * Read the next token, or null at end of line.
 * Characters that start no token are consumed and ignored.
 */
export function nextToken(state: LexerState): Token | null {
  for (;;) {
    skipWhitespace(state);

    if (isAtEnd(state)) {
      return null;
    }

    const ch = peek(state);

    // Number, including a sign glued to its first digit
    if (isDigit(ch) || (isSign(ch) && isDigit(peek(state, 1)))) {
      return readNumber(state);
    }

    // Word or alphabetic built-in
    if (isAlpha(ch)) {
      return readWord(state);
    }

    const operator = SINGLE_CHAR_OPERATORS[ch];
    const start = currentLocation(state);
    advance(state);

    if (operator) {
      return {
        ...operator,
        text: ch,
        span: makeSpan(start, currentLocation(state)),
      };
    }
    // Anything else is skipped
  }
}

export function tokenize(
  source: string,
  options: TokenizeOptions = {}
): TokenizeResult {
  const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  const state = createLexerState(source, options.line);
  const tokens: Token[] = [];
  let token = nextToken(state);

  while (token !== null) {
    if (tokens.length >= maxTokens) {
      return { tokens, truncated: true };
    }
    tokens.push(token);
    token = nextToken(state);
  }

  return { tokens, truncated: false };
}
