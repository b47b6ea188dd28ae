/**
 * Token Readers
 * Functions to read specific token types from the line
 */

import type { IntegerToken, Token } from '../types.js';
import { isAlphanumeric, isDigit, isSign, makeSpan } from './helpers.js';
import { KEYWORDS } from './operators.js';
import { advance, currentLocation, type LexerState, peek } from './state.js';

/**
 * Parse a decimal literal into a 32-bit signed cell.
 * Out-of-range literals wrap the way a 32-bit int does.
 */
export function toCell(text: string): number {
  return Number(BigInt.asIntN(32, BigInt(text)));
}

/** Read an optional sign followed by a maximal run of digits */
export function readNumber(state: LexerState): IntegerToken {
  const start = currentLocation(state);
  let text = '';

  if (isSign(peek(state))) {
    text += advance(state);
  }
  while (isDigit(peek(state))) {
    text += advance(state);
  }

  return {
    kind: 'integer',
    value: toCell(text),
    text,
    span: makeSpan(start, currentLocation(state)),
  };
}

/** Read a maximal alphanumeric run, classified against the keyword table */
export function readWord(state: LexerState): Token {
  const start = currentLocation(state);
  let text = '';

  while (isAlphanumeric(peek(state))) {
    text += advance(state);
  }

  const name = text.toUpperCase();
  const span = makeSpan(start, currentLocation(state));
  const keyword = KEYWORDS[name];

  if (keyword) {
    return { ...keyword, text, span };
  }
  return { kind: 'word', name, text, span };
}
