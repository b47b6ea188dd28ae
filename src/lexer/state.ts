/**
 * Lexer State
 * Tracks the cursor position inside one input line
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  readonly line: number;
  column: number;
}

export function createLexerState(source: string, line = 1): LexerState {
  return {
    source,
    pos: 0,
    line,
    column: 1,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  state.column++;
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
