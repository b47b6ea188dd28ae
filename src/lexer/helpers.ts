/**
 * Lexer Helper Functions
 * Character classification and span construction
 */

import type { SourceLocation, SourceSpan } from '../types.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isAlpha(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isAlphanumeric(ch: string): boolean {
  return isAlpha(ch) || isDigit(ch);
}

export function isSign(ch: string): boolean {
  return ch === '-' || ch === '+';
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
