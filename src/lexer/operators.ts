/**
 * Operator and Keyword Lookup Tables
 */

import type { BuiltinWord, ControlWord } from '../types.js';

export type OperatorToken =
  | { readonly kind: 'builtin'; readonly word: BuiltinWord }
  | { readonly kind: 'define-start' }
  | { readonly kind: 'define-end' };

export type KeywordToken =
  | { readonly kind: 'builtin'; readonly word: BuiltinWord }
  | { readonly kind: 'control'; readonly word: ControlWord };

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, OperatorToken>> = {
  '+': { kind: 'builtin', word: '+' },
  '-': { kind: 'builtin', word: '-' },
  '*': { kind: 'builtin', word: '*' },
  '/': { kind: 'builtin', word: '/' },
  '%': { kind: 'builtin', word: 'MOD' },
  '.': { kind: 'builtin', word: '.' },
  '=': { kind: 'builtin', word: '=' },
  '<': { kind: 'builtin', word: '<' },
  '>': { kind: 'builtin', word: '>' },
  ':': { kind: 'define-start' },
  ';': { kind: 'define-end' },
};

/** Alphabetic built-in names, matched after upper-casing */
export const KEYWORDS: Readonly<Record<string, KeywordToken>> = {
  DUP: { kind: 'builtin', word: 'DUP' },
  DROP: { kind: 'builtin', word: 'DROP' },
  SWAP: { kind: 'builtin', word: 'SWAP' },
  CL: { kind: 'builtin', word: 'CL' },
  ABS: { kind: 'builtin', word: 'ABS' },
  MOD: { kind: 'builtin', word: 'MOD' },
  IF: { kind: 'control', word: 'IF' },
  ELSE: { kind: 'control', word: 'ELSE' },
  THEN: { kind: 'control', word: 'THEN' },
};

/** Names a user definition may not take */
export const RESERVED_NAMES: ReadonlySet<string> = new Set(
  Object.keys(KEYWORDS)
);
