import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

/** Built-ins that act directly on the value stack (or print from it) */
export const BUILTIN_WORDS = [
  'DUP',
  'DROP',
  'SWAP',
  'CL',
  'ABS',
  '+',
  '-',
  '*',
  '/',
  'MOD',
  '.',
  '=',
  '<',
  '>',
] as const;

export type BuiltinWord = (typeof BUILTIN_WORDS)[number];

/** Words that only have meaning while a definition is being compiled */
export const CONTROL_WORDS = ['IF', 'ELSE', 'THEN'] as const;

export type ControlWord = (typeof CONTROL_WORDS)[number];

interface TokenBase {
  /** Source text the token was read from */
  readonly text: string;
  readonly span: SourceSpan;
}

export interface IntegerToken extends TokenBase {
  readonly kind: 'integer';
  readonly value: number;
}

export interface BuiltinToken extends TokenBase {
  readonly kind: 'builtin';
  readonly word: BuiltinWord;
}

export interface WordToken extends TokenBase {
  readonly kind: 'word';
  /** Upper-cased name */
  readonly name: string;
}

export interface ControlToken extends TokenBase {
  readonly kind: 'control';
  readonly word: ControlWord;
}

export interface DefineStartToken extends TokenBase {
  readonly kind: 'define-start';
}

export interface DefineEndToken extends TokenBase {
  readonly kind: 'define-end';
}

export type Token =
  | IntegerToken
  | BuiltinToken
  | WordToken
  | ControlToken
  | DefineStartToken
  | DefineEndToken;

export type TokenKind = Token['kind'];

/**
 * Render a token for debugging output.
 *
 * @example
 * formatToken(integer 42)    // "INT(42)"
 * formatToken(word SQUARE)   // "WORD(SQUARE)"
 * formatToken(builtin DUP)   // "DUP"
 */
export function formatToken(token: Token): string {
  switch (token.kind) {
    case 'integer':
      return `INT(${token.value})`;
    case 'word':
      return `WORD(${token.name})`;
    case 'builtin':
    case 'control':
      return token.word;
    case 'define-start':
      return ':';
    case 'define-end':
      return ';';
  }
}
