/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorKind,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface StackwordErrorData {
  readonly errorId: string;
  readonly kind: ErrorKind;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for every failure the engine reports.
 * The message is rendered from the registry template; `location`, when
 * present, is appended as ` at line:column`.
 */
export class StackwordError extends Error {
  readonly errorId: string;
  readonly kind: ErrorKind;
  readonly location?: SourceLocation | undefined;
  readonly context: Record<string, unknown>;

  constructor(
    errorId: string,
    context: Record<string, unknown> = {},
    location?: SourceLocation
  ) {
    const definition = lookupDefinition(errorId);
    const message = renderMessage(definition.messageTemplate, context);
    const locationStr = location
      ? ` at ${location.line}:${location.column}`
      : '';
    super(`${message}${locationStr}`);
    this.name = 'StackwordError';
    this.errorId = errorId;
    this.kind = definition.kind;
    this.location = location;
    this.context = context;
  }

  /** Get structured error data for custom formatting */
  toData(): StackwordErrorData {
    return {
      errorId: this.errorId,
      kind: this.kind,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: StackwordErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Definition and control-flow errors raised while compiling */
export class CompileError extends StackwordError {
  constructor(
    errorId: string,
    context: Record<string, unknown> = {},
    location?: SourceLocation
  ) {
    lookupDefinition(errorId, 'compile');
    super(errorId, context, location);
    this.name = 'CompileError';
  }
}

/** Errors raised while executing words */
export class RuntimeError extends StackwordError {
  constructor(
    errorId: string,
    context: Record<string, unknown> = {},
    location?: SourceLocation
  ) {
    lookupDefinition(errorId, 'runtime');
    super(errorId, context, location);
    this.name = 'RuntimeError';
  }
}

export class StackUnderflowError extends RuntimeError {
  readonly word: string;
  readonly needed: number;
  readonly depth: number;

  constructor(
    word: string,
    needed: number,
    depth: number,
    location?: SourceLocation
  ) {
    super('SW-R001', { word, needed, depth }, location);
    this.name = 'StackUnderflowError';
    this.word = word;
    this.needed = needed;
    this.depth = depth;
  }
}

export class StackOverflowError extends RuntimeError {
  readonly capacity: number;

  constructor(capacity: number, location?: SourceLocation) {
    super('SW-R002', { capacity }, location);
    this.name = 'StackOverflowError';
    this.capacity = capacity;
  }
}

export class RecursionLimitError extends RuntimeError {
  readonly limit: number;
  readonly wordName: string;

  constructor(limit: number, wordName: string, location?: SourceLocation) {
    super('SW-R004', { limit, name: wordName }, location);
    this.name = 'RecursionLimitError';
    this.limit = limit;
    this.wordName = wordName;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error of the right class for a registry entry.
 *
 * @example
 * createError("SW-R003", { name: "FOO" }, location)
 * // RuntimeError: "Unknown word: FOO at 1:5"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation
): StackwordError {
  const definition = lookupDefinition(errorId);
  return definition.category === 'compile'
    ? new CompileError(errorId, context, location)
    : new RuntimeError(errorId, context, location);
}

/** Narrow an unknown thrown value to an engine error */
export function isStackwordError(value: unknown): value is StackwordError {
  return value instanceof StackwordError;
}
