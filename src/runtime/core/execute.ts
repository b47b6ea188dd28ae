/**
 * Token Execution
 *
 * Runs one line of tokens against a runtime context, switching between
 * immediate execution and compilation at ":" and ";".
 */

import {
  CompileError,
  type DefineStartToken,
  isStackwordError,
  RecursionLimitError,
  RuntimeError,
  type SourceLocation,
  StackOverflowError,
  StackUnderflowError,
  type Token,
} from '../../types.js';
import { runBuiltin } from '../ext/builtins.js';
import { compileToken, startDefinition } from './compile.js';
import type { ExecutionResult, RuntimeContext, UserEntry } from './types.js';

/** Return the context to execute mode after a failed line */
export function resetInterpreter(ctx: RuntimeContext): void {
  ctx.state = { mode: 'execute' };
  ctx.callDepth = 0;
}

/**
 * Interpret the tokens of one line.
 *
 * The line must leave the interpreter in execute mode: a definition opened
 * on the line has to be closed on it.
 *
 * @throws StackwordError on any failure, after discarding a pending
 * definition. The value stack keeps the effects of the operations that
 * completed before the failure.
 */
export function execute(
  tokens: readonly Token[],
  ctx: RuntimeContext
): ExecutionResult {
  const defined: string[] = [];
  let current: Token | undefined;

  try {
    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      if (token === undefined) break;
      current = token;

      if (ctx.state.mode === 'compile') {
        const installed = compileToken(ctx, ctx.state.definition, token);
        if (installed) defined.push(installed.name);
      } else if (token.kind === 'define-start') {
        startDefinition(ctx, token, tokens[i + 1]);
        i++;
      } else {
        executeToken(ctx, token);
      }
    }

    if (ctx.state.mode === 'compile') {
      const { definition } = ctx.state;
      throw new CompileError(
        'SW-C008',
        { name: definition.name },
        definition.location
      );
    }
  } catch (err) {
    resetInterpreter(ctx);
    if (isStackwordError(err)) {
      ctx.observability.onError?.({ error: err, token: current });
    }
    throw err;
  }

  return { stack: ctx.stack.toArray(), defined };
}

/** Act on a token in execute mode; ":" is handled by execute() */
function executeToken(
  ctx: RuntimeContext,
  token: Exclude<Token, DefineStartToken>
): void {
  const location = token.span.start;

  switch (token.kind) {
    case 'integer':
      pushLiteral(ctx, token.value, location);
      return;

    case 'builtin':
      runBuiltin(token.word, ctx, location);
      return;

    case 'word': {
      const entry = ctx.dictionary.lookup(token.name);
      if (entry === undefined) {
        throw new RuntimeError('SW-R003', { name: token.name }, location);
      }
      if (entry.kind === 'builtin') {
        runBuiltin(entry.name, ctx, location);
      } else {
        callWord(ctx, entry, location);
      }
      return;
    }

    case 'control':
      throw new CompileError('SW-C004', { word: token.word }, location);

    case 'define-end':
      throw new CompileError('SW-C005', {}, location);
  }
}

function pushLiteral(
  ctx: RuntimeContext,
  value: number,
  location: SourceLocation
): void {
  if (ctx.stack.room() === 0) {
    throw new StackOverflowError(ctx.stack.capacity, location);
  }
  ctx.stack.push(value);
}

/** Activation of a user word on the return stack */
interface Frame {
  readonly entry: UserEntry;
  /** Next instruction to run */
  pc: number;
  readonly depth: number;
  readonly startTime: number;
}

/**
 * Run a user word. Nested calls push frames on an explicit return stack
 * bounded by the recursion limit, so the host call stack never grows with
 * the nesting depth.
 *
 * Errors inside nested words report the location of the token on the
 * current line that started the call chain.
 */
export function callWord(
  ctx: RuntimeContext,
  entry: UserEntry,
  location: SourceLocation
): void {
  const baseDepth = ctx.callDepth;
  const frames: Frame[] = [];

  const enter = (callee: UserEntry): void => {
    if (ctx.callDepth >= ctx.recursionLimit) {
      throw new RecursionLimitError(ctx.recursionLimit, callee.name, location);
    }
    ctx.callDepth++;
    frames.push({
      entry: callee,
      pc: 0,
      depth: ctx.callDepth,
      startTime: performance.now(),
    });
    ctx.observability.onWordCall?.({
      name: callee.name,
      depth: ctx.callDepth,
    });
  };

  try {
    enter(entry);

    for (;;) {
      const frame = frames.at(-1);
      if (frame === undefined) break;

      const instruction = frame.entry.body[frame.pc];
      if (instruction === undefined) {
        frames.pop();
        ctx.callDepth--;
        ctx.observability.onWordReturn?.({
          name: frame.entry.name,
          depth: frame.depth,
          durationMs: performance.now() - frame.startTime,
        });
        continue;
      }

      switch (instruction.op) {
        case 'literal':
          pushLiteral(ctx, instruction.value, location);
          frame.pc++;
          break;

        case 'builtin':
          runBuiltin(instruction.word, ctx, location);
          frame.pc++;
          break;

        case 'call':
          frame.pc++;
          enter(instruction.entry);
          break;

        case 'recurse':
          frame.pc++;
          enter(frame.entry);
          break;

        case 'branch-if-zero': {
          const depth = ctx.stack.depth();
          if (depth === 0) {
            throw new StackUnderflowError('IF', 1, depth, location);
          }
          const flag = ctx.stack.pop();
          frame.pc = flag === 0 ? instruction.target : frame.pc + 1;
          break;
        }

        case 'branch':
          frame.pc = instruction.target;
          break;
      }
    }
  } finally {
    ctx.callDepth = baseDepth;
  }
}
