/**
 * Definition Compiler
 *
 * Turns the tokens between ":" and ";" into a word body. Forward branches
 * are emitted as placeholders and backpatched once their target is known:
 * IF pushes its site, ELSE resolves it past a new unconditional branch and
 * pushes that branch, THEN resolves the most recent site to the end of the
 * body.
 */

import {
  CompileError,
  type ControlWord,
  RuntimeError,
  type SourceLocation,
  type Token,
} from '../../types.js';
import {
  type Instruction,
  type PendingDefinition,
  type RuntimeContext,
  type UserEntry,
  UNRESOLVED,
} from './types.js';

/**
 * Enter compile mode for the word named by `nameToken`.
 * Only called in execute mode; a ":" met while compiling is rejected by
 * compileToken.
 */
export function startDefinition(
  ctx: RuntimeContext,
  colon: Token,
  nameToken: Token | undefined
): void {
  if (nameToken === undefined) {
    throw new CompileError(
      'SW-C001',
      { found: 'end of line' },
      colon.span.start
    );
  }
  if (nameToken.kind === 'builtin' || nameToken.kind === 'control') {
    throw new CompileError(
      'SW-C002',
      { name: nameToken.word },
      nameToken.span.start
    );
  }
  if (nameToken.kind !== 'word') {
    throw new CompileError(
      'SW-C001',
      { found: `"${nameToken.text}"` },
      nameToken.span.start
    );
  }

  ctx.state = {
    mode: 'compile',
    definition: {
      name: nameToken.name,
      location: colon.span.start,
      body: [],
      patches: [],
    },
  };
}

/**
 * Append one token to the pending definition.
 *
 * @returns the installed entry when the token was ";"
 */
export function compileToken(
  ctx: RuntimeContext,
  definition: PendingDefinition,
  token: Token
): UserEntry | undefined {
  const { body } = definition;
  const location = token.span.start;

  switch (token.kind) {
    case 'integer':
      body.push({ op: 'literal', value: token.value });
      return undefined;

    case 'builtin':
      body.push({ op: 'builtin', word: token.word });
      return undefined;

    case 'word':
      body.push(resolveWord(ctx, definition, token.name, location));
      return undefined;

    case 'control':
      compileControl(definition, token.word, location);
      return undefined;

    case 'define-start':
      throw new CompileError(
        'SW-C003',
        { name: definition.name },
        location
      );

    case 'define-end':
      return finishDefinition(ctx, definition, location);
  }
}

function resolveWord(
  ctx: RuntimeContext,
  definition: PendingDefinition,
  name: string,
  location: SourceLocation
): Instruction {
  if (name === definition.name) {
    return { op: 'recurse' };
  }

  const entry = ctx.dictionary.lookup(name);
  if (entry === undefined) {
    throw new RuntimeError('SW-R003', { name }, location);
  }
  if (entry.kind === 'builtin') {
    return { op: 'builtin', word: entry.name };
  }
  return { op: 'call', entry };
}

function compileControl(
  definition: PendingDefinition,
  word: ControlWord,
  location: SourceLocation
): void {
  const { body, patches } = definition;

  switch (word) {
    case 'IF':
      patches.push({ index: body.length, openedBy: 'IF' });
      body.push({ op: 'branch-if-zero', target: UNRESOLVED });
      return;

    case 'ELSE': {
      const site = patches.pop();
      if (site === undefined || site.openedBy !== 'IF') {
        throw new CompileError(
          'SW-C006',
          { word, name: definition.name },
          location
        );
      }
      const elseIndex = body.length;
      body.push({ op: 'branch', target: UNRESOLVED });
      patch(body, site.index, elseIndex + 1);
      patches.push({ index: elseIndex, openedBy: 'ELSE' });
      return;
    }

    case 'THEN': {
      const site = patches.pop();
      if (site === undefined) {
        throw new CompileError(
          'SW-C006',
          { word, name: definition.name },
          location
        );
      }
      patch(body, site.index, body.length);
      return;
    }
  }
}

/** Point the branch placeholder at `index` to `target` */
function patch(body: Instruction[], index: number, target: number): void {
  const placeholder = body[index];
  if (placeholder?.op === 'branch-if-zero') {
    body[index] = { op: 'branch-if-zero', target };
  } else if (placeholder?.op === 'branch') {
    body[index] = { op: 'branch', target };
  } else {
    throw new Error(`No branch placeholder at ${index}`);
  }
}

function finishDefinition(
  ctx: RuntimeContext,
  definition: PendingDefinition,
  location: SourceLocation
): UserEntry {
  const open = definition.patches.length;
  if (open > 0) {
    throw new CompileError(
      'SW-C007',
      { count: open, name: definition.name },
      location
    );
  }

  const entry: UserEntry = {
    kind: 'user',
    name: definition.name,
    body: Object.freeze([...definition.body]),
  };
  const replaced = ctx.dictionary.define(entry);
  ctx.state = { mode: 'execute' };

  ctx.observability.onDefine?.({
    name: entry.name,
    body: entry.body,
    replaced,
  });
  return entry;
}
