/**
 * Stackword Runtime Tests: Definition Compiler
 * Compiled bodies and branch backpatching
 */

import { describe, expect, it } from 'vitest';

import {
  formatBody,
  type RuntimeContext,
  UNRESOLVED,
  type UserEntry,
} from '../../src/index.js';

import { createTestContext, runLine } from '../helpers/runtime.js';

/** Compile `definition` and return the entry it installs */
function compile(definition: string, ctx?: RuntimeContext): UserEntry {
  const context = ctx ?? createTestContext().ctx;
  const before = new Set(context.dictionary.userWords());
  runLine(context, definition);

  const [entry] = context.dictionary
    .userWords()
    .filter((word) => !before.has(word));
  if (entry === undefined) throw new Error('nothing was defined');
  return entry;
}

describe('Stackword Runtime: Compiler', () => {
  describe('Straight-line bodies', () => {
    it('records literals and built-ins in order', () => {
      const entry = compile(': F 2 dup * ;');
      expect(entry.body).toEqual([
        { op: 'literal', value: 2 },
        { op: 'builtin', word: 'DUP' },
        { op: 'builtin', word: '*' },
      ]);
    });

    it('compiles an empty body', () => {
      expect(compile(': NOTHING ;').body).toEqual([]);
    });

    it('binds calls to the callee entry', () => {
      const { ctx } = createTestContext();
      runLine(ctx, ': A 1 ;');
      const entry = compile(': B A ;', ctx);

      expect(entry.body).toEqual([
        { op: 'call', entry: ctx.dictionary.lookup('A') },
      ]);
      expect(entry.body[0]).toMatchObject({
        entry: expect.objectContaining({ name: 'A' }),
      });
    });

    it('compiles a reference to the word being defined as recursion', () => {
      const entry = compile(': R R ;');
      expect(entry.body).toEqual([{ op: 'recurse' }]);
      expect(formatBody(entry)).toBe('R');
    });

    it('freezes the finished body', () => {
      expect(Object.isFrozen(compile(': F 1 ;').body)).toBe(true);
    });

    it('does not execute the body while compiling', () => {
      const { ctx, output } = createTestContext();
      expect(runLine(ctx, ': P 1 . ;')).toEqual([]);
      expect(output).toEqual([]);
    });
  });

  describe('Backpatching', () => {
    it('points IF past the THEN', () => {
      const entry = compile(': T IF 1 THEN ;');
      expect(entry.body).toEqual([
        { op: 'branch-if-zero', target: 2 },
        { op: 'literal', value: 1 },
      ]);
    });

    it('points IF just past the ELSE branch and ELSE past the THEN', () => {
      const entry = compile(': T IF 1 ELSE 2 THEN ;');
      expect(formatBody(entry)).toBe('?BRANCH(3) 1 BRANCH(4) 2');
    });

    it('resolves an IF inside an IF', () => {
      const entry = compile(': T IF IF 1 THEN 2 THEN ;');
      expect(formatBody(entry)).toBe('?BRANCH(4) ?BRANCH(3) 1 2');
    });

    it('resolves an IF/ELSE nested in an ELSE branch', () => {
      const entry = compile(
        ': SIGN DUP 0 = IF DROP 0 ELSE DUP 0 < IF DROP -1 ELSE DROP 1 THEN THEN ;'
      );
      expect(formatBody(entry)).toBe(
        'DUP 0 = ?BRANCH(7) DROP 0 BRANCH(16) ' +
          'DUP 0 < ?BRANCH(14) DROP -1 BRANCH(16) DROP 1'
      );
    });

    it('leaves no unresolved branch in a finished body', () => {
      const entry = compile(
        ': T IF 1 ELSE IF 2 ELSE 3 THEN THEN IF 4 THEN ;'
      );
      const targets = entry.body.flatMap((instruction) =>
        instruction.op === 'branch' || instruction.op === 'branch-if-zero'
          ? [instruction.target]
          : []
      );
      expect(targets).toHaveLength(5);
      expect(targets).not.toContain(UNRESOLVED);
    });
  });

  describe('Modes', () => {
    it('returns to execute mode after ";"', () => {
      const { ctx } = createTestContext();
      runLine(ctx, ': F 1 ;');
      expect(ctx.state).toEqual({ mode: 'execute' });
    });

    it('reports the definition to observers with its body', () => {
      const defined: string[] = [];
      const { ctx } = createTestContext({
        observability: {
          onDefine: ({ name, body, replaced }) =>
            defined.push(`${name}:${body.length}:${replaced}`),
        },
      });

      runLine(ctx, ': F 1 2 ; : F 3 ;');
      expect(defined).toEqual(['F:2:false', 'F:1:true']);
    });
  });
});
