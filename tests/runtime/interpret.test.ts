/**
 * Stackword Runtime Tests: Line Interpretation
 */

import { describe, expect, it } from 'vitest';

import { interpretLine } from '../../src/index.js';

import { createTestContext } from '../helpers/runtime.js';

describe('Stackword Runtime: interpretLine', () => {
  it('returns the stack after a successful line', () => {
    const { ctx } = createTestContext();
    expect(interpretLine('1 2 +', ctx)).toEqual({
      status: 'ok',
      stack: [3],
      defined: [],
      truncated: false,
    });
  });

  it('lists the words a line defined', () => {
    const { ctx } = createTestContext();
    const outcome = interpretLine(': SQ DUP * ; : CUBE DUP SQ * ;', ctx);
    expect(outcome).toMatchObject({ status: 'ok', defined: ['SQ', 'CUBE'] });
  });

  it('reports engine failures as an outcome', () => {
    const { ctx } = createTestContext();
    const outcome = interpretLine('DROP', ctx);

    expect(outcome.status).toBe('error');
    if (outcome.status === 'error') {
      expect(outcome.error.errorId).toBe('SW-R001');
      expect(outcome.truncated).toBe(false);
    }
  });

  it('records the line number in error locations', () => {
    const { ctx } = createTestContext();
    const outcome = interpretLine('1 FOO', ctx, { line: 3 });

    expect(outcome.status).toBe('error');
    if (outcome.status === 'error') {
      expect(outcome.error.message).toBe('Unknown word: FOO at 3:3');
    }
  });

  it('drops tokens past the limit and says so', () => {
    const { ctx } = createTestContext();
    expect(interpretLine('1 2 3 4', ctx, { maxTokens: 2 })).toEqual({
      status: 'ok',
      stack: [1, 2],
      defined: [],
      truncated: true,
    });
  });

  it('carries state from line to line', () => {
    const { ctx, output } = createTestContext();
    interpretLine(': SQ DUP * ;', ctx);
    interpretLine('7', ctx);
    interpretLine('SQ .', ctx);
    expect(output).toEqual([49]);
  });

  it('lets errors from host callbacks propagate', () => {
    const { ctx } = createTestContext();
    const failing = {
      ...ctx,
      callbacks: {
        onOutput: () => {
          throw new Error('sink closed');
        },
      },
    };

    expect(() => interpretLine('1 .', failing)).toThrow('sink closed');
    expect(failing.state).toEqual({ mode: 'execute' });
  });
});
