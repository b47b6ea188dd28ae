/**
 * Stackword Runtime Tests: Observability
 * Word call, definition and error events
 */

import { describe, expect, it } from 'vitest';

import {
  createEventCollector,
  createTestContext,
  expectFailure,
  runLine,
} from '../helpers/runtime.js';

describe('Stackword Runtime: Observability', () => {
  it('reports nested calls and returns in order', () => {
    const { events, callbacks } = createEventCollector();
    const { ctx, output } = createTestContext({ observability: callbacks });
    runLine(ctx, ': SQ DUP * ;');
    runLine(ctx, ': QUAD SQ SQ ;');
    runLine(ctx, '2 QUAD .');

    expect(output).toEqual([16]);
    expect(events.wordCall).toEqual([
      { name: 'QUAD', depth: 1 },
      { name: 'SQ', depth: 2 },
      { name: 'SQ', depth: 2 },
    ]);
    expect(events.wordReturn.map((e) => [e.name, e.depth])).toEqual([
      ['SQ', 2],
      ['SQ', 2],
      ['QUAD', 1],
    ]);
    for (const event of events.wordReturn) {
      expect(event.durationMs).toBeGreaterThanOrEqual(0);
    }
  });

  it('does not report a return for a word that failed', () => {
    const { events, callbacks } = createEventCollector();
    const { ctx } = createTestContext({ observability: callbacks });
    runLine(ctx, ': BAD DROP ;');
    expectFailure(ctx, 'BAD');

    expect(events.wordCall).toEqual([{ name: 'BAD', depth: 1 }]);
    expect(events.wordReturn).toEqual([]);
  });

  it('reports definitions and replacements', () => {
    const { events, callbacks } = createEventCollector();
    const { ctx } = createTestContext({ observability: callbacks });
    runLine(ctx, ': F 1 ;');
    runLine(ctx, ': F 2 3 ;');

    expect(events.define).toEqual([
      { name: 'F', body: [{ op: 'literal', value: 1 }], replaced: false },
      {
        name: 'F',
        body: [
          { op: 'literal', value: 2 },
          { op: 'literal', value: 3 },
        ],
        replaced: true,
      },
    ]);
  });

  it('reports runtime errors with the failing token', () => {
    const { events, callbacks } = createEventCollector();
    const { ctx } = createTestContext({ observability: callbacks });
    const err = expectFailure(ctx, '1 FOO');

    expect(events.error).toHaveLength(1);
    expect(events.error[0]?.error).toBe(err);
    expect(events.error[0]?.token?.text).toBe('FOO');
  });

  it('reports compile errors with the failing token', () => {
    const { events, callbacks } = createEventCollector();
    const { ctx } = createTestContext({ observability: callbacks });
    expectFailure(ctx, ': T THEN ;');

    expect(events.error[0]?.error).toMatchObject({ errorId: 'SW-C006' });
    expect(events.error[0]?.token?.text).toBe('THEN');
    expect(events.define).toEqual([]);
  });
});
