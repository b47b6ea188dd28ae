/**
 * Stackword CLI Tests: shared formatting
 */

import { describe, expect, it } from 'vitest';

import {
  createTraceCallbacks,
  formatError,
  formatOutput,
  formatStack,
  readVersion,
} from '../../src/cli-shared.js';
import { createError, StackUnderflowError } from '../../src/index.js';

describe('cli-shared', () => {
  describe('formatOutput', () => {
    it('separates values with spaces', () => {
      expect(formatOutput([3, -1, 0])).toBe('3 -1 0');
      expect(formatOutput([])).toBe('');
    });
  });

  describe('formatStack', () => {
    it('shows the depth then the values bottom first', () => {
      expect(formatStack([1, 2])).toBe('<2> 1 2');
      expect(formatStack([])).toBe('<0>');
    });
  });

  describe('formatError', () => {
    it('prefixes engine errors with their id', () => {
      const err = new StackUnderflowError('DROP', 1, 0, {
        line: 1,
        column: 5,
        offset: 4,
      });
      expect(formatError(err)).toBe(
        'Error SW-R001: Stack underflow: DROP needs 1, stack has 0 at 1:5'
      );
    });

    it('reports missing files', () => {
      const err = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: 'missing.sw',
      });
      expect(formatError(err)).toBe('File not found: missing.sw');
    });

    it('falls back to the message', () => {
      expect(formatError(new Error('Unknown option: -x'))).toBe(
        'Unknown option: -x'
      );
    });
  });

  describe('createTraceCallbacks', () => {
    it('writes one line per event', () => {
      const lines: string[] = [];
      const trace = createTraceCallbacks((line) => lines.push(line));

      trace.onWordCall?.({ name: 'SQ', depth: 1 });
      trace.onWordReturn?.({ name: 'SQ', depth: 1, durationMs: 0.5 });
      trace.onDefine?.({
        name: 'SQ',
        body: [
          { op: 'builtin', word: 'DUP' },
          { op: 'builtin', word: '*' },
        ],
        replaced: false,
      });
      trace.onDefine?.({ name: 'SQ', body: [], replaced: true });
      trace.onError?.({
        error: createError('SW-R003', { name: 'FOO' }, {
          line: 1,
          column: 1,
          offset: 0,
        }),
      });

      expect(lines).toEqual([
        '[trace] call SQ (depth 1)',
        '[trace] return SQ (depth 1, 0.500ms)',
        '[trace] define SQ: DUP *',
        '[trace] redefine SQ: ',
        '[trace] error Error SW-R003: Unknown word: FOO at 1:1',
      ]);
    });
  });

  describe('readVersion', () => {
    it('reads the package version', () => {
      expect(readVersion()).toBe('0.1.0');
    });
  });
});
