/**
 * Stackword Runtime Tests: Value Stack
 */

import { describe, expect, it } from 'vitest';

import {
  StackOverflowError,
  StackUnderflowError,
  ValueStack,
} from '../../src/index.js';

describe('Stackword Runtime: Value Stack', () => {
  it('tracks depth for pushes within capacity', () => {
    const stack = new ValueStack(4);
    for (let i = 1; i <= 4; i++) {
      stack.push(i * 10);
      expect(stack.depth()).toBe(i);
    }
  });

  it('rejects a push at capacity and keeps its depth', () => {
    const stack = new ValueStack(2);
    stack.push(1);
    stack.push(2);

    expect(() => stack.push(3)).toThrow(StackOverflowError);
    expect(stack.depth()).toBe(2);
    expect(stack.toArray()).toEqual([1, 2]);
  });

  it('reports overflow with the StackOverflow kind', () => {
    const stack = new ValueStack(1);
    stack.push(1);
    try {
      stack.push(2);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(StackOverflowError);
      if (err instanceof StackOverflowError) {
        expect(err.kind).toBe('StackOverflow');
        expect(err.capacity).toBe(1);
        expect(err.message).toBe('Stack overflow: capacity of 1 reached');
      }
    }
  });

  it('fails pop and peek on an empty stack', () => {
    const stack = new ValueStack();
    expect(() => stack.pop()).toThrow(StackUnderflowError);
    expect(() => stack.peek()).toThrow(StackUnderflowError);
    expect(stack.depth()).toBe(0);
  });

  it('pops the last pushed value and restores depth', () => {
    const stack = new ValueStack();
    stack.push(7);
    const before = stack.depth();

    stack.push(-42);
    expect(stack.pop()).toBe(-42);
    expect(stack.depth()).toBe(before);
    expect(stack.pop()).toBe(7);
  });

  it('peeks without removing', () => {
    const stack = new ValueStack();
    stack.push(5);
    expect(stack.peek()).toBe(5);
    expect(stack.depth()).toBe(1);
  });

  it('clears every value', () => {
    const stack = new ValueStack();
    stack.push(1);
    stack.push(2);
    stack.clear();
    expect(stack.depth()).toBe(0);
    expect(stack.room()).toBe(256);
  });

  it('returns a copy from toArray, bottom first', () => {
    const stack = new ValueStack();
    stack.push(1);
    stack.push(2);
    const snapshot = stack.toArray();
    snapshot.push(3);

    expect(snapshot).toEqual([1, 2, 3]);
    expect(stack.toArray()).toEqual([1, 2]);
  });

  it('defaults to 256 cells', () => {
    expect(new ValueStack().capacity).toBe(256);
  });

  it('rejects a capacity below one', () => {
    expect(() => new ValueStack(0)).toThrow(RangeError);
    expect(() => new ValueStack(2.5)).toThrow(
      'Stack capacity must be a positive integer, got 2.5'
    );
  });
});
