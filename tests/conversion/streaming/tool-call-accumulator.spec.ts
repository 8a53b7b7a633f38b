import { describe, expect, it } from '@jest/globals';

import { ToolCallAccumulatorSet } from '../../../src/conversion/streaming/tool-call-accumulator.js';

describe('ToolCallAccumulatorSet', () => {
  it('tracks interleaved calls by their own index', () => {
    const calls = new ToolCallAccumulatorSet();
    expect(
      calls.mergeAll([
        { index: 0, id: 'call_a', function: { name: 'first', arguments: '{"x":' } },
        { index: 1, id: 'call_b', function: { name: 'second', arguments: '{"y":2}' } }
      ])
    ).toEqual([{ id: 'call_b', name: 'second', input: { y: 2 } }]);
    expect(calls.size).toBe(1);
    expect(calls.mergeAll([{ index: 0, function: { arguments: '1}' } }])).toEqual([{ id: 'call_a', name: 'first', input: { x: 1 } }]);
    expect(calls.size).toBe(0);
  });

  it('waits for id and name even when the arguments already parse', () => {
    const calls = new ToolCallAccumulatorSet();
    expect(calls.merge({ index: 0, function: { arguments: '{}' } })).toBeUndefined();
    expect(calls.merge({ index: 0, id: 'call_c', function: { name: 'late' } })).toEqual({ id: 'call_c', name: 'late', input: {} });
  });
});
