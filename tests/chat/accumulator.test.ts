import { describe, expect, it } from 'vitest';

import { StreamAccumulator } from '../../src/chat/accumulator.js';

describe('StreamAccumulator', () => {
  it('joins content deltas and keeps the last usage', () => {
    const accumulator = new StreamAccumulator();
    accumulator.add({ contentDelta: 'Hel' });
    accumulator.add({ contentDelta: 'lo', usage: { promptTokens: 1, completionTokens: 1 } });
    accumulator.add({ usage: { promptTokens: 4, completionTokens: 2 } });

    expect(accumulator.toResponse()).toEqual({
      content: 'Hello',
      toolCalls: [],
      usage: { promptTokens: 4, completionTokens: 2 },
    });
  });

  it('assembles tool calls by index from partial deltas', () => {
    const accumulator = new StreamAccumulator();
    accumulator.add({ toolCallDeltas: [{ index: 1, id: 'b', name: 'second' }] });
    accumulator.add({ toolCallDeltas: [{ index: 0, name: 'fir' }] });
    accumulator.add({ toolCallDeltas: [{ index: 0, name: 'st', argumentsDelta: '{"x"' }] });
    accumulator.add({ toolCallDeltas: [{ index: 0, argumentsDelta: ':1}' }] });

    expect(accumulator.toResponse()).toEqual({
      content: null,
      toolCalls: [
        { id: 'call_0', name: 'first', arguments: '{"x":1}' },
        { id: 'b', name: 'second', arguments: '' },
      ],
      usage: { promptTokens: 0, completionTokens: 0 },
    });
  });
});
