import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { createChatEngine } from '../../src/chat/engine.js';
import { defineTool } from '../../src/chat/tools.js';
import { createMockTransport } from '../../src/llm/mock.js';
import {
  ConfigurationError,
  ToolArgumentsError,
  UnknownToolError,
} from '../../src/utils/errors.js';

const addTool = defineTool({
  name: 'add',
  description: 'Adds two numbers',
  parameters: z.object({ a: z.number(), b: z.number() }),
  handler: ({ a, b }) => String(a + b),
});

const echoTool = defineTool({
  name: 'echo',
  description: 'Echoes its arguments as JSON',
  parameters: z.object({}).passthrough(),
  handler: (args) => JSON.stringify(args),
});

const addCall = { id: 'call_1', name: 'add', arguments: '{"a":2,"b":3}' };
const addRendered = '\n\n[tool] add({"a":2,"b":3})\n5\n\n';

describe('ChatEngine.call', () => {
  it('sends the system prompt ahead of history and records the turn', async () => {
    const transport = createMockTransport(['Hello']);
    const engine = createChatEngine({ transport, model: 'mock', systemPrompt: 'Be brief.' });

    expect(await engine.call('Hi')).toBe('Hello');

    const request = transport.requests[0];
    expect(request?.messages).toEqual([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Hi' },
    ]);
    expect(request?.temperature).toBe(0);
    expect(request?.topP).toBe(1);
    expect(request?.maxTokens).toBe(4096);
    expect(request !== undefined && 'tools' in request).toBe(false);
    expect(engine.history).toEqual([
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello' },
    ]);
  });

  it('carries history into the next turn', async () => {
    const transport = createMockTransport(['One', 'Two']);
    const engine = createChatEngine({ transport, model: 'mock' });

    await engine.call('first');
    await engine.call('second');

    expect(transport.requests[1]?.messages).toEqual([
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'One' },
      { role: 'user', content: 'second' },
    ]);
  });

  it('resolves tool calls and follows up with the results', async () => {
    const transport = createMockTransport([
      { content: 'Let me add.', toolCalls: [addCall] },
      'The sum is 5.',
    ]);
    const engine = createChatEngine({ transport, model: 'mock', tools: [addTool] });

    const text = await engine.call('What is 2+3?');

    expect(text).toBe(`Let me add.${addRendered}The sum is 5.`);
    expect(engine.history).toEqual([
      { role: 'user', content: 'What is 2+3?' },
      { role: 'assistant', content: 'Let me add.', toolCalls: [addCall] },
      { role: 'tool', toolCallId: 'call_1', name: 'add', content: '5' },
      { role: 'assistant', content: 'The sum is 5.' },
    ]);
    expect(transport.requests[1]?.tools?.map((tool) => tool.function.name)).toEqual(['add']);
  });

  it('runs tools without a follow-up request when maxToolCalls is 0', async () => {
    const transport = createMockTransport([{ content: 'Let me add.', toolCalls: [addCall] }]);
    const engine = createChatEngine({
      transport,
      model: 'mock',
      tools: [addTool],
      maxToolCalls: 0,
    });

    expect(await engine.call('What is 2+3?')).toBe(`Let me add.${addRendered}`);
    expect(transport.requests).toHaveLength(1);
    expect(engine.history).toHaveLength(3);
  });

  it('stops following up once maxToolCalls is reached', async () => {
    const transport = createMockTransport([
      { toolCalls: [addCall] },
      { toolCalls: [addCall] },
      { toolCalls: [addCall] },
    ]);
    const engine = createChatEngine({
      transport,
      model: 'mock',
      tools: [addTool],
      maxToolCalls: 1,
    });

    await engine.call('Keep adding');
    expect(transport.requests).toHaveLength(2);
  });

  it('prepends a prefill to the response', async () => {
    const transport = createMockTransport(['"a":1}']);
    const engine = createChatEngine({ transport, model: 'mock' });

    expect(await engine.call('Write JSON', { prefill: '{' })).toBe('{"a":1}');
    expect(transport.requests[0]?.messages.at(-1)).toEqual({ role: 'assistant', content: '{' });
    expect(engine.history.at(-1)).toEqual({ role: 'assistant', content: '{"a":1}' });
  });

  it('rejects a prefill on models without prefill support', async () => {
    const engine = createChatEngine({ transport: createMockTransport(), model: 'gpt-4o' });
    await expect(engine.call('Hi', { prefill: '{' })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('leaves history untouched when the transport fails', async () => {
    const engine = createChatEngine({
      transport: createMockTransport([new Error('network down')]),
      model: 'mock',
    });

    await expect(engine.call('Hi')).rejects.toThrow('network down');
    expect(engine.history).toEqual([]);
  });

  it('raises on a tool the engine never registered', async () => {
    const engine = createChatEngine({
      transport: createMockTransport([
        { toolCalls: [{ id: 'call_1', name: 'nope', arguments: '{}' }] },
      ]),
      model: 'mock',
    });

    await expect(engine.call('Hi')).rejects.toBeInstanceOf(UnknownToolError);
  });

  it('validates tool arguments against the tool schema', async () => {
    const engine = createChatEngine({
      transport: createMockTransport([
        { toolCalls: [{ id: 'call_1', name: 'add', arguments: '{"a":"two","b":3}' }] },
      ]),
      model: 'mock',
      tools: [addTool],
    });

    await expect(engine.call('Hi')).rejects.toBeInstanceOf(ToolArgumentsError);
  });

  it('offers tagged blocks from history to tools, with explicit arguments winning', async () => {
    const transport = createMockTransport([
      { toolCalls: [{ id: 'call_1', name: 'echo', arguments: '{"style":"short"}' }] },
      'done',
    ]);
    const engine = createChatEngine({
      transport,
      model: 'mock',
      tools: [echoTool],
      provideXmlBlocksToTools: true,
    });

    await engine.call('<doc>text</doc> <style>long</style>');

    expect(engine.history[2]).toEqual({
      role: 'tool',
      toolCallId: 'call_1',
      name: 'echo',
      content: '{"doc":"text","style":"short"}',
    });
  });

  it('tallies token usage across requests', async () => {
    const engine = createChatEngine({
      transport: createMockTransport([
        { content: 'a', usage: { promptTokens: 10, completionTokens: 5 } },
        { content: 'b', usage: { promptTokens: 20, completionTokens: 7 } },
      ]),
      model: 'mock',
    });

    await engine.call('one');
    await engine.call('two');

    expect(engine.tokens.usage).toEqual({ inputTokens: 30, outputTokens: 12 });
    expect(engine.tokens.last).toEqual({ inputTokens: 20, outputTokens: 7 });
  });
});

describe('ChatEngine history', () => {
  it('restores a saved transcript and clears it', () => {
    const engine = createChatEngine({ transport: createMockTransport(), model: 'mock' });
    const transcript = [
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello' },
    ];

    engine.restoreHistory(transcript);
    expect(engine.history).toEqual(transcript);

    engine.clearHistory();
    expect(engine.history).toEqual([]);
  });

  it('rejects a malformed transcript', () => {
    const engine = createChatEngine({ transport: createMockTransport(), model: 'mock' });
    expect(() => engine.restoreHistory([{ role: 'robot', content: 'beep' }])).toThrow();
  });
});

describe('createChatEngine', () => {
  it('refuses tools on a model without function calling', () => {
    expect(() =>
      createChatEngine({
        transport: createMockTransport(),
        model: 'gpt-3.5-turbo-instruct',
        tools: [addTool],
      }),
    ).toThrow(ConfigurationError);
  });

  it('lets an explicit capability override the table', () => {
    const engine = createChatEngine({
      transport: createMockTransport(),
      model: 'in-house-model',
      tools: [addTool],
      capabilities: { functionCalling: true, assistantPrefill: false },
    });
    expect(engine.toolSchemas).toHaveLength(1);
  });

  it('refuses duplicate tool names', () => {
    expect(() =>
      createChatEngine({
        transport: createMockTransport(),
        model: 'mock',
        tools: [addTool, addTool],
      }),
    ).toThrow(ConfigurationError);
  });

  it('validates sampling settings', () => {
    expect(() =>
      createChatEngine({ transport: createMockTransport(), model: 'mock', topP: 0 }),
    ).toThrow();
  });
});
