import { afterEach, describe, expect, it, vi } from 'vitest';

import { createOpenAITransport, readEventData, toOpenAIMessages } from '../../src/llm/openai.js';
import type { CompletionChunk, CompletionRequest } from '../../src/schema/index.js';

const request: CompletionRequest = {
  model: 'gpt-4o-mini',
  messages: [
    { role: 'system', content: 'Be brief.' },
    { role: 'user', content: 'Hi' },
  ],
  temperature: 0,
  topP: 1,
  maxTokens: 256,
};

function stubFetch(...responses: Response[]) {
  const fetchMock = vi.fn<typeof fetch>(async () => {
    const next = responses.shift();
    if (!next) throw new Error('unexpected fetch');
    return next;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>, index = 0): unknown {
  return JSON.parse(String(fetchMock.mock.calls[index]?.[1]?.body));
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('toOpenAIMessages', () => {
  it('maps tool calls and tool results to the wire shape', () => {
    expect(
      toOpenAIMessages([
        {
          role: 'assistant',
          content: '',
          toolCalls: [{ id: 'call_1', name: 'add', arguments: '{"a":1}' }],
        },
        { role: 'tool', toolCallId: 'call_1', name: 'add', content: '2' },
      ]),
    ).toEqual([
      {
        role: 'assistant',
        content: null,
        tool_calls: [
          { id: 'call_1', type: 'function', function: { name: 'add', arguments: '{"a":1}' } },
        ],
      },
      { role: 'tool', tool_call_id: 'call_1', content: '2' },
    ]);
  });
});

describe('createOpenAITransport', () => {
  it('posts the request and maps the response', async () => {
    const fetchMock = stubFetch(
      new Response(
        JSON.stringify({
          choices: [
            {
              message: {
                content: null,
                tool_calls: [
                  { id: 'call_1', type: 'function', function: { name: 'add', arguments: '{}' } },
                ],
              },
            },
          ],
          usage: { prompt_tokens: 12, completion_tokens: 3 },
        }),
        { status: 200 },
      ),
    );

    const response = await createOpenAITransport('test-secret').complete(request);

    expect(response).toEqual({
      content: null,
      toolCalls: [{ id: 'call_1', name: 'add', arguments: '{}' }],
      usage: { promptTokens: 12, completionTokens: 3 },
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/chat/completions');
    expect(sentBody(fetchMock)).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hi' },
      ],
      temperature: 0,
      top_p: 1,
      max_tokens: 256,
    });
  });

  it('retries after a rate limit', async () => {
    const fetchMock = stubFetch(
      new Response('slow down', { status: 429, headers: { 'retry-after': '0' } }),
      new Response(JSON.stringify({ choices: [{ message: { content: 'Hello' } }] }), {
        status: 200,
      }),
    );

    const response = await createOpenAITransport('test-secret').complete(request);

    expect(response.content).toBe('Hello');
    expect(response.usage).toEqual({ promptTokens: 0, completionTokens: 0 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('surfaces API errors with their status', async () => {
    stubFetch(new Response('boom', { status: 500 }));
    await expect(createOpenAITransport('test-secret').complete(request)).rejects.toThrow(
      'OpenAI API error (500): boom',
    );
  });

  it('streams content and usage chunks', async () => {
    const fetchMock = stubFetch(
      new Response(
        [
          'data: {"choices":[{"delta":{"content":"Hel"}}]}',
          'data: {"choices":[{"delta":{"content":"lo"}}]}',
          'data: {"choices":[],"usage":{"prompt_tokens":3,"completion_tokens":2}}',
          'data: [DONE]',
          '',
        ].join('\n\n'),
        { status: 200 },
      ),
    );

    const chunks: CompletionChunk[] = [];
    for await (const chunk of createOpenAITransport('test-secret').stream(request)) {
      chunks.push(chunk);
    }

    expect(chunks).toEqual([
      { contentDelta: 'Hel' },
      { contentDelta: 'lo' },
      { usage: { promptTokens: 3, completionTokens: 2 } },
    ]);
    expect(sentBody(fetchMock)).toMatchObject({
      stream: true,
      stream_options: { include_usage: true },
    });
  });
});

describe('readEventData', () => {
  it('reassembles events split across reads', async () => {
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('data: {"a"'));
        controller.enqueue(encoder.encode(':1}\n\nevent: ping\n\ndata: {"b":2}\n'));
        controller.enqueue(encoder.encode('\ndata: [DONE]\n\ndata: {"c":3}\n\n'));
        controller.close();
      },
    });

    const events: string[] = [];
    for await (const data of readEventData(body)) events.push(data);

    expect(events).toEqual(['{"a":1}', '{"b":2}']);
  });
});
