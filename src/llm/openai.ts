import { z } from 'zod';

import type { CompletionTransport } from './client.js';
import type {
  CompletionChunk,
  CompletionRequest,
  CompletionResponse,
  Message,
  TokenUsage,
} from '../schema/index.js';
import { EMPTY_USAGE } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const usageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative(),
  completion_tokens: z.number().int().nonnegative(),
});

const toolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(toolCallSchema).nullable().optional(),
        }),
      }),
    )
    .nonempty(),
  usage: usageSchema.optional(),
});

const chatChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z.object({
        content: z.string().nullable().optional(),
        tool_calls: z
          .array(
            z.object({
              index: z.number().int().nonnegative(),
              id: z.string().optional(),
              function: z
                .object({
                  name: z.string().optional(),
                  arguments: z.string().optional(),
                })
                .optional(),
            }),
          )
          .nullable()
          .optional(),
      }),
    }),
  ),
  usage: usageSchema.nullable().optional(),
});

// ── Wire mapping ─────────────────────────────────────────────

type OpenAIMessage =
  | { role: 'system' | 'user'; content: string }
  | {
      role: 'assistant';
      content: string | null;
      tool_calls?: {
        id: string;
        type: 'function';
        function: { name: string; arguments: string };
      }[];
    }
  | { role: 'tool'; tool_call_id: string; content: string };

export function toOpenAIMessages(messages: readonly Message[]): OpenAIMessage[] {
  return messages.map((message): OpenAIMessage => {
    switch (message.role) {
      case 'system':
      case 'user':
        return { role: message.role, content: message.content };
      case 'assistant': {
        const toolCalls = message.toolCalls ?? [];
        if (toolCalls.length === 0) {
          return { role: 'assistant', content: message.content };
        }
        return {
          role: 'assistant',
          content: message.content || null,
          tool_calls: toolCalls.map((call) => ({
            id: call.id,
            type: 'function',
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      }
      case 'tool':
        return {
          role: 'tool',
          tool_call_id: message.toolCallId,
          content: message.content,
        };
    }
  });
}

function toUsage(usage: z.infer<typeof usageSchema> | null | undefined): TokenUsage {
  if (!usage) return EMPTY_USAGE;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
  };
}

function buildBody(request: CompletionRequest, stream: boolean): string {
  const hasTools = request.tools !== undefined && request.tools.length > 0;
  return JSON.stringify({
    model: request.model,
    messages: toOpenAIMessages(request.messages),
    temperature: request.temperature,
    top_p: request.topP,
    max_tokens: request.maxTokens,
    ...(hasTools ? { tools: request.tools } : {}),
    ...(stream ? { stream: true, stream_options: { include_usage: true } } : {}),
  });
}

// ── Rate-limit-aware fetch ───────────────────────────────────

async function fetchWithRetry(
  url: string,
  init: RequestInit,
): Promise<Response> {
  for (let attempt = 0; attempt < LIMITS.MAX_RETRIES; attempt++) {
    const response = await fetch(url, init);

    if (response.status === 429) {
      const retryAfter = response.headers.get('retry-after');
      const waitMs = retryAfter
        ? parseFloat(retryAfter) * 1000
        : (attempt + 1) * 5000;
      log.warn(`Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
      continue;
    }

    if (!response.ok) {
      const body = await response.text();
      throw new Error(
        `OpenAI API error (${String(response.status)}): ${body}`,
      );
    }

    return response;
  }

  throw new Error('OpenAI API: max retries exceeded due to rate limiting');
}

// ── Server-sent events ───────────────────────────────────────

/** Yields the `data:` payloads of an SSE body until `[DONE]`. */
export async function* readEventData(
  body: NonNullable<Response['body']>,
): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    for (;;) {
      const { done, value } = await reader.read();
      buffer += done ? decoder.decode() : decoder.decode(value, { stream: true });

      const lines = buffer.split('\n');
      buffer = done ? '' : (lines.pop() ?? '');

      for (const line of lines) {
        const trimmed = line.trim();
        if (!trimmed.startsWith('data:')) continue;
        const data = trimmed.slice('data:'.length).trim();
        if (data === '[DONE]') return;
        if (data) yield data;
      }

      if (done) return;
    }
  } finally {
    reader.releaseLock();
  }
}

// ── Provider factory ─────────────────────────────────────────

export function createOpenAITransport(apiKey: string): CompletionTransport {
  const headers = {
    'Content-Type': 'application/json',
    Authorization: `Bearer ${apiKey}`,
  };

  return {
    async complete(request: CompletionRequest): Promise<CompletionResponse> {
      const response = await fetchWithRetry(COMPLETIONS_URL, {
        method: 'POST',
        headers,
        body: buildBody(request, false),
      });

      const raw = await response.text();
      const body: unknown = JSON.parse(raw);
      const parsed = chatResponseSchema.parse(body);
      const message = parsed.choices[0].message;

      return {
        content: message.content ?? null,
        toolCalls: (message.tool_calls ?? []).map((call) => ({
          id: call.id,
          name: call.function.name,
          arguments: call.function.arguments,
        })),
        usage: toUsage(parsed.usage),
      };
    },

    async *stream(request: CompletionRequest): AsyncGenerator<CompletionChunk> {
      const response = await fetchWithRetry(COMPLETIONS_URL, {
        method: 'POST',
        headers,
        body: buildBody(request, true),
      });

      if (!response.body) {
        throw new Error('OpenAI API returned an empty stream');
      }

      for await (const data of readEventData(response.body)) {
        const parsed = chatChunkSchema.parse(JSON.parse(data));
        const delta = parsed.choices[0]?.delta;

        yield {
          contentDelta: delta?.content ?? undefined,
          toolCallDeltas: delta?.tool_calls?.map((call) => ({
            index: call.index,
            id: call.id,
            name: call.function?.name,
            argumentsDelta: call.function?.arguments,
          })),
          usage: parsed.usage ? toUsage(parsed.usage) : undefined,
        };
      }
    },
  };
}
