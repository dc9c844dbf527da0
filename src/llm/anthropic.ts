import Anthropic from '@anthropic-ai/sdk';

import type { CompletionTransport } from './client.js';
import type {
  CompletionChunk,
  CompletionRequest,
  CompletionResponse,
  Message,
  ToolCall,
  ToolSchema,
} from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Rate-limit-aware wrapper ────────────────────────────────

function isRateLimitError(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  if (err instanceof Error && err.message.includes('429')) return true;
  return false;
}

async function withRetry<T>(fn: () => Promise<T>): Promise<T> {
  for (let attempt = 0; attempt < LIMITS.MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimitError(err) || attempt === LIMITS.MAX_RETRIES - 1) throw err;

      const waitMs = (attempt + 1) * 5000;
      log.warn(`Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
    }
  }

  throw new Error('Anthropic API: max retries exceeded due to rate limiting');
}

// ── Wire mapping ─────────────────────────────────────────────
// System messages move to the top-level `system` parameter; tool results
// become `tool_result` blocks on a user turn, merged when consecutive.

export interface AnthropicPayload {
  system: string;
  messages: Anthropic.Messages.MessageParam[];
}

function parseToolInput(call: ToolCall): unknown {
  try {
    return JSON.parse(call.arguments || '{}');
  } catch {
    return {};
  }
}

export function toAnthropicPayload(messages: readonly Message[]): AnthropicPayload {
  const system: string[] = [];
  const out: Anthropic.Messages.MessageParam[] = [];

  for (const message of messages) {
    switch (message.role) {
      case 'system':
        system.push(message.content);
        break;
      case 'user':
        out.push({ role: 'user', content: message.content });
        break;
      case 'assistant': {
        const blocks: Anthropic.Messages.ContentBlockParam[] = [];
        if (message.content) {
          blocks.push({ type: 'text', text: message.content });
        }
        for (const call of message.toolCalls ?? []) {
          blocks.push({
            type: 'tool_use',
            id: call.id,
            name: call.name,
            input: parseToolInput(call),
          });
        }
        // The Messages API rejects empty assistant content.
        if (blocks.length > 0) out.push({ role: 'assistant', content: blocks });
        break;
      }
      case 'tool': {
        const result: Anthropic.Messages.ToolResultBlockParam = {
          type: 'tool_result',
          tool_use_id: message.toolCallId,
          content: message.content,
        };
        const previous = out.at(-1);
        if (
          previous?.role === 'user' &&
          Array.isArray(previous.content) &&
          previous.content.every((block) => block.type === 'tool_result')
        ) {
          previous.content.push(result);
        } else {
          out.push({ role: 'user', content: [result] });
        }
        break;
      }
    }
  }

  return { system: system.join('\n\n'), messages: out };
}

export function toAnthropicTools(tools: readonly ToolSchema[]): Anthropic.Messages.Tool[] {
  return tools.map((tool) => ({
    name: tool.function.name,
    description: tool.function.description,
    input_schema: { ...tool.function.parameters, type: 'object' },
  }));
}

function buildParams(request: CompletionRequest): Anthropic.Messages.MessageCreateParamsNonStreaming {
  const { system, messages } = toAnthropicPayload(request.messages);
  const hasTools = request.tools !== undefined && request.tools.length > 0;

  return {
    model: request.model,
    max_tokens: request.maxTokens,
    messages,
    temperature: request.temperature,
    top_p: request.topP,
    ...(system ? { system } : {}),
    ...(hasTools && request.tools ? { tools: toAnthropicTools(request.tools) } : {}),
  };
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicTransport(apiKey: string): CompletionTransport {
  const client = new Anthropic({ apiKey });

  return {
    async complete(request: CompletionRequest): Promise<CompletionResponse> {
      const response = await withRetry(() =>
        client.messages.create(buildParams(request)),
      );

      const text: string[] = [];
      const toolCalls: ToolCall[] = [];
      for (const block of response.content) {
        if (block.type === 'text') {
          text.push(block.text);
        } else if (block.type === 'tool_use') {
          toolCalls.push({
            id: block.id,
            name: block.name,
            arguments: JSON.stringify(block.input),
          });
        }
      }

      return {
        content: text.length > 0 ? text.join('') : null,
        toolCalls,
        usage: {
          promptTokens: response.usage.input_tokens,
          completionTokens: response.usage.output_tokens,
        },
      };
    },

    async *stream(request: CompletionRequest): AsyncGenerator<CompletionChunk> {
      const events = await withRetry(() =>
        client.messages.create({ ...buildParams(request), stream: true }),
      );

      let promptTokens = 0;
      for await (const event of events) {
        switch (event.type) {
          case 'message_start':
            promptTokens = event.message.usage.input_tokens;
            break;
          case 'content_block_start':
            if (event.content_block.type === 'tool_use') {
              yield {
                toolCallDeltas: [{
                  index: event.index,
                  id: event.content_block.id,
                  name: event.content_block.name,
                }],
              };
            }
            break;
          case 'content_block_delta':
            if (event.delta.type === 'text_delta') {
              yield { contentDelta: event.delta.text };
            } else if (event.delta.type === 'input_json_delta') {
              yield {
                toolCallDeltas: [{
                  index: event.index,
                  argumentsDelta: event.delta.partial_json,
                }],
              };
            }
            break;
          case 'message_delta':
            yield {
              usage: {
                promptTokens,
                completionTokens: event.usage.output_tokens,
              },
            };
            break;
          default:
            break;
        }
      }
    },
  };
}
