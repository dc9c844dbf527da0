import { z } from 'zod';

import type { CompletionTransport } from '../llm/client.js';
import { getModelCapabilities } from '../llm/capabilities.js';
import type {
  CompletionRequest,
  CompletionResponse,
  Message,
  ToolCall,
  ToolSchema,
} from '../schema/index.js';
import { parseTranscript } from '../schema/index.js';
import { CHAT_DEFAULTS, LIMITS } from '../config/defaults.js';
import type { ModelCapabilities } from '../config/defaults.js';
import { collectTagValues } from '../text/tags.js';
import { ConfigurationError, UnknownToolError } from '../utils/errors.js';
import * as log from '../utils/logger.js';
import { StreamAccumulator } from './accumulator.js';
import { TokenTally } from './tokens.js';
import type { Tool, ToolArgs, ToolOutput } from './tools.js';
import {
  buildToolMap,
  decodeArguments,
  drainToolOutput,
  isAsyncIterable,
  renderToolCall,
  renderToolHeader,
} from './tools.js';

// ── Config schema ────────────────────────────────────────────

export const chatConfigSchema = z.object({
  model: z.string().min(1),
  systemPrompt: z.string().optional().default(CHAT_DEFAULTS.SYSTEM_PROMPT),
  maxTokens: z.number().int().positive().optional().default(CHAT_DEFAULTS.MAX_TOKENS),
  topP: z.number().gt(0).max(1).optional().default(CHAT_DEFAULTS.TOP_P),
  temperature: z.number().min(0).max(2).optional().default(CHAT_DEFAULTS.TEMPERATURE),
  maxToolCalls: z.number().int().nonnegative().optional().default(LIMITS.MAX_TOOL_CALLS),
  stream: z.boolean().optional().default(false),
  streamToolOutput: z.boolean().optional().default(false),
  provideXmlBlocksToTools: z.boolean().optional().default(false),
  capabilities: z
    .object({
      functionCalling: z.boolean(),
      assistantPrefill: z.boolean(),
    })
    .optional(),
});

export type ChatConfig = z.input<typeof chatConfigSchema>;
export type ResolvedChatConfig = z.output<typeof chatConfigSchema>;

// ── Public types ─────────────────────────────────────────────

export interface ChatEngineOptions extends ChatConfig {
  transport: CompletionTransport;
  tools?: readonly Tool[] | undefined;
}

export interface CallOptions {
  /** Seed for the assistant's next turn; prepended to the visible text. */
  prefill?: string | undefined;
}

export interface SendOptions extends CallOptions {
  onSnapshot?: ((text: string) => void) | undefined;
}

interface EngineParts {
  config: ResolvedChatConfig;
  capabilities: ModelCapabilities;
  transport: CompletionTransport;
  toolMap: ReadonlyMap<string, Tool>;
  toolSchemas: readonly ToolSchema[];
}

// ── Engine ───────────────────────────────────────────────────

/**
 * Multi-turn chat with bounded tool resolution.
 *
 * Both `call` and `stream` run the same loop: one completion per depth,
 * tool calls resolved in the order the backend returned them, and a
 * follow-up completion while depth is below `maxToolCalls`. History is
 * committed per turn only once that turn's response is complete.
 * One in-flight call per engine.
 */
export class ChatEngine {
  readonly config: ResolvedChatConfig;
  readonly capabilities: ModelCapabilities;
  readonly toolSchemas: readonly ToolSchema[];
  readonly tokens = new TokenTally();

  private readonly transport: CompletionTransport;
  private readonly toolMap: ReadonlyMap<string, Tool>;
  private messages: Message[] = [];

  constructor(parts: EngineParts) {
    this.config = parts.config;
    this.capabilities = parts.capabilities;
    this.transport = parts.transport;
    this.toolMap = parts.toolMap;
    this.toolSchemas = parts.toolSchemas;
  }

  // ── History ────────────────────────────────────────────────

  get history(): readonly Message[] {
    return this.messages;
  }

  clearHistory(): void {
    this.messages = [];
  }

  /** Replace history with a transcript (an array of messages). */
  restoreHistory(transcript: unknown): void {
    this.messages = parseTranscript(transcript);
  }

  // ── Calls ──────────────────────────────────────────────────

  async call(prompt = '', options: CallOptions = {}): Promise<string> {
    let pending = this.beginTurn(prompt, options);
    let prefill = options.prefill ?? '';
    let text = '';

    for (let depth = 0; ; depth++) {
      const response = await this.transport.complete(this.buildRequest(pending, prefill));
      text += this.commitResponse(pending, response, prefill);
      pending = [];
      prefill = '';

      if (response.toolCalls.length === 0) return text;

      for (const call of response.toolCalls) {
        const result = await drainToolOutput(this.invokeTool(call, depth));
        text += this.commitToolResult(call, result);
      }

      if (depth >= this.config.maxToolCalls) return text;
    }
  }

  /** Yields cumulative snapshots of the visible text. */
  async *stream(prompt = '', options: CallOptions = {}): AsyncGenerator<string> {
    let pending = this.beginTurn(prompt, options);
    let prefill = options.prefill ?? '';
    let text = '';
    let lastYielded = '';

    for (let depth = 0; ; depth++) {
      const accumulator = new StreamAccumulator();
      let turnText = prefill;

      for await (const chunk of this.transport.stream(this.buildRequest(pending, prefill))) {
        accumulator.add(chunk);
        if (chunk.contentDelta) {
          turnText += chunk.contentDelta;
          lastYielded = text + turnText;
          yield lastYielded;
        }
      }

      const response = accumulator.toResponse();
      text += this.commitResponse(pending, response, prefill);
      pending = [];
      prefill = '';

      if (text !== lastYielded) {
        lastYielded = text;
        yield text;
      }

      if (response.toolCalls.length === 0) return;

      for (const call of response.toolCalls) {
        const output = this.invokeTool(call, depth);
        let result: string;

        if (this.config.streamToolOutput && isAsyncIterable(output)) {
          const header = text + renderToolHeader(call);
          result = '';
          for await (const snapshot of output) {
            result = snapshot;
            lastYielded = header + result;
            yield lastYielded;
          }
        } else {
          result = await drainToolOutput(output);
        }

        text += this.commitToolResult(call, result);
        lastYielded = text;
        yield text;
      }

      if (depth >= this.config.maxToolCalls) return;
    }
  }

  /** `call` or a drained `stream`, depending on the `stream` setting. */
  async send(prompt = '', options: SendOptions = {}): Promise<string> {
    if (!this.config.stream) return this.call(prompt, options);

    let text = '';
    for await (const snapshot of this.stream(prompt, options)) {
      text = snapshot;
      options.onSnapshot?.(snapshot);
    }
    return text;
  }

  // ── Turn plumbing ──────────────────────────────────────────

  private beginTurn(prompt: string, options: CallOptions): Message[] {
    if (options.prefill && !this.capabilities.assistantPrefill) {
      throw new ConfigurationError(
        `Model "${this.config.model}" does not support assistant prefill`,
      );
    }
    return prompt ? [{ role: 'user', content: prompt }] : [];
  }

  private buildRequest(pending: readonly Message[], prefill: string): CompletionRequest {
    const messages: Message[] = [];
    if (this.config.systemPrompt) {
      messages.push({ role: 'system', content: this.config.systemPrompt });
    }
    messages.push(...this.messages, ...pending);
    if (prefill) {
      messages.push({ role: 'assistant', content: prefill });
    }

    return {
      model: this.config.model,
      messages,
      temperature: this.config.temperature,
      topP: this.config.topP,
      maxTokens: this.config.maxTokens,
      ...(this.toolSchemas.length > 0 ? { tools: this.toolSchemas } : {}),
    };
  }

  private commitResponse(
    pending: readonly Message[],
    response: CompletionResponse,
    prefill: string,
  ): string {
    const content = prefill + (response.content ?? '');
    this.messages.push(...pending);
    this.messages.push(
      response.toolCalls.length > 0
        ? { role: 'assistant', content, toolCalls: response.toolCalls }
        : { role: 'assistant', content },
    );
    this.tokens.record(response.usage);
    return content;
  }

  private commitToolResult(call: ToolCall, result: string): string {
    this.messages.push({
      role: 'tool',
      toolCallId: call.id,
      name: call.name,
      content: result,
    });
    return renderToolCall(call, result);
  }

  // ── Tools ──────────────────────────────────────────────────

  private invokeTool(call: ToolCall, depth: number): ToolOutput {
    const tool = this.toolMap.get(call.name);
    if (!tool) throw new UnknownToolError(call.name);

    log.tool(call.name, depth);
    return tool.invoke(this.toolArguments(call));
  }

  private toolArguments(call: ToolCall): ToolArgs {
    const args = decodeArguments(call);
    if (!this.config.provideXmlBlocksToTools) return args;

    const blocks = collectTagValues(this.messages.map((m) => m.content));
    return { ...blocks, ...args };
  }
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Validate options, resolve model capabilities and derive tool schemas.
 * Throws `ConfigurationError` for tools on a model without function calling.
 */
export function createChatEngine(options: ChatEngineOptions): ChatEngine {
  const config = chatConfigSchema.parse(options);
  const capabilities = config.capabilities ?? getModelCapabilities(config.model);
  const tools = options.tools ?? [];

  if (tools.length > 0 && !capabilities.functionCalling) {
    throw new ConfigurationError(
      `Model "${config.model}" does not support function calling`,
    );
  }

  return new ChatEngine({
    config,
    capabilities,
    transport: options.transport,
    toolMap: buildToolMap(tools),
    toolSchemas: tools.map((tool) => tool.schema),
  });
}
