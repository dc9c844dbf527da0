import type { Message, ToolCall } from './message.js';

// ── Usage ────────────────────────────────────────────────────

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export const EMPTY_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0 };

// ── Tool schema (wire format) ────────────────────────────────

export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

// ── Request / response ───────────────────────────────────────

export interface CompletionRequest {
  model: string;
  messages: readonly Message[];
  temperature: number;
  topP: number;
  maxTokens: number;
  tools?: readonly ToolSchema[] | undefined;
}

export interface CompletionResponse {
  /** Null on tool-only turns. */
  content: string | null;
  toolCalls: ToolCall[];
  usage: TokenUsage;
}

// ── Streaming ────────────────────────────────────────────────

export interface ToolCallDelta {
  /** Position of the call within the response; deltas sharing it are joined. */
  index: number;
  id?: string | undefined;
  name?: string | undefined;
  argumentsDelta?: string | undefined;
}

export interface CompletionChunk {
  contentDelta?: string | undefined;
  toolCallDeltas?: readonly ToolCallDelta[] | undefined;
  /** Usually only present on the final chunk. */
  usage?: TokenUsage | undefined;
}
