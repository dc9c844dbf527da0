/**
 * LLM transport module.
 * Provider-agnostic completion interface for the chat engine.
 * Only module allowed to make LLM API calls.
 */

import type { CompletionTransport, LLMConfig } from './client.js';
import { createAnthropicTransport } from './anthropic.js';
import { createOpenAITransport } from './openai.js';
import { createMockTransport } from './mock.js';
import { DEFAULT_MODELS } from '../config/defaults.js';
import { ConfigurationError } from '../utils/errors.js';

export * from './client.js';
export { getModelCapabilities } from './capabilities.js';
export { createAnthropicTransport, toAnthropicPayload, toAnthropicTools } from './anthropic.js';
export { createOpenAITransport, toOpenAIMessages, readEventData } from './openai.js';
export { createMockTransport } from './mock.js';
export type { MockTransport, MockTurn } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

export function createTransport(config: LLMConfig): CompletionTransport {
  switch (config.provider) {
    case 'anthropic': {
      if (!config.apiKey) {
        throw new ConfigurationError(
          'ANTHROPIC_API_KEY is required when using the anthropic provider',
        );
      }
      return createAnthropicTransport(config.apiKey);
    }
    case 'openai': {
      if (!config.apiKey) {
        throw new ConfigurationError(
          'OPENAI_API_KEY is required when using the openai provider',
        );
      }
      return createOpenAITransport(config.apiKey);
    }
    case 'mock':
      return createMockTransport();
  }
}

export function resolveModel(config: LLMConfig): string {
  return config.model ?? DEFAULT_MODELS[config.provider];
}
