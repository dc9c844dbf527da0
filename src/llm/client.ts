import { z } from 'zod';

import type {
  CompletionChunk,
  CompletionRequest,
  CompletionResponse,
} from '../schema/index.js';

// ── CompletionTransport interface ────────────────────────────

export interface CompletionTransport {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
  stream(request: CompletionRequest): AsyncIterable<CompletionChunk>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

function apiKeyFor(provider: string): string | undefined {
  switch (provider) {
    case 'anthropic':
      return process.env['ANTHROPIC_API_KEY'];
    case 'openai':
      return process.env['OPENAI_API_KEY'];
    default:
      return undefined;
  }
}

/**
 * Read provider, key and model from the environment. Overrides (from CLI
 * flags or a config file) take precedence, and the key follows the
 * resolved provider.
 */
export function loadLLMConfig(
  overrides: { provider?: LLMProvider | undefined; model?: string | undefined } = {},
): LLMConfig {
  const provider = overrides.provider ?? process.env['LLM_PROVIDER'] ?? 'anthropic';

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKeyFor(provider),
    model: overrides.model ?? process.env['PROMPTSMITH_MODEL'],
  });
}
