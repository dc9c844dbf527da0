/**
 * Default configuration values.
 * All values are overridable via engine options or config file.
 */

export const CHAT_DEFAULTS = {
  SYSTEM_PROMPT: '',
  MAX_TOKENS: 4096,
  TOP_P: 1.0,
  TEMPERATURE: 0.0,
} as const;

export const LIMITS = {
  MAX_TOOL_CALLS: 5,
  MAX_REVISIONS: 20,
  CHAIN_MAX_REVISIONS: 6,
  MAX_RETRIES: 3,
} as const;

export const DEFAULT_MODELS = {
  anthropic: 'claude-sonnet-4-5-20250929',
  openai: 'gpt-4o-mini',
  mock: 'mock',
} as const;

// ── Model capabilities ──────────────────────────────────────

export interface ModelCapabilities {
  functionCalling: boolean;
  assistantPrefill: boolean;
}

export const MODEL_CAPABILITIES: Readonly<Record<string, ModelCapabilities>> = {
  'gpt-4o': { functionCalling: true, assistantPrefill: false },
  'gpt-4o-mini': { functionCalling: true, assistantPrefill: false },
  'gpt-4.1': { functionCalling: true, assistantPrefill: false },
  'gpt-4.1-mini': { functionCalling: true, assistantPrefill: false },
  'gpt-3.5-turbo-instruct': { functionCalling: false, assistantPrefill: false },
  'claude-3-5-sonnet-20240620': { functionCalling: true, assistantPrefill: true },
  'claude-3-5-haiku-20241022': { functionCalling: true, assistantPrefill: true },
  'claude-3-7-sonnet-20250219': { functionCalling: true, assistantPrefill: true },
  'claude-sonnet-4-5-20250929': { functionCalling: true, assistantPrefill: true },
  mock: { functionCalling: true, assistantPrefill: true },
};

// Fallbacks for model ids missing from the table, by family prefix.
export const MODEL_FAMILY_CAPABILITIES: readonly (readonly [string, ModelCapabilities])[] = [
  ['claude-', { functionCalling: true, assistantPrefill: true }],
  ['gpt-', { functionCalling: true, assistantPrefill: false }],
];
