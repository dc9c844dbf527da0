import { afterEach, describe, expect, it, vi } from 'vitest';

import { getModelCapabilities } from '../../src/llm/capabilities.js';
import { createTransport, loadLLMConfig, resolveModel } from '../../src/llm/index.js';
import { ConfigurationError } from '../../src/utils/errors.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('getModelCapabilities', () => {
  it('uses the table for known models', () => {
    expect(getModelCapabilities('gpt-3.5-turbo-instruct')).toEqual({
      functionCalling: false,
      assistantPrefill: false,
    });
  });

  it('falls back to the model family', () => {
    expect(getModelCapabilities('claude-opus-4-1')).toEqual({
      functionCalling: true,
      assistantPrefill: true,
    });
    expect(getModelCapabilities('gpt-5-preview')).toEqual({
      functionCalling: true,
      assistantPrefill: false,
    });
  });

  it('assumes nothing for unknown models', () => {
    expect(getModelCapabilities('llama-local')).toEqual({
      functionCalling: false,
      assistantPrefill: false,
    });
  });
});

describe('loadLLMConfig', () => {
  it('reads the provider, its key and the model from the environment', () => {
    vi.stubEnv('LLM_PROVIDER', 'openai');
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    vi.stubEnv('PROMPTSMITH_MODEL', 'gpt-4o');

    expect(loadLLMConfig()).toEqual({
      provider: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-4o',
    });
  });

  it('picks the key that matches an overridden provider', () => {
    vi.stubEnv('LLM_PROVIDER', 'openai');
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-anthropic-secret');

    expect(loadLLMConfig({ provider: 'anthropic' }).apiKey).toBe('test-anthropic-secret');
  });

  it('rejects an unknown provider', () => {
    vi.stubEnv('LLM_PROVIDER', 'carrier-pigeon');
    expect(() => loadLLMConfig()).toThrow();
  });
});

describe('createTransport', () => {
  it('needs an API key for hosted providers', () => {
    expect(() => createTransport({ provider: 'anthropic' })).toThrow(ConfigurationError);
    expect(() => createTransport({ provider: 'openai' })).toThrow(
      'OPENAI_API_KEY is required when using the openai provider',
    );
  });

  it('builds the mock transport without a key', async () => {
    const response = await createTransport({ provider: 'mock' }).complete({
      model: 'mock',
      messages: [{ role: 'user', content: 'Hi' }],
      temperature: 0,
      topP: 1,
      maxTokens: 16,
    });
    expect(response.content).toBe('mock');
  });
});

describe('resolveModel', () => {
  it('prefers the configured model over the provider default', () => {
    expect(resolveModel({ provider: 'openai', model: 'gpt-4.1' })).toBe('gpt-4.1');
    expect(resolveModel({ provider: 'openai' })).toBe('gpt-4o-mini');
  });
});
