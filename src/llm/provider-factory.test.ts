import { createLLMClient, getProviderDisplayName } from './provider-factory.js';
import { OpenAICompatibleClient } from './openai-compatible-client.js';
import { AnthropicClient } from './anthropic-client.js';
import type { LLMConfig } from './types.js';
import { ConfigurationError } from '../utils/errors.js';

const base: LLMConfig = {
  provider: 'openai',
  endpoint: 'https://llm.example.test/v1',
  model: 'test-model',
  maxTokens: 256,
  temperature: 0,
  requestTimeoutMs: 1000,
};

describe('createLLMClient', () => {
  it('builds the client for each provider', () => {
    expect(createLLMClient({ ...base, apiKey: 'test-secret' })).toBeInstanceOf(OpenAICompatibleClient);
    expect(createLLMClient({ ...base, provider: 'anthropic', apiKey: 'test-secret' })).toBeInstanceOf(AnthropicClient);
    expect(createLLMClient({ ...base, provider: 'ollama' })).toBeInstanceOf(OpenAICompatibleClient);
  });

  it('requires a key for hosted providers', () => {
    expect(() => createLLMClient(base)).toThrow(ConfigurationError);
    expect(() => createLLMClient({ ...base, provider: 'anthropic' })).toThrow(
      'API key is required for the Anthropic provider'
    );
  });
});

describe('getProviderDisplayName', () => {
  it('names local models', () => {
    expect(getProviderDisplayName('ollama')).toBe('Ollama (Local)');
  });
});
