// LLM Provider Factory - creates the appropriate client based on configuration

import type { LLMClient, LLMConfig, LLMProvider } from './types.js';
import { OpenAICompatibleClient } from './openai-compatible-client.js';
import { AnthropicClient } from './anthropic-client.js';
import { ConfigurationError } from '../utils/errors.js';

export function createLLMClient(config: LLMConfig): LLMClient {
  switch (config.provider) {
    case 'openai':
      if (!config.apiKey) {
        throw new ConfigurationError('API key is required for the OpenAI provider', {
          suggestion: 'Set OPENAI_API_KEY in your .env file.',
        });
      }
      return new OpenAICompatibleClient(config, 'OpenAI');

    case 'anthropic':
      if (!config.apiKey) {
        throw new ConfigurationError('API key is required for the Anthropic provider', {
          suggestion: 'Set ANTHROPIC_API_KEY in your .env file.',
        });
      }
      return new AnthropicClient(config);

    case 'ollama':
      // Ollama doesn't require API key
      return new OpenAICompatibleClient(config, 'Ollama');
  }
}

export function getProviderDisplayName(provider: LLMProvider): string {
  switch (provider) {
    case 'openai':
      return 'OpenAI';
    case 'anthropic':
      return 'Anthropic';
    case 'ollama':
      return 'Ollama (Local)';
  }
}
