// Anthropic Messages API client

import { z } from 'zod';
import type {
  LLMClient,
  LLMConfig,
  ChatMessage,
  Completion,
  ToolDefinition,
  ToolCall,
} from './types.js';
import { errorForStatus, fetchWithRetry, readJsonBody } from '../utils/http.js';
import { AgentError } from '../utils/errors.js';

const ANTHROPIC_VERSION = '2023-06-01';

const contentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  id: z.string().optional(),
  name: z.string().optional(),
  input: z.unknown().optional(),
});

const messagesResponseSchema = z.object({
  content: z.array(contentBlockSchema),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

type WireBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: unknown }
  | { type: 'tool_result'; tool_use_id: string; content: string };

interface WireMessage {
  role: 'user' | 'assistant';
  content: WireBlock[];
}

function parseArguments(raw: string): unknown {
  try {
    return JSON.parse(raw || '{}');
  } catch {
    return {};
  }
}

/**
 * Convert the provider-neutral transcript to the Messages API shape:
 * system prompts are lifted out, tool results become user turns, and
 * consecutive same-role turns are merged.
 */
export function toAnthropicMessages(messages: ChatMessage[]): { system: string; messages: WireMessage[] } {
  const system: string[] = [];
  const wire: WireMessage[] = [];

  const push = (role: WireMessage['role'], blocks: WireBlock[]): void => {
    if (blocks.length === 0) return;
    const last = wire[wire.length - 1];
    if (last && last.role === role) {
      last.content.push(...blocks);
    } else {
      wire.push({ role, content: blocks });
    }
  };

  for (const msg of messages) {
    switch (msg.role) {
      case 'system':
        system.push(msg.content);
        break;
      case 'user':
        push('user', msg.content ? [{ type: 'text', text: msg.content }] : []);
        break;
      case 'assistant': {
        const blocks: WireBlock[] = [];
        if (msg.content) blocks.push({ type: 'text', text: msg.content });
        for (const call of msg.toolCalls ?? []) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: parseArguments(call.arguments) });
        }
        push('assistant', blocks);
        break;
      }
      case 'tool':
        push('user', [{ type: 'tool_result', tool_use_id: msg.toolCallId ?? '', content: msg.content }]);
        break;
    }
  }

  return { system: system.join('\n\n'), messages: wire };
}

export class AnthropicClient implements LLMClient {
  private config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  private get messagesEndpoint(): string {
    const base = this.config.endpoint.replace(/\/$/, '');
    return `${base}/v1/messages`;
  }

  async complete(messages: ChatMessage[], tools?: ToolDefinition[]): Promise<Completion> {
    const { system, messages: wire } = toAnthropicMessages(messages);

    const body: Record<string, unknown> = {
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      messages: wire,
    };
    if (system) body.system = system;
    if (tools && tools.length > 0) {
      body.tools = tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: tool.parameters,
      }));
    }

    const response = await fetchWithRetry(
      this.messagesEndpoint,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.config.apiKey ?? '',
          'anthropic-version': ANTHROPIC_VERSION,
        },
        body: JSON.stringify(body),
      },
      this.config.requestTimeoutMs
    );

    if (!response.ok) {
      const errorText = await response.text();
      throw errorForStatus(response.status, errorText, {
        service: 'Anthropic',
        action: 'Anthropic completion request',
        credential: 'ANTHROPIC_API_KEY',
      });
    }

    const parsed = messagesResponseSchema.safeParse(
      await readJsonBody(response, 'Anthropic', 'Anthropic completion request')
    );
    if (!parsed.success) {
      throw new AgentError('Invalid Anthropic API response', {
        reason: 'The response had no content array.',
      });
    }

    const texts: string[] = [];
    const calls: ToolCall[] = [];
    for (const block of parsed.data.content) {
      if (block.type === 'text' && block.text !== undefined) {
        texts.push(block.text);
      } else if (block.type === 'tool_use' && block.id && block.name) {
        calls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.input ?? {}) });
      }
    }

    const text = texts.join('');
    const usage = parsed.data.usage
      ? {
          promptTokens: parsed.data.usage.input_tokens,
          completionTokens: parsed.data.usage.output_tokens,
          totalTokens: parsed.data.usage.input_tokens + parsed.data.usage.output_tokens,
        }
      : undefined;

    if (calls.length > 0) {
      return { type: 'tool_calls', text, calls, usage };
    }
    return { type: 'final', text, usage };
  }
}
