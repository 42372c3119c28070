// OpenAI-compatible client for OpenAI and Ollama

import { z } from 'zod';
import type {
  LLMClient,
  LLMConfig,
  ChatMessage,
  Completion,
  ToolDefinition,
} from './types.js';
import { errorForStatus, fetchWithRetry, readJsonBody } from '../utils/http.js';
import { AgentError } from '../utils/errors.js';

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string(),
                }),
              })
            )
            .nullable()
            .optional(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

type ChatResponse = z.infer<typeof chatResponseSchema>;

export class OpenAICompatibleClient implements LLMClient {
  private config: LLMConfig;
  private providerName: string;

  constructor(config: LLMConfig, providerName: string = 'OpenAI-compatible') {
    this.config = config;
    this.providerName = providerName;
  }

  private get chatEndpoint(): string {
    const base = this.config.endpoint.replace(/\/$/, '');
    return `${base}/chat/completions`;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };

    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    return headers;
  }

  private buildRequestBody(messages: ChatMessage[], tools: ToolDefinition[] | undefined): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.config.model,
      messages: messages.map((msg) => ({
        role: msg.role,
        content: msg.content || '',
        ...(msg.toolCalls && msg.toolCalls.length > 0
          ? {
              tool_calls: msg.toolCalls.map((call) => ({
                id: call.id,
                type: 'function',
                function: { name: call.name, arguments: call.arguments },
              })),
            }
          : {}),
        ...(msg.toolCallId ? { tool_call_id: msg.toolCallId } : {}),
      })),
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
    };

    if (tools && tools.length > 0) {
      body.tools = tools.map((tool) => ({
        type: 'function',
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
        },
      }));
      body.tool_choice = 'auto';
    }

    return body;
  }

  async complete(messages: ChatMessage[], tools?: ToolDefinition[]): Promise<Completion> {
    const response = await fetchWithRetry(
      this.chatEndpoint,
      {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(this.buildRequestBody(messages, tools)),
      },
      this.config.requestTimeoutMs
    );

    if (!response.ok) {
      const errorText = await response.text();
      throw errorForStatus(response.status, errorText, {
        service: this.providerName,
        action: `${this.providerName} completion request`,
        credential: this.config.provider === 'openai' ? 'OPENAI_API_KEY' : undefined,
      });
    }

    const data = await readJsonBody(response, this.providerName, `${this.providerName} completion request`);
    return this.parseResponse(data);
  }

  private parseResponse(data: unknown): Completion {
    const parsed = chatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AgentError(`Invalid ${this.providerName} API response`, {
        reason: 'The response had no choices array.',
      });
    }
    return toCompletion(parsed.data);
  }
}

function toCompletion(data: ChatResponse): Completion {
  const message = data.choices[0].message;
  const text = message.content ?? '';
  const usage = data.usage
    ? {
        promptTokens: data.usage.prompt_tokens,
        completionTokens: data.usage.completion_tokens,
        totalTokens: data.usage.total_tokens,
      }
    : undefined;

  const calls = (message.tool_calls ?? []).map((call) => ({
    id: call.id,
    name: call.function.name,
    arguments: call.function.arguments,
  }));

  if (calls.length > 0) {
    return { type: 'tool_calls', text, calls, usage };
  }
  return { type: 'final', text, usage };
}
