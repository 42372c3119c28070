// LLM Client type definitions

export type LLMProvider = 'openai' | 'anthropic' | 'ollama';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['openai', 'anthropic', 'ollama'];

export interface LLMConfig {
  provider: LLMProvider;
  endpoint: string;
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  /** Per-request timeout; the only cancellation the agent has */
  requestTimeoutMs: number;
}

export interface ToolCall {
  id: string;
  name: string;
  /** Raw JSON string as produced by the model */
  arguments: string;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  name?: string; // For tool messages
  toolCalls?: ToolCall[]; // For assistant messages with tool calls
  toolCallId?: string; // For tool response messages
}

export interface JsonSchemaObject {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * One reasoning step: either the model is done and answers in text,
 * or it asks for one or more tool invocations before continuing.
 */
export type Completion =
  | { type: 'final'; text: string; usage?: TokenUsage }
  | { type: 'tool_calls'; text: string; calls: ToolCall[]; usage?: TokenUsage };

export interface LLMClient {
  complete(messages: ChatMessage[], tools?: ToolDefinition[]): Promise<Completion>;
}
