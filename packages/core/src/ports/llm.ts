import { type Tool, type ToolCall } from '../contracts/tools';
import { type RuntimeResource } from '../lifecycle';

export interface ChatMessage {
  role: 'user' | 'assistant' | 'system' | 'tool';
  content: string;
  toolCallId?: string;
  /** Set on assistant messages that requested tools. */
  toolCalls?: ToolCall[];
}

export interface LLMCompleteOptions {
  messages: ChatMessage[];
  systemPrompt: string;
  tools?: Tool[] | undefined;
  signal?: AbortSignal | undefined;
}

export interface LLMResponse {
  content: string | null;
  toolCalls: ToolCall[];
  tokensUsed: {
    promptTokens: number;
    completionTokens: number;
  };
  model: string;
  latencyMs: number;
}

export interface LLMProvider extends RuntimeResource {
  complete(options: LLMCompleteOptions): Promise<LLMResponse>;
}
