import type { AssistantMessage, Message, ToolCall } from '../entities/message';
import type { Tool } from '../contracts/tools';

export interface LLMCompleteOptions {
  systemPrompt: string;
  messages: Message[];
  tools?: readonly Tool[] | undefined;
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

/**
 * Model-call port. Implementations receive the (already windowed) history
 * plus the tools the model may invoke.
 */
export interface LLMProvider {
  complete(options: LLMCompleteOptions): Promise<LLMResponse>;
}

export function toAssistantMessage(response: LLMResponse): AssistantMessage {
  return {
    role: 'assistant',
    content: response.content ?? '',
    toolCalls: response.toolCalls
  };
}
