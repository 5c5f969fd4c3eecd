import type { AssistantMessage, Message, ToolCall } from '../entities/message';

export function humanMessage(content: string): Message {
  return { role: 'human', content };
}

export function assistantMessage(content: string, toolCalls: ToolCall[] = []): AssistantMessage {
  return { role: 'assistant', content, toolCalls };
}

export function toolMessage(toolCall: ToolCall, content: string): Message {
  return { role: 'tool', content, toolCallId: toolCall.id, name: toolCall.name };
}

/**
 * Returns the tool calls still awaiting a result: the calls of the latest
 * assistant message that no later tool message answers.
 */
export function pendingToolCalls(messages: readonly Message[]): ToolCall[] {
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    const message = messages[index];
    if (message?.role !== 'assistant') continue;

    const answered = new Set<string>();
    for (const later of messages.slice(index + 1)) {
      if (later.role === 'tool') answered.add(later.toolCallId);
    }
    return message.toolCalls.filter((call) => !answered.has(call.id));
  }
  return [];
}

/**
 * Keeps the newest `maxMessages` entries without starting on a tool result,
 * so every tool message in the window still follows the call it answers.
 */
export function windowMessages(messages: readonly Message[], maxMessages: number): Message[] {
  let start = Math.max(0, messages.length - maxMessages);
  while (start < messages.length && messages[start]?.role === 'tool') {
    start += 1;
  }
  return messages.slice(start);
}
