import { z } from 'zod';
import { JsonValueSchema } from './session';

export const ToolCallSchema = z.object({
  id        : z.string(),
  name      : z.string(),
  arguments : z.record(JsonValueSchema)
});

export type ToolCall = z.infer<typeof ToolCallSchema>;

export const MessageSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('system'), content: z.string() }),
  z.object({ role: z.literal('human'), content: z.string() }),
  z.object({
    role      : z.literal('assistant'),
    content   : z.string(),
    toolCalls : z.array(ToolCallSchema)
  }),
  z.object({
    role       : z.literal('tool'),
    content    : z.string(),
    toolCallId : z.string(),
    name       : z.string()
  })
]);

/**
 * A role-tagged unit of conversation. Assistant messages carry the tool
 * invocations the model asked for; tool messages answer one of them by id.
 */
export type Message = z.infer<typeof MessageSchema>;

export type AssistantMessage = Extract<Message, { role: 'assistant' }>;
export type ToolMessage = Extract<Message, { role: 'tool' }>;
