import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import type OpenAI from 'openai';
import type { Message, Tool } from '@scholar/core';

import { OpenAILLMProvider } from '../src/index';

type CreateParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

function createStubClient(message: Record<string, unknown>) {
  const create = vi.fn(async (_input: CreateParams) => ({
    model: 'gpt-4o-mini',
    usage: { prompt_tokens: 12, completion_tokens: 5 },
    choices: [{ message }]
  }));
  const client = { chat: { completions: { create } } } as unknown as OpenAI;
  return { create, client };
}

const lookupTool: Tool = {
  name: 'lookup',
  description: 'Look something up',
  parameters: z.object({ topic: z.string() }),
  handler: async ({ topic }) => `found ${topic}`
};

describe('OpenAILLMProvider', () => {
  it('maps the conversation to chat completion messages', async () => {
    const { create, client } = createStubClient({ content: 'ok' });
    const provider = new OpenAILLMProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini', client });

    const messages: Message[] = [
      { role: 'human', content: 'find tide data' },
      { role: 'assistant', content: '', toolCalls: [{ id: 'call_1', name: 'lookup', arguments: { topic: 'tides' } }] },
      { role: 'tool', content: 'tide tables', toolCallId: 'call_1', name: 'lookup' },
      { role: 'assistant', content: 'done', toolCalls: [] }
    ];

    await provider.complete({ systemPrompt: 'be precise', messages });

    expect(create).toHaveBeenCalledTimes(1);
    const params = create.mock.calls[0]?.[0];
    expect(params?.model).toBe('gpt-4o-mini');
    expect(params?.messages).toEqual([
      { role: 'system', content: 'be precise' },
      { role: 'user', content: 'find tide data' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'lookup', arguments: '{"topic":"tides"}' } }]
      },
      { role: 'tool', content: 'tide tables', tool_call_id: 'call_1' },
      { role: 'assistant', content: 'done' }
    ]);
    expect(params).not.toHaveProperty('tools');
  });

  it('sends tool definitions built from zod schemas', async () => {
    const { create, client } = createStubClient({ content: 'ok' });
    const provider = new OpenAILLMProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini', client });

    await provider.complete({ systemPrompt: 'sys', messages: [], tools: [lookupTool] });

    const tools = create.mock.calls[0]?.[0].tools;
    expect(tools).toHaveLength(1);
    expect(tools?.[0]).toMatchObject({
      type: 'function',
      function: { name: 'lookup', description: 'Look something up' }
    });
  });

  it('maps the completion response to the canonical contract', async () => {
    const { client } = createStubClient({
      content: null,
      tool_calls: [
        { id: 'call_1', type: 'function', function: { name: 'lookup', arguments: '{"topic":"tides"}' } },
        { id: 'call_2', type: 'function', function: { name: 'lookup', arguments: 'not json' } }
      ]
    });
    const provider = new OpenAILLMProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini', client });

    const result = await provider.complete({ systemPrompt: 'sys', messages: [{ role: 'human', content: 'hi' }] });

    expect(result.content).toBeNull();
    expect(result.toolCalls).toEqual([
      { id: 'call_1', name: 'lookup', arguments: { topic: 'tides' } },
      { id: 'call_2', name: 'lookup', arguments: {} }
    ]);
    expect(result.tokensUsed).toEqual({ promptTokens: 12, completionTokens: 5 });
    expect(result.model).toBe('gpt-4o-mini');
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
  });
});
