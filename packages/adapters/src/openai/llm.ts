import OpenAI from 'openai';
import { zodFunction } from 'openai/helpers/zod';
import { z } from 'zod';
import {
    JsonValueSchema,
    type JsonValue,
    type LLMCompleteOptions,
    type LLMProvider,
    type LLMResponse,
    type Message,
    type Tool,
    type ToolCall
} from '@scholar/core';

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

type OpenAIToolCall = NonNullable<
    OpenAI.Chat.Completions.ChatCompletion['choices'][number]['message']['tool_calls']
>[number];

const ToolArgumentsSchema = z.record(JsonValueSchema);

function toOpenAIMessage(message: Message): OpenAIMessage {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'human':
            return { role: 'user', content: message.content };
        case 'tool':
            return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
        case 'assistant':
            if (message.toolCalls.length === 0) {
                return { role: 'assistant', content: message.content };
            }
            return {
                role: 'assistant',
                content: message.content || null,
                tool_calls: message.toolCalls.map((call) => ({
                    id: call.id,
                    type: 'function' as const,
                    function: { name: call.name, arguments: JSON.stringify(call.arguments) }
                }))
            };
    }
}

function toOpenAIMessages(systemPrompt: string, messages: Message[]): OpenAIMessage[] {
    return [{ role: 'system', content: systemPrompt }, ...messages.map(toOpenAIMessage)];
}

function toOpenAITools(tools: readonly Tool[] | undefined): OpenAI.Chat.Completions.ChatCompletionTool[] | undefined {
    if (!tools || tools.length === 0) {
        return undefined;
    }

    return tools.map((tool) =>
        zodFunction({
            name: tool.name,
            description: tool.description,
            parameters: tool.parameters
        })
    );
}

function parseToolArguments(raw: string | undefined): Record<string, JsonValue> {
    if (!raw) return {};
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return {};
    }
    const result = ToolArgumentsSchema.safeParse(parsed);
    return result.success ? result.data : {};
}

function fromOpenAIToolCalls(toolCalls: OpenAIToolCall[] | undefined): ToolCall[] {
    if (!toolCalls || toolCalls.length === 0) return [];

    return toolCalls
        .filter((call) => call.type === 'function')
        .map((call) => ({
            id: call.id,
            name: call.function.name,
            arguments: parseToolArguments(call.function.arguments)
        }));
}

export class OpenAILLMProvider implements LLMProvider {
    private client: OpenAI;

    public constructor(private readonly opts: {
        baseUrl?: string;
        apiKey: string;
        model: string;
        client?: OpenAI;
    }) {
        this.client = opts.client ?? new OpenAI({
            baseURL: opts.baseUrl,
            apiKey: opts.apiKey
        });
    }

    public async complete(options: LLMCompleteOptions): Promise<LLMResponse> {
        const start = Date.now();

        const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
            model: this.opts.model,
            messages: toOpenAIMessages(options.systemPrompt, options.messages)
        };

        const tools = toOpenAITools(options.tools);
        if (tools) {
            params.tools = tools;
        }

        const response = await this.client.chat.completions.create(params);
        const choice = response.choices[0]?.message;

        return {
            content: choice?.content ?? null,
            toolCalls: fromOpenAIToolCalls(choice?.tool_calls),
            tokensUsed: {
                promptTokens: response.usage?.prompt_tokens ?? 0,
                completionTokens: response.usage?.completion_tokens ?? 0
            },
            model: response.model,
            latencyMs: Date.now() - start
        };
    }
}
