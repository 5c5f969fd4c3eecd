import type { LLMCompleteOptions, LLMProvider, LLMResponse, Message } from '@scholar/core';

export interface FakeLLMRequest {
    systemPrompt: string;
    messages: Message[];
    toolNames: string[];
}

/**
 * Replays queued responses in order, cycling when exhausted, and records
 * every request it receives.
 */
export class FakeLLMProvider implements LLMProvider {
    public readonly requests: FakeLLMRequest[] = [];
    private readonly responses: LLMResponse[];
    private callCount = 0;

    public constructor(responses?: LLMResponse[]) {
        this.responses = responses ?? [
            {
                content: 'Fake response',
                toolCalls: [],
                tokensUsed: { promptTokens: 0, completionTokens: 0 },
                model: 'fake-model',
                latencyMs: 10
            }
        ];
    }

    public get calls(): number {
        return this.callCount;
    }

    public async complete(options: LLMCompleteOptions): Promise<LLMResponse> {
        const response = this.responses[this.callCount % this.responses.length];
        if (!response) {
            throw new Error('FakeLLMProvider: No response available');
        }
        this.callCount++;
        this.requests.push({
            systemPrompt: options.systemPrompt,
            messages: structuredClone(options.messages),
            toolNames: (options.tools ?? []).map((tool) => tool.name)
        });
        return structuredClone(response);
    }
}
