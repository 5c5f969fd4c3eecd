import { toAssistantMessage, windowMessages } from '@scholar/core';
import { defineNode, update } from '@scholar/engine';
import { renderPrompt } from '../prompts';
import type { ResearchState } from '../state';
import type { ResearchNodeDeps } from './types';
import { completeWithRetry } from './utils/completeWithRetry';

/**
 * agent
 *
 * Asks the model for the next move given the windowed history and the
 * available tools. Routing afterwards looks at the tool calls it returns.
 */
export function createAgentNode(deps: ResearchNodeDeps) {
    return defineNode<ResearchState>(async ({ state, logger }) => {
        const { llm, tools, config } = deps;
        const systemPrompt = renderPrompt(config.systemPrompt, state);
        const messages = windowMessages(state.messages, config.maxHistoryMessages);

        const response = await completeWithRetry({
            llm,
            config,
            logger,
            request: { systemPrompt, messages, tools }
        });

        logger?.debug({
            model: response.model,
            toolCalls: response.toolCalls.length,
            historyLength: messages.length,
            latencyMs: response.latencyMs
        }, 'LLM completion successful');

        return update<Partial<ResearchState>>({
            messages: [toAssistantMessage(response)],
            researchQuery: state.researchQuery || 'General research',
            researchProgress: ['Agent response generated']
        });
    });
}
