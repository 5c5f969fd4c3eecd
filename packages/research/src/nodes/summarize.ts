import { humanMessage, toAssistantMessage, windowMessages } from '@scholar/core';
import { defineNode, update } from '@scholar/engine';
import { renderPrompt } from '../prompts';
import type { ResearchState } from '../state';
import type { ResearchNodeDeps } from './types';
import { completeWithRetry } from './utils/completeWithRetry';

/**
 * summarize
 */
export function createSummarizeNode(deps: ResearchNodeDeps) {
    return defineNode<ResearchState>(async ({ state, logger }) => {
        const { llm, config } = deps;
        const request = humanMessage(renderPrompt(config.summaryPrompt, state));

        const response = await completeWithRetry({
            llm,
            config,
            logger,
            request: {
                systemPrompt: renderPrompt(config.systemPrompt, state),
                messages: [...windowMessages(state.messages, config.maxHistoryMessages - 1), request]
            }
        });
        const reply = toAssistantMessage(response);

        logger?.debug({ model: response.model, summaryLength: reply.content.length }, 'Research summarized');

        return update<Partial<ResearchState>>({
            messages: [reply],
            summary: reply.content,
            researchProgress: ['Research summarized']
        });
    });
}
