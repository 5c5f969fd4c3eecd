import { pendingToolCalls, toolMessage } from '@scholar/core';
import { defineNode, update } from '@scholar/engine';
import type { ResearchState } from '../state';
import { HUMAN_APPROVAL_TOOL } from '../tools/requestHumanApproval';
import type { ResearchNodeDeps } from './types';
import { executeTools, sourcesFor } from './utils/executeTools';

/**
 * tools
 *
 * Executes the pending tool calls of the latest assistant message. Approval
 * calls are left to the approval node.
 */
export function createToolsNode(deps: ResearchNodeDeps) {
    return defineNode<ResearchState>(async ({ state, threadId, logger }) => {
        const toolCalls = pendingToolCalls(state.messages).filter((call) => call.name !== HUMAN_APPROVAL_TOOL);

        if (toolCalls.length === 0) {
            return update<Partial<ResearchState>>({ researchProgress: ['No tool calls to execute'] });
        }

        const results = await executeTools({
            toolCalls,
            tools: deps.tools,
            context: { threadId, logger },
            logger,
            config: deps.config
        });

        return update<Partial<ResearchState>>({
            messages: results.map(({ toolCall, result }) => toolMessage(toolCall, result)),
            researchProgress: toolCalls.map((call) => `Executed ${call.name}`),
            sourcesFound: sourcesFor(toolCalls)
        });
    });
}
