import { z } from 'zod';
import { pendingToolCalls, toolMessage, type Message, type ToolCall } from '@scholar/core';
import { defineNode, suspend, update } from '@scholar/engine';
import type { ResearchState } from '../state';
import { formatApprovalResult, HUMAN_APPROVAL_TOOL } from '../tools/requestHumanApproval';
import type { ResearchNodeDeps } from './types';
import { executeTools, sourcesFor } from './utils/executeTools';

const ApprovalDecisionSchema = z.object({
    approved: z.boolean()
});

export type ApprovalDecision = z.infer<typeof ApprovalDecisionSchema>;

function topicOf(call: ToolCall | undefined, fallback: string): string {
    const topic = call?.arguments['topic'];
    return typeof topic === 'string' && topic.trim() ? topic : fallback;
}

/**
 * approval
 *
 * First entry suspends the run with an `approval_request`. When resumed with
 * `{ approved }` it answers the approval calls and, if granted, runs the other
 * tool calls of the same assistant message.
 */
export function createApprovalNode(deps: ResearchNodeDeps) {
    return defineNode<ResearchState>(async ({ state, threadId, resume, logger }) => {
        const pending = pendingToolCalls(state.messages);
        const approvalCalls = pending.filter((call) => call.name === HUMAN_APPROVAL_TOOL);
        const otherCalls = pending.filter((call) => call.name !== HUMAN_APPROVAL_TOOL);
        const fallbackTopic = state.researchQuery || 'General research';

        if (!resume) {
            const topic = topicOf(approvalCalls[0], fallbackTopic);
            logger?.info({ topic }, 'Requesting human approval');
            return suspend({
                type: 'approval_request',
                topic,
                message: `The topic '${topic}' requires human approval before proceeding with research.`
            });
        }

        const decision = ApprovalDecisionSchema.safeParse(resume.value);
        if (!decision.success) {
            throw new Error(`Invalid approval decision: ${decision.error.message}`);
        }
        const { approved } = decision.data;
        logger?.info({ approved }, 'Human approval decided');

        const answers = new Map<string, string>();
        for (const call of approvalCalls) {
            answers.set(call.id, formatApprovalResult(topicOf(call, fallbackTopic), approved));
        }

        if (approved) {
            const results = await executeTools({
                toolCalls: otherCalls,
                tools: deps.tools,
                context: { threadId, logger },
                logger,
                config: deps.config
            });
            for (const { toolCall, result } of results) {
                answers.set(toolCall.id, result);
            }
        } else {
            for (const call of otherCalls) {
                answers.set(call.id, `Tool ${call.name} skipped: human approval denied`);
            }
        }

        const messages: Message[] = pending.map((call) => toolMessage(call, answers.get(call.id) ?? ''));

        return update<Partial<ResearchState>>({
            messages,
            requiresApproval: true,
            approvedByHuman: approved,
            researchProgress: [
                approved ? 'Approval granted' : 'Approval denied',
                ...(approved ? otherCalls.map((call) => `Executed ${call.name}`) : [])
            ],
            sourcesFound: approved ? sourcesFor(otherCalls) : []
        });
    });
}
