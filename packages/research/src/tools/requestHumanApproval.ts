import { z } from 'zod';
import { defineTool } from './defineTool';

export const HUMAN_APPROVAL_TOOL = 'request_human_approval';

export function formatApprovalResult(topic: string, approved: boolean): string {
    return `Human approval ${approved ? 'granted' : 'denied'} for topic: ${topic}`;
}

/**
 * Answered by the approval node, which suspends the run until a human decides.
 * The handler only runs when the tool is dispatched outside the graph.
 */
export const requestHumanApprovalTool = defineTool({
    name: HUMAN_APPROVAL_TOOL,
    description: 'Request human approval for sensitive research topics such as politics, controversies or personal information.',
    parameters: z.object({
        topic: z.string().min(1)
    }),
    handler: async ({ topic }) => `Human approval requested for topic: ${topic}`
});
