import type { Router } from '@scholar/engine';
import type { ResearchState } from './state';
import { HUMAN_APPROVAL_TOOL } from './tools/requestHumanApproval';

export type AgentRoute = 'tools' | 'approval' | 'summarize';

/**
 * Routing after the agent node, as a pure function of state:
 * tool calls go to `tools`, or to `approval` when any of them asks for it;
 * without tool calls the run is summarized once progress exceeds `summarizeThreshold`.
 */
export function routeAfterAgent(summarizeThreshold: number): Router<ResearchState, AgentRoute> {
    return (state) => {
        const last = state.messages[state.messages.length - 1];

        if (last?.role === 'assistant' && last.toolCalls.length > 0) {
            return last.toolCalls.some((call) => call.name === HUMAN_APPROVAL_TOOL) ? 'approval' : 'tools';
        }

        return state.researchProgress.length > summarizeThreshold ? 'summarize' : 'tools';
    };
}
