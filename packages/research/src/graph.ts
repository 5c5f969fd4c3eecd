import { END, GraphBuilder, type GraphDefinition } from '@scholar/engine';
import { createAgentNode, createApprovalNode, createSummarizeNode, createToolsNode, type ResearchNodeDeps } from './nodes';
import { routeAfterAgent } from './router';
import { researchChannels, type ResearchState } from './state';

export type ResearchNodeName = 'agent' | 'tools' | 'approval' | 'summarize';

/**
 * agent -> { tools | approval | summarize }, tools -> agent,
 * approval -> agent, summarize -> END.
 */
export function buildResearchGraph(deps: ResearchNodeDeps): GraphDefinition<ResearchState, ResearchNodeName> {
    return new GraphBuilder<ResearchState, ResearchNodeName>(researchChannels)
        .addNode('agent', createAgentNode(deps))
        .addNode('tools', createToolsNode(deps))
        .addNode('approval', createApprovalNode(deps))
        .addNode('summarize', createSummarizeNode(deps))
        .setEntryPoint('agent')
        .addConditionalEdges('agent', routeAfterAgent(deps.config.summarizeThreshold), {
            tools: 'tools',
            approval: 'approval',
            summarize: 'summarize'
        })
        .addEdge('tools', 'agent')
        .addEdge('approval', 'agent')
        .addEdge('summarize', END)
        .compile();
}
