import { humanMessage, pendingToolCalls, toolMessage, type Checkpoint, type CheckpointStore, type LLMProvider, type Logger, type ThreadStatus, type Tool } from '@scholar/core';
import { GraphEngine, type EngineHooks, type RunResult } from '@scholar/engine';
import { resolveResearchConfig, type ResearchConfig, type ResearchConfigInput } from './config';
import { buildResearchGraph, type ResearchNodeName } from './graph';
import type { ApprovalDecision } from './nodes/approval';
import type { ResearchState } from './state';
import { researchTools } from './tools';

export interface ResearchAssistantOptions {
    llm: LLMProvider;
    store: CheckpointStore<ResearchState>;
    logger?: Logger;
    config?: ResearchConfigInput;
    /** Defaults to the built-in research tools. */
    tools?: readonly Tool[];
    hooks?: EngineHooks<ResearchState>;
}

export interface ResearchAssistant {
    readonly config: ResearchConfig;
    readonly engine: GraphEngine<ResearchState, ResearchNodeName>;
    ask(threadId: string, query: string): Promise<RunResult<ResearchState>>;
    approve(threadId: string): Promise<RunResult<ResearchState>>;
    reject(threadId: string): Promise<RunResult<ResearchState>>;
    cancel(threadId: string): boolean;
    getState(threadId: string): Promise<Checkpoint<ResearchState> | null>;
    getStatus(threadId: string): Promise<ThreadStatus>;
}

/**
 * Fields merged into the thread's state at the start of every question.
 * Tool calls left unanswered by a discarded suspension are closed first so
 * the history stays well formed for the model.
 */
export function createResearchInput(query: string, previous?: Readonly<ResearchState>): Partial<ResearchState> {
    const dangling = previous ? pendingToolCalls(previous.messages) : [];
    return {
        messages: [
            ...dangling.map((call) => toolMessage(call, `Tool ${call.name} skipped: superseded by a new question`)),
            humanMessage(query)
        ],
        researchQuery: query,
        researchProgress: ['Research started'],
        sourcesFound: [],
        requiresApproval: false,
        approvedByHuman: false,
        summary: null
    };
}

export function createResearchAssistant(options: ResearchAssistantOptions): ResearchAssistant {
    const config = resolveResearchConfig(options.config);
    const graph = buildResearchGraph({
        llm: options.llm,
        tools: options.tools ?? researchTools,
        config
    });

    const engine = new GraphEngine(graph, {
        store: options.store,
        maxSteps: config.maxSteps,
        ...(options.logger ? { logger: options.logger } : {}),
        ...(options.hooks ? { hooks: options.hooks } : {})
    });

    const decide = (threadId: string, decision: ApprovalDecision) => engine.resume(threadId, decision);

    return {
        config,
        engine,
        ask: (threadId, query) =>
            engine.runDerived(threadId, (previous) => createResearchInput(query, previous ?? undefined)),
        approve: (threadId) => decide(threadId, { approved: true }),
        reject: (threadId) => decide(threadId, { approved: false }),
        cancel: (threadId) => engine.cancel(threadId),
        getState: (threadId) => engine.getState(threadId),
        getStatus: (threadId) => engine.getStatus(threadId)
    };
}
