import type { LLMProvider, Tool } from '@scholar/core';
import type { ResearchConfig } from '../config';

export interface ResearchNodeDeps {
    llm: LLMProvider;
    tools: readonly Tool[];
    config: ResearchConfig;
}
