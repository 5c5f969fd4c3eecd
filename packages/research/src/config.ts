import { ENGINE_DEFAULTS, RESEARCH_DEFAULTS } from '@scholar/core';
import { DEFAULT_SUMMARY_PROMPT, DEFAULT_SYSTEM_PROMPT } from './prompts';

export interface ResearchConfigInput {
    /** Progress entries needed before a tool-less reply leads to the summary. */
    summarizeThreshold?: number;
    maxSteps?: number;
    /** Messages the model sees per call; the stored history is never cut. */
    maxHistoryMessages?: number;
    llmTimeoutMs?: number;
    toolTimeoutMs?: number;
    maxIdempotentRetries?: number;
    retryBaseDelayMs?: number;
    retryJitterMs?: number;
    /** nunjucks template; sees `query`, `progress` and `sources`. */
    systemPrompt?: string;
    /** nunjucks template; sees `query`, `progress` and `sources`. */
    summaryPrompt?: string;
}

export type ResearchConfig = Required<ResearchConfigInput>;

export function resolveResearchConfig(input: ResearchConfigInput = {}): ResearchConfig {
    const resolved: ResearchConfig = {
        summarizeThreshold   : input.summarizeThreshold   ?? RESEARCH_DEFAULTS.SUMMARIZE_THRESHOLD,
        maxSteps             : input.maxSteps             ?? ENGINE_DEFAULTS.MAX_STEPS,
        maxHistoryMessages   : input.maxHistoryMessages   ?? RESEARCH_DEFAULTS.MAX_HISTORY_MESSAGES,
        llmTimeoutMs         : input.llmTimeoutMs         ?? RESEARCH_DEFAULTS.LLM_TIMEOUT_MS,
        toolTimeoutMs        : input.toolTimeoutMs        ?? RESEARCH_DEFAULTS.TOOL_TIMEOUT_MS,
        maxIdempotentRetries : input.maxIdempotentRetries ?? RESEARCH_DEFAULTS.MAX_IDEMPOTENT_RETRIES,
        retryBaseDelayMs     : input.retryBaseDelayMs     ?? RESEARCH_DEFAULTS.RETRY_BASE_DELAY_MS,
        retryJitterMs        : input.retryJitterMs        ?? RESEARCH_DEFAULTS.RETRY_JITTER_MS,
        systemPrompt         : input.systemPrompt         ?? DEFAULT_SYSTEM_PROMPT,
        summaryPrompt        : input.summaryPrompt        ?? DEFAULT_SUMMARY_PROMPT
    };

    validateResearchConfig(resolved);
    return resolved;
}

function validateResearchConfig(config: ResearchConfig): void {
    const missing: string[] = [];
    const invalid: string[] = [];

    if (!config.systemPrompt.trim()) {
        missing.push('systemPrompt');
    }
    if (!config.summaryPrompt.trim()) {
        missing.push('summaryPrompt');
    }

    const mustBePositiveInteger: Array<{ key: string; value: number }> = [
        { key: 'maxSteps',           value: config.maxSteps           },
        { key: 'maxHistoryMessages', value: config.maxHistoryMessages },
        { key: 'llmTimeoutMs',       value: config.llmTimeoutMs       },
        { key: 'toolTimeoutMs',      value: config.toolTimeoutMs      },
        { key: 'retryBaseDelayMs',   value: config.retryBaseDelayMs   }
    ];
    for (const item of mustBePositiveInteger) {
        if (!Number.isInteger(item.value) || item.value <= 0) {
            invalid.push(item.key);
        }
    }

    const mustBeNonNegativeInteger: Array<{ key: string; value: number }> = [
        { key: 'summarizeThreshold',   value: config.summarizeThreshold   },
        { key: 'maxIdempotentRetries', value: config.maxIdempotentRetries },
        { key: 'retryJitterMs',        value: config.retryJitterMs        }
    ];
    for (const item of mustBeNonNegativeInteger) {
        if (!Number.isInteger(item.value) || item.value < 0) {
            invalid.push(item.key);
        }
    }

    if (missing.length > 0) {
        throw new Error(`Invalid research config: missing ${missing.join(', ')}`);
    }
    if (invalid.length > 0) {
        throw new Error(`Invalid research config: invalid ${invalid.join(', ')}`);
    }
}
