import { retryIdempotent, withTimeout, type LLMCompleteOptions, type LLMProvider, type LLMResponse, type Logger } from '@scholar/core';
import type { ResearchConfig } from '../../config';

export interface CompleteWithRetryOptions {
    llm: LLMProvider;
    request: LLMCompleteOptions;
    config: Pick<ResearchConfig, 'llmTimeoutMs' | 'maxIdempotentRetries' | 'retryBaseDelayMs' | 'retryJitterMs'>;
    logger?: Logger | undefined;
}

export async function completeWithRetry(options: CompleteWithRetryOptions): Promise<LLMResponse> {
    const { llm, request, config, logger } = options;

    return withTimeout({
        timeoutMs: config.llmTimeoutMs,
        label: 'LLM complete',
        run: () => retryIdempotent({
            maxRetries: config.maxIdempotentRetries,
            baseDelayMs: config.retryBaseDelayMs,
            jitterMs: config.retryJitterMs,
            onRetry: ({ attempt, delayMs, error }) => {
                logger?.warn({ attempt, delayMs, err: error }, 'Retrying LLM completion');
            },
            run: () => llm.complete(request)
        })
    });
}
