import type { Logger, Tool, ToolCall, ToolContext } from '@scholar/core';
import type { ResearchConfig } from '../../config';
import { dispatchToolCall } from '../../tools/dispatch';

export interface ExecuteToolsOptions {
    toolCalls: readonly ToolCall[];
    tools: readonly Tool[];
    context: ToolContext;
    logger?: Logger | undefined;
    config: Pick<ResearchConfig, 'toolTimeoutMs' | 'maxIdempotentRetries' | 'retryBaseDelayMs' | 'retryJitterMs'>;
}

export type ToolResult = { toolCall: ToolCall; result: string; ok: boolean };

/**
 * Shared helper to execute a list of model tool calls in order.
 * Every call yields a result; timeouts and handler errors come back as text.
 */
export async function executeTools(options: ExecuteToolsOptions): Promise<ToolResult[]> {
    const { toolCalls, tools, context, logger, config } = options;
    const toolResults: ToolResult[] = [];

    for (const toolCall of toolCalls) {
        const result = await dispatchToolCall({
            toolCall,
            tools,
            context,
            timeoutMs: config.toolTimeoutMs,
            retry: {
                maxRetries: config.maxIdempotentRetries,
                baseDelayMs: config.retryBaseDelayMs,
                jitterMs: config.retryJitterMs
            }
        });

        logger?.debug({
            toolCallId: toolCall.id,
            toolName: toolCall.name,
            status: result.status
        }, 'Tool execution completed');

        toolResults.push({
            toolCall,
            result: result.status === 'ok' ? result.result : result.formatted,
            ok: result.status === 'ok'
        });
    }

    return toolResults;
}

const SOURCE_ARGUMENTS: Readonly<Record<string, string>> = {
    web_search: 'query',
    document_lookup: 'document_id'
};

/** `"<tool>: <argument>"` for every call that consults a source. */
export function sourcesFor(toolCalls: readonly ToolCall[]): string[] {
    const sources: string[] = [];
    for (const call of toolCalls) {
        const argumentName = SOURCE_ARGUMENTS[call.name];
        const value = argumentName === undefined ? undefined : call.arguments[argumentName];
        if (typeof value === 'string') {
            sources.push(`${call.name}: ${value}`);
        }
    }
    return sources;
}
