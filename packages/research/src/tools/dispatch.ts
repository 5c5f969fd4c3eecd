import type { z } from 'zod';
import {
    retryIdempotent,
    withTimeout,
    type Tool,
    type ToolCall,
    type ToolContext,
    type ToolLifecycleResult
} from '@scholar/core';

export interface ToolRetryPolicy {
    maxRetries: number;
    baseDelayMs: number;
    jitterMs: number;
}

interface ExecuteToolLifecycleInput<TParameters extends z.ZodTypeAny> {
    tool: Tool<TParameters>;
    params: z.infer<TParameters>;
    context: ToolContext;
    /** Applies to each attempt. */
    timeoutMs?: number | undefined;
    retry?: ToolRetryPolicy | undefined;
}

function formatToolFailure(toolName: string, error: unknown): string {
    const reason = error instanceof Error ? error.message : String(error);
    return `Tool ${toolName} failed: ${reason}`;
}

/**
 * Runs a tool handler, turning thrown errors and timeouts into a
 * `recoverable_error` the model can read. Transient failures are retried
 * when a retry policy is given.
 */
export async function executeToolLifecycle<TParameters extends z.ZodTypeAny>(
    input: ExecuteToolLifecycleInput<TParameters>
): Promise<ToolLifecycleResult> {
    const { timeoutMs, retry } = input;
    const attempt = (): Promise<string> => {
        const call = () => input.tool.handler(input.params, input.context);
        return timeoutMs === undefined
            ? call()
            : withTimeout({ timeoutMs, label: `Tool ${input.tool.name}`, run: call });
    };

    try {
        const result = retry
            ? await retryIdempotent({ ...retry, run: attempt })
            : await attempt();
        return { status: 'ok', result };
    } catch (error) {
        return {
            status: 'recoverable_error',
            formatted: formatToolFailure(input.tool.name, error)
        };
    }
}

interface DispatchToolCallInput {
    toolCall: ToolCall;
    tools: readonly Tool[];
    context: ToolContext;
    timeoutMs?: number | undefined;
    retry?: ToolRetryPolicy | undefined;
}

export async function dispatchToolCall(input: DispatchToolCallInput): Promise<ToolLifecycleResult> {
    const tool = input.tools.find((candidate) => candidate.name === input.toolCall.name);
    if (!tool) {
        return {
            status: 'recoverable_error',
            formatted: `Tool ${input.toolCall.name} failed: tool not found`
        };
    }

    const parsed = tool.parameters.safeParse(input.toolCall.arguments);
    if (!parsed.success) {
        return {
            status: 'recoverable_error',
            formatted: `Invalid tool params for ${input.toolCall.name}: ${parsed.error.message}`
        };
    }

    return executeToolLifecycle({
        tool,
        params: parsed.data,
        context: input.context,
        timeoutMs: input.timeoutMs,
        retry: input.retry
    });
}
