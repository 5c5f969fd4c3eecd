import { randomUUID } from 'node:crypto';
import {
    ENGINE_DEFAULTS,
    type Checkpoint,
    type CheckpointStore,
    type InterruptPayload,
    type JsonValue,
    type Logger,
    type NodeResult,
    type ThreadStatus
} from '@scholar/core';

import { END, type GraphDefinition } from '../graph/builder';
import { resolveNextNode } from '../graph/router';
import {
    EngineError,
    GraphDefinitionError,
    NodeInvocationError,
    RecursionLimitError,
    ResumeMismatchError,
    StoreUnavailableError
} from '../errors';
import type { ResumeInput } from './node';
import { ThreadLock } from './threadLock';

export interface EngineHooks<TState> {
    onNodeStart?(event: { threadId: string; node: string; step: number }): void;
    onNodeEnd?(event: { threadId: string; node: string; step: number; state: Readonly<TState>; suspended: boolean; durationMs: number }): void;
    onNodeError?(event: { threadId: string; node: string; error: unknown }): void;
}

export interface GraphEngineOptions<TState> {
    store: CheckpointStore<TState>;
    logger?: Logger;
    /** Supersteps allowed per `run`/`resume` call. */
    maxSteps?: number;
    hooks?: EngineHooks<TState>;
}

export interface RunOptions<TNode extends string> {
    /** Node to start from instead of the graph's entry point. */
    entryNode?: TNode;
}

export type RunResult<TState> =
    | { status: 'completed'; threadId: string; state: TState; checkpoint: Checkpoint<TState> }
    | { status: 'suspended'; threadId: string; state: TState; interrupt: InterruptPayload; checkpoint: Checkpoint<TState> }
    | { status: 'failed'; threadId: string; state: TState; error: Error; lastCompletedNode: string | null; checkpoint: Checkpoint<TState> | null };

type CheckpointFields<TState> = Pick<
    Checkpoint<TState>,
    'values' | 'status' | 'nextNode' | 'pendingInterrupt' | 'error' | 'source' | 'writes'
>;

/** Mutable bookkeeping for one run/resume call. */
interface Execution<TState> {
    threadId: string;
    logger: Logger | undefined;
    checkpoint: Checkpoint<TState> | null;
    values: TState;
    lastCompletedNode: string | null;
    signal: CancelSignal;
}

interface CancelSignal {
    cancelled: boolean;
}

/**
 * Drives a compiled graph one superstep at a time: invoke the active node,
 * merge its update through the reducers, route, checkpoint. A node that
 * suspends ends the call with a durable pending interrupt that `resume`
 * picks up later, from this process or another one reading the same store.
 *
 * Calls for one thread id are serialized; different threads run independently.
 */
export class GraphEngine<TState extends object, TNode extends string = string> {
    private readonly locks = new ThreadLock();
    private readonly active = new Map<string, CancelSignal>();
    private readonly maxSteps: number;

    constructor(
        private readonly graph: GraphDefinition<TState, TNode>,
        private readonly options: GraphEngineOptions<TState>
    ) {
        this.maxSteps = options.maxSteps ?? ENGINE_DEFAULTS.MAX_STEPS;
    }

    /**
     * Starts a new turn on a thread: merges `input` into the thread's state
     * (or a fresh state) and runs from the entry node.
     */
    public async run(threadId: string, input: Partial<TState>, options: RunOptions<TNode> = {}): Promise<RunResult<TState>> {
        return this.runDerived(threadId, () => input, options);
    }

    /**
     * Like `run`, but builds the input from the thread's latest state while
     * holding the thread's lock, so no other call can land in between.
     */
    public async runDerived(
        threadId: string,
        deriveInput: (previous: Readonly<TState> | null) => Partial<TState>,
        options: RunOptions<TNode> = {}
    ): Promise<RunResult<TState>> {
        return this.locks.runExclusive(threadId, async () => {
            const signal = this.track(threadId);
            try {
                const previous = await this.load(threadId);
                const execution = this.begin(threadId, previous, signal);
                const entryNode = options.entryNode ?? this.graph.entryNode;

                execution.logger?.debug({ entryNode, resumedFromStep: previous?.step ?? null }, 'Starting graph run');
                if (previous?.pendingInterrupt) {
                    execution.logger?.warn({ node: previous.pendingInterrupt.node }, 'Discarding pending interrupt for new run');
                }

                try {
                    if (!this.graph.hasNode(entryNode)) {
                        throw new GraphDefinitionError(`entry node '${entryNode}' is not registered`);
                    }
                    const input = deriveInput(previous?.values ?? null);
                    execution.values = this.graph.reducers.apply(execution.values, input);
                    await this.persist(execution, {
                        values: execution.values,
                        status: 'running',
                        nextNode: entryNode,
                        pendingInterrupt: null,
                        error: null,
                        source: 'input',
                        writes: Object.keys(input)
                    });
                    return await this.loop(execution, entryNode, undefined);
                } catch (error) {
                    return await this.fail(execution, error);
                }
            } finally {
                this.active.delete(threadId);
            }
        });
    }

    /**
     * Re-enters the node that suspended, handing it `decision`. Fails with
     * `ResumeMismatchError`, leaving the checkpoint untouched, when the thread
     * has nothing pending or the pending node is no longer part of the graph.
     */
    public async resume(threadId: string, decision: JsonValue): Promise<RunResult<TState>> {
        return this.locks.runExclusive(threadId, async () => {
            const signal = this.track(threadId);
            try {
                const previous = await this.load(threadId);
                if (!previous) {
                    throw new ResumeMismatchError(threadId, 'no checkpoint found');
                }
                const pending = previous.pendingInterrupt;
                if (!pending) {
                    throw new ResumeMismatchError(threadId, `no pending interrupt (status: ${previous.status})`);
                }
                const node = pending.node;
                if (!this.graph.hasNode(node)) {
                    throw new ResumeMismatchError(threadId, `pending node '${node}' is not part of the graph`);
                }

                const execution = this.begin(threadId, previous, signal);
                execution.logger?.debug({ node, reason: pending.reason, step: previous.step }, 'Resuming graph run');

                try {
                    const resume = pending.reason === 'interrupt' ? { value: decision } : undefined;
                    return await this.loop(execution, node, resume);
                } catch (error) {
                    return await this.fail(execution, error);
                }
            } finally {
                this.active.delete(threadId);
            }
        });
    }

    /**
     * Asks the call currently holding the thread's lock to stop at the next
     * superstep boundary, including one still loading its checkpoint. The
     * thread is left suspended on the node that would have run next. Calls
     * queued behind it are not affected.
     */
    public cancel(threadId: string): boolean {
        const signal = this.active.get(threadId);
        if (!signal) return false;
        signal.cancelled = true;
        this.options.logger?.info({ threadId }, 'Cancellation requested');
        return true;
    }

    public async getState(threadId: string): Promise<Checkpoint<TState> | null> {
        return this.load(threadId);
    }

    public async getStatus(threadId: string): Promise<ThreadStatus> {
        const checkpoint = await this.load(threadId);
        return checkpoint?.status ?? 'idle';
    }

    private track(threadId: string): CancelSignal {
        const signal: CancelSignal = { cancelled: false };
        this.active.set(threadId, signal);
        return signal;
    }

    private begin(threadId: string, previous: Checkpoint<TState> | null, signal: CancelSignal): Execution<TState> {
        return {
            threadId,
            logger: this.options.logger?.child({ threadId }),
            checkpoint: previous,
            values: previous?.values ?? this.graph.reducers.initialState(),
            lastCompletedNode: previous?.lastCompletedNode ?? null,
            signal
        };
    }

    /** The superstep loop. */
    private async loop(execution: Execution<TState>, startNode: TNode, startResume: ResumeInput | undefined): Promise<RunResult<TState>> {
        const { threadId, logger } = execution;
        const hooks = this.options.hooks;
        let node = startNode;
        let resume = startResume;
        let steps = 0;

        for (;;) {
            if (execution.signal.cancelled) {
                const interrupt: InterruptPayload = { node, reason: 'cancelled', value: null };
                const checkpoint = await this.persist(execution, {
                    values: execution.values,
                    status: 'suspended',
                    nextNode: node,
                    pendingInterrupt: interrupt,
                    error: null,
                    source: 'cancel',
                    writes: []
                });
                logger?.warn({ node, step: checkpoint.step }, 'Graph execution cancelled');
                return { status: 'suspended', threadId, state: checkpoint.values, interrupt, checkpoint };
            }

            if (steps >= this.maxSteps) {
                throw new RecursionLimitError(threadId, this.maxSteps);
            }
            steps += 1;

            const step = execution.checkpoint?.step ?? 0;
            logger?.trace({ node, step }, 'Executing superstep');
            hooks?.onNodeStart?.({ threadId, node, step });

            const startedAt = Date.now();
            const result = await this.invoke(execution, node, step, resume);

            if (result.type === 'suspend') {
                const interrupt: InterruptPayload = { node, reason: 'interrupt', value: result.value };
                const checkpoint = await this.persist(execution, {
                    values: execution.values,
                    status: 'suspended',
                    nextNode: node,
                    pendingInterrupt: interrupt,
                    error: null,
                    source: 'interrupt',
                    writes: []
                });
                hooks?.onNodeEnd?.({ threadId, node, step, state: checkpoint.values, suspended: true, durationMs: Date.now() - startedAt });
                logger?.warn({ node, step: checkpoint.step }, 'Graph execution interrupted');
                return { status: 'suspended', threadId, state: checkpoint.values, interrupt, checkpoint };
            }

            const values = this.graph.reducers.apply(execution.values, result.update);
            const next = resolveNextNode(this.graph, node, values);
            const completed = next === END;

            const checkpoint = await this.persist(execution, {
                values,
                status: completed ? 'completed' : 'running',
                nextNode: completed ? null : next,
                pendingInterrupt: null,
                error: null,
                source: 'loop',
                writes: Object.keys(result.update)
            }, node);
            execution.values = values;
            execution.lastCompletedNode = node;
            hooks?.onNodeEnd?.({ threadId, node, step, state: checkpoint.values, suspended: false, durationMs: Date.now() - startedAt });

            if (next === END) {
                logger?.debug({ steps, step: checkpoint.step }, 'Graph execution complete');
                return { status: 'completed', threadId, state: checkpoint.values, checkpoint };
            }

            node = next;
            resume = undefined;
        }
    }

    private async invoke(
        execution: Execution<TState>,
        node: TNode,
        step: number,
        resume: ResumeInput | undefined
    ): Promise<NodeResult<Partial<TState>>> {
        const handler = this.graph.nodes.get(node);
        if (!handler) {
            throw new GraphDefinitionError(`node '${node}' is not registered`);
        }

        try {
            return await handler({
                state: Object.freeze(structuredClone(execution.values)),
                threadId: execution.threadId,
                step,
                ...(resume ? { resume } : {}),
                ...(execution.logger ? { logger: execution.logger.child({ node }) } : {})
            });
        } catch (error) {
            this.options.hooks?.onNodeError?.({ threadId: execution.threadId, node, error });
            if (error instanceof EngineError) {
                throw error;
            }
            throw new NodeInvocationError(node, error);
        }
    }

    /**
     * Records the failure next to the last good state. A store that cannot
     * take the failure record either is logged; the caller still gets the error.
     */
    private async fail(execution: Execution<TState>, cause: unknown): Promise<RunResult<TState>> {
        const error = cause instanceof Error ? cause : new Error(String(cause));
        const { threadId, logger } = execution;

        logger?.error({ err: error, lastCompletedNode: execution.lastCompletedNode }, 'Graph execution failed');

        let checkpoint: Checkpoint<TState> | null = null;
        try {
            checkpoint = await this.persist(execution, {
                values: execution.values,
                status: 'failed',
                nextNode: null,
                pendingInterrupt: null,
                error: { name: error.name, message: error.message },
                source: 'error',
                writes: []
            });
        } catch (persistError) {
            logger?.error({ err: persistError }, 'Could not record failed checkpoint');
        }

        return {
            status: 'failed',
            threadId,
            state: execution.values,
            error,
            lastCompletedNode: execution.lastCompletedNode,
            checkpoint
        };
    }

    private async persist(execution: Execution<TState>, fields: CheckpointFields<TState>, completedNode?: string): Promise<Checkpoint<TState>> {
        const parent = execution.checkpoint;
        const checkpoint: Checkpoint<TState> = {
            threadId: execution.threadId,
            checkpointId: randomUUID(),
            parentCheckpointId: parent?.checkpointId ?? null,
            step: parent ? parent.step + 1 : 0,
            lastCompletedNode: completedNode ?? execution.lastCompletedNode,
            createdAt: new Date().toISOString(),
            ...fields
        };

        try {
            await this.options.store.put(checkpoint);
        } catch (error) {
            throw new StoreUnavailableError(execution.threadId, error);
        }
        execution.checkpoint = checkpoint;
        return checkpoint;
    }

    private async load(threadId: string): Promise<Checkpoint<TState> | null> {
        try {
            return await this.options.store.get(threadId);
        } catch (error) {
            throw new StoreUnavailableError(threadId, error);
        }
    }
}
