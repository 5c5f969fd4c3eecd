import type { JsonValue } from '../entities/session';

export type ThreadStatus = 'idle' | 'running' | 'suspended' | 'completed' | 'failed';

export type CheckpointStatus = Exclude<ThreadStatus, 'idle'>;

/**
 * Data a suspended run is waiting on. `node` is re-entered on resume.
 * Runs cancelled between supersteps are recorded with reason `cancelled`
 * and a null value.
 */
export interface InterruptPayload {
    node: string;
    reason: 'interrupt' | 'cancelled';
    value: JsonValue;
}

export interface CheckpointError {
    name: string;
    message: string;
}

/**
 * Latest durable snapshot of a thread. One record per thread; every `put`
 * supersedes the previous one.
 */
export interface Checkpoint<TState = Record<string, unknown>> {
    threadId: string;
    checkpointId: string;
    parentCheckpointId: string | null;
    /** Strictly increasing per thread. */
    step: number;
    values: TState;
    status: CheckpointStatus;
    nextNode: string | null;
    lastCompletedNode: string | null;
    pendingInterrupt: InterruptPayload | null;
    error: CheckpointError | null;
    source: 'input' | 'loop' | 'interrupt' | 'cancel' | 'error';
    /** State fields written by the superstep that produced this checkpoint. */
    writes: string[];
    /** ISO-8601 timestamp. */
    createdAt: string;
}

export interface CheckpointStore<TState = Record<string, unknown>> {
    get(threadId: string): Promise<Checkpoint<TState> | null>;
    put(checkpoint: Checkpoint<TState>): Promise<void>;
}
