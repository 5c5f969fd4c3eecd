import type { Checkpoint, CheckpointStore } from '@scholar/core';

/**
 * An in-memory checkpoint saver.
 * Useful for tests and short-lived sessions that need no durability.
 *
 * Keeps the latest checkpoint per thread. Records are deep-copied on the way
 * in and out so callers never alias stored state.
 */
export class MemoryCheckpointSaver<TState = Record<string, unknown>> implements CheckpointStore<TState> {
    protected readonly checkpoints = new Map<string, Checkpoint<TState>>();

    public async put(checkpoint: Checkpoint<TState>): Promise<void> {
        this.checkpoints.set(checkpoint.threadId, structuredClone(checkpoint));
    }

    public async get(threadId: string): Promise<Checkpoint<TState> | null> {
        const checkpoint = this.checkpoints.get(threadId);
        return checkpoint ? structuredClone(checkpoint) : null;
    }

    public threadIds(): string[] {
        return [...this.checkpoints.keys()];
    }
}
