import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { JsonValueSchema, type Checkpoint, type CheckpointStore } from '@scholar/core';

export interface FileCheckpointSaverOptions<TState> {
    /** Directory holding one `<threadId>.json` file per thread. */
    directory: string;
    /** Validates `values` when a checkpoint is read back. */
    stateSchema: z.ZodType<TState, z.ZodTypeDef, unknown>;
}

const CheckpointEnvelopeSchema = z.object({
    threadId: z.string(),
    checkpointId: z.string(),
    parentCheckpointId: z.string().nullable(),
    step: z.number().int().nonnegative(),
    values: z.unknown(),
    status: z.enum(['running', 'suspended', 'completed', 'failed']),
    nextNode: z.string().nullable(),
    lastCompletedNode: z.string().nullable(),
    pendingInterrupt: z.object({
        node: z.string(),
        reason: z.enum(['interrupt', 'cancelled']),
        value: JsonValueSchema
    }).nullable(),
    error: z.object({ name: z.string(), message: z.string() }).nullable(),
    source: z.enum(['input', 'loop', 'interrupt', 'cancel', 'error']),
    writes: z.array(z.string()),
    createdAt: z.string()
});

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Durable checkpoint saver writing one JSON document per thread.
 *
 * Writes go to a unique temp file that is then renamed over the thread's
 * file, so a failed write leaves the previous checkpoint intact.
 */
export class FileCheckpointSaver<TState> implements CheckpointStore<TState> {
    constructor(private readonly options: FileCheckpointSaverOptions<TState>) { }

    public async put(checkpoint: Checkpoint<TState>): Promise<void> {
        await mkdir(this.options.directory, { recursive: true });

        const filePath = this.pathFor(checkpoint.threadId);
        const tmpPath = `${filePath}.${randomUUID()}.tmp`;
        try {
            await writeFile(tmpPath, JSON.stringify(checkpoint), 'utf8');
            await rename(tmpPath, filePath);
        } catch (error) {
            await unlink(tmpPath).catch(() => undefined);
            throw error;
        }
    }

    public async get(threadId: string): Promise<Checkpoint<TState> | null> {
        let raw: string;
        try {
            raw = await readFile(this.pathFor(threadId), 'utf8');
        } catch (error) {
            if (isMissingFile(error)) return null;
            throw error;
        }

        const envelope = CheckpointEnvelopeSchema.safeParse(JSON.parse(raw));
        if (!envelope.success) {
            throw new Error(`Corrupt checkpoint for thread ${threadId}: ${envelope.error.message}`);
        }
        const values = this.options.stateSchema.safeParse(envelope.data.values);
        if (!values.success) {
            throw new Error(`Corrupt checkpoint state for thread ${threadId}: ${values.error.message}`);
        }
        return { ...envelope.data, values: values.data };
    }

    private pathFor(threadId: string): string {
        return join(this.options.directory, `${encodeURIComponent(threadId)}.json`);
    }
}
