/**
 * Serializes async tasks per key. Tasks for the same thread id run one after
 * another in call order; tasks for different keys never wait on each other.
 */
export class ThreadLock {
    private readonly tails = new Map<string, Promise<void>>();

    public async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(task);
        const tail = result.then(() => undefined, () => undefined);
        this.tails.set(key, tail);

        try {
            return await result;
        } finally {
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    public isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
