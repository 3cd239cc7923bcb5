/**
 * Serializes async work per key (a destination file path). Work for one key
 * runs strictly in submission order; different keys never wait on each other.
 */
export class KeyedWriteLock {
    private readonly queues = new Map<string, Promise<void>>();

    public async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.queues.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.queues.set(key, tail);

        await previous;
        try {
            return await task();
        } finally {
            release();
            if (this.queues.get(key) === tail) {
                this.queues.delete(key);
            }
        }
    }

    /** Resolves once every task queued so far, on every key, has settled. */
    public async drain(): Promise<void> {
        await Promise.all(Array.from(this.queues.values()));
    }
}
