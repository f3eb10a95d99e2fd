export type ReleaseLock = () => void;

/** FIFO mutex for async critical sections. */
export class AsyncMutex {
    private tail: Promise<void> = Promise.resolve();

    public async acquire(): Promise<ReleaseLock> {
        let release: ReleaseLock = () => undefined;
        const next = new Promise<void>((resolve) => {
            release = () => resolve();
        });
        const previous = this.tail;
        this.tail = previous.then(() => next);
        await previous;
        let released = false;
        return () => {
            if (released) {
                return;
            }
            released = true;
            release();
        };
    }

    public async runExclusive<T>(task: () => Promise<T>): Promise<T> {
        const release = await this.acquire();
        try {
            return await task();
        } finally {
            release();
        }
    }
}
