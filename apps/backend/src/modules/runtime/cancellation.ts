/**
 * Resolves `true` after `ms`, or `false` as soon as `signal` aborts.
 * Never rejects, so callers can treat an abort as an ordinary outcome.
 */
export function cancellableDelay(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
        return Promise.resolve(false);
    }
    const safeMs = Number.isFinite(ms) && ms > 0 ? Math.floor(ms) : 0;
    return new Promise<boolean>((resolve) => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve(false);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve(true);
        }, safeMs);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export async function withTimeout<T>(task: Promise<T>, timeoutMs: number): Promise<T | 'timeout'> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });
    try {
        return await Promise.race([task, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
