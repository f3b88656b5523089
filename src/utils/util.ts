import { SyncCancelledError } from '../types/errors';

/**
 * Resolves after `ms`, or rejects with SyncCancelledError once `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(new SyncCancelledError());
    }
    if (ms <= 0) {
        return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
        const onAbort = () => {
            clearTimeout(timer);
            reject(new SyncCancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Exponential backoff: base * 2^(attempt-1), capped at maxDelayMs, with up to
 * 20% jitter subtracted so concurrent callers do not retry in lockstep.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, random: () => number = Math.random): number {
    const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, Math.max(0, attempt - 1)));
    return Math.floor(exponential * (1 - 0.2 * random()));
}

export function chunkArray<T>(items: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}

export function formatError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new SyncCancelledError();
    }
}
