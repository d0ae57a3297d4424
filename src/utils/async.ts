/**
 * Timing helpers shared by the reconnect loop and the singleton takeover.
 */

/**
 * Exponential backoff: `baseMs * 2^attempt`, capped at `maxMs`.
 */
export function computeBackoffDelay(
    attempt: number,
    baseMs: number,
    maxMs: number
): number {
    if (baseMs <= 0) throw new Error("Backoff base delay must be positive");
    const exponent = Math.max(0, Math.floor(attempt));
    // 2^31 already exceeds any sane cap; avoid Infinity arithmetic.
    const factor = exponent >= 31 ? Number.MAX_SAFE_INTEGER : 2 ** exponent;
    return Math.min(baseMs * factor, maxMs);
}

/**
 * Resolves `true` after `ms`, or `false` as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
        return Promise.resolve(false);
    }

    return new Promise((resolve) => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve(false);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve(true);
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

/**
 * Polls `predicate` every `intervalMs` until it returns true or `timeoutMs` elapses.
 */
export async function waitFor(
    predicate: () => boolean,
    timeoutMs: number,
    intervalMs: number
): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (!predicate()) {
        if (Date.now() >= deadline) {
            return false;
        }
        await sleep(intervalMs);
    }
    return true;
}
