import { CancelledError, TimeoutError } from "./errors.js";
import { Logger } from "./logger.js";

export interface CallOptions {
    /** Milliseconds before the call fails with TimeoutError. */
    timeoutMs?: number | undefined;
    /** Aborting fails the call with CancelledError. */
    signal?: AbortSignal | undefined;
}

/**
 * Races `work` against a deadline and an abort signal.
 *
 * `onExpire` runs exactly once if the deadline or the signal fires first and
 * receives the still-pending work, so the caller can clean up whatever it
 * eventually produces.
 */
export function withDeadline<T>(
    work: Promise<T>,
    operation: string,
    options: CallOptions,
    onExpire: (pending: Promise<T>) => void
): Promise<T> {
    const { timeoutMs, signal } = options;
    if (timeoutMs === undefined && signal === undefined) return work;

    return new Promise<T>((resolve, reject) => {
        let settled = false;
        let timer: NodeJS.Timeout | undefined;

        const cleanup = () => {
            settled = true;
            if (timer !== undefined) clearTimeout(timer);
            signal?.removeEventListener("abort", onAbort);
        };
        const expire = (error: Error) => {
            if (settled) return;
            cleanup();
            onExpire(work);
            work.then(undefined, (late: unknown) => {
                Logger.debug(`${operation} failed after it was abandoned`, { error: late });
            });
            reject(error);
        };
        const onAbort = () => expire(new CancelledError(operation, signal?.reason));

        if (signal?.aborted) {
            onAbort();
            return;
        }
        signal?.addEventListener("abort", onAbort, { once: true });
        if (timeoutMs !== undefined) {
            timer = setTimeout(() => expire(new TimeoutError(operation, timeoutMs)), timeoutMs);
        }

        work.then(
            (value) => {
                if (settled) return;
                cleanup();
                resolve(value);
            },
            (error: unknown) => {
                if (settled) return;
                cleanup();
                reject(error);
            }
        );
    });
}
