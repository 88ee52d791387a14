import { QueryTimeoutError } from "./errors.js";

/**
 * Races `work` against a timer. When the timer wins, `onTimeout` runs and the
 * returned promise rejects with `QueryTimeoutError`; a late settlement of
 * `work` is ignored.
 */
export function withTimeout<T>(work: Promise<T>, ms: number, onTimeout: () => void): Promise<T> {
    if (!Number.isFinite(ms)) {
        return work;
    }
    if (ms <= 0) {
        onTimeout();
        return Promise.race([work, Promise.reject(new QueryTimeoutError(0))]);
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            onTimeout();
            reject(new QueryTimeoutError(ms));
        }, ms);
    });

    return Promise.race([work, expired]).finally(() => clearTimeout(timer));
}
