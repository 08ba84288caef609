import { DegradedModeError } from '../../types/errors.js';

export interface DeadlineOptions {
    signal?: AbortSignal;
    /** Upper bound independent of the signal; omit to rely on the signal alone */
    timeoutMs?: number;
    label: string;
}

/**
 * Settle with the work's outcome, or reject with a `timed_out`
 * DegradedModeError once the signal aborts or the timeout elapses. The work
 * itself keeps running; its late result is dropped.
 */
export function withDeadline<T>(start: () => Promise<T>, options: DeadlineOptions): Promise<T> {
    const { signal, timeoutMs, label } = options;
    if (signal?.aborted) {
        return Promise.reject(new DegradedModeError(`${label} skipped: deadline already passed`, 'timed_out'));
    }

    return new Promise<T>((resolve, reject) => {
        let timer: NodeJS.Timeout | undefined;
        const cleanup = (): void => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        };
        const fail = (reason: string): void => {
            cleanup();
            reject(new DegradedModeError(`${label} ${reason}`, 'timed_out'));
        };
        function onAbort(): void {
            fail('aborted at the request deadline');
        }

        signal?.addEventListener('abort', onAbort, { once: true });
        if (timeoutMs !== undefined) {
            timer = setTimeout(() => fail(`timed out after ${timeoutMs}ms`), timeoutMs);
        }
        let work: Promise<T>;
        try {
            work = start();
        } catch (err) {
            cleanup();
            reject(err);
            return;
        }
        work.then(
            value => {
                cleanup();
                resolve(value);
            },
            (err: unknown) => {
                cleanup();
                reject(err);
            }
        );
    });
}
