/**
 * Promise-chained mutual exclusion for async critical sections.
 * Tasks run one at a time in submission order; a failing task does not
 * poison the chain for the tasks queued behind it.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
        this.pending++;
        const result = this.tail.then(() => task());
        this.tail = result.then(
            () => { this.pending--; },
            () => { this.pending--; }
        );
        return result;
    }

    /** Tasks queued or running */
    get queued(): number {
        return this.pending;
    }
}
