/**
 * Scripted outcomes for a fake collaborator. Queued values and errors are
 * consumed in order; once the queue is empty every call gets the fallback.
 */
export class OutcomeQueue<T> {
    private readonly queued: Array<T | Error> = [];

    public constructor(private readonly fallback: () => T) { }

    public push(...outcomes: Array<T | Error>): void {
        this.queued.push(...outcomes);
    }

    /** Queues `error` for the next `times` calls. */
    public failNext(error: Error, times = 1): void {
        for (let i = 0; i < times; i++) {
            this.queued.push(error);
        }
    }

    public next(): T {
        const outcome = this.queued.shift();
        if (outcome === undefined) return this.fallback();
        if (outcome instanceof Error) throw outcome;
        return outcome;
    }

    public get pending(): number {
        return this.queued.length;
    }
}
