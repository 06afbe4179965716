import { type StateSnapshot, type CheckpointSaver } from '@helix/core';

export interface MemoryCheckpointSaverOptions {
    /** Threads kept before the least recently written one is evicted. */
    maxThreads?: number;
}

const DEFAULT_MAX_THREADS = 100;

/**
 * In-memory checkpoint saver. Each pipeline run is one thread; only the most
 * recently written `maxThreads` threads keep their history.
 */
export class MemoryCheckpointSaver<TState = Record<string, unknown>> implements CheckpointSaver<TState> {
    private readonly threads = new Map<string, StateSnapshot<TState>[]>();
    private readonly maxThreads: number;

    public constructor(options: MemoryCheckpointSaverOptions = {}) {
        this.maxThreads = Math.max(1, options.maxThreads ?? DEFAULT_MAX_THREADS);
    }

    public async putCheckpoint(threadId: string, snapshot: StateSnapshot<TState>): Promise<void> {
        const history = this.threads.get(threadId) ?? [];
        history.push(snapshot);
        // Re-inserting moves the thread to the end of the eviction order.
        this.threads.delete(threadId);
        this.threads.set(threadId, history);

        for (const oldest of this.threads.keys()) {
            if (this.threads.size <= this.maxThreads) break;
            this.threads.delete(oldest);
        }
    }

    public async getCheckpoint(threadId: string): Promise<StateSnapshot<TState> | null> {
        return this.threads.get(threadId)?.at(-1) ?? null;
    }

    public async getCheckpointHistory(threadId: string): Promise<StateSnapshot<TState>[]> {
        return [...(this.threads.get(threadId) ?? [])];
    }

    /** Thread ids with stored history, least recently written first. */
    public threadIds(): string[] {
        return [...this.threads.keys()];
    }

    public clear(threadId: string): void {
        this.threads.delete(threadId);
    }
}
