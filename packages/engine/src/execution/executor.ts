import { randomUUID } from 'node:crypto';

import {
    type CheckpointSaver,
    type Logger,
    type StateSnapshot,
    abortReason,
    errorMessage
} from '@helix/core';

import type { ChannelMap } from '../models/checkpoint';
import type { PregelNode } from './node';

const DEFAULT_MAX_STEPS = 50;

/**
 * Defines the structure and reducer behavior of the execution graph.
 */
export interface EngineGraphSpec<TState extends object, TContext extends object> {
    /** Map of state channels to their respective reducers. */
    channels: ChannelMap<TState>;

    /** Values of every channel before the first write. */
    initialState: () => TState;

    /** Map of node names to their execution handlers. */
    nodes: Record<string, PregelNode<TState, TContext>>;
}

export interface EngineExecutorConfig<TState> {
    threadId: string;
    saver: CheckpointSaver<TState>;
    entrypoint?: string;
    /** Checked before every super-step; an aborted signal fails the thread. */
    signal?: AbortSignal | undefined;
    logger?: Logger | undefined;
    /** Guard against cycles. */
    maxSteps?: number;
}

export class EngineExecutor<TState extends object, TContext extends object> {
    constructor(private readonly graph: EngineGraphSpec<TState, TContext>) { }

    /**
     * Invokes the execution graph for a given thread.
     * Resumes from the latest checkpoint if one exists.
     */
    public async invoke(
        input: Partial<TState>,
        context: TContext,
        config: EngineExecutorConfig<TState>
    ): Promise<StateSnapshot<TState>> {
        const { threadId, saver } = config;
        const logger = config.logger?.child({ threadId });
        const maxSteps = config.maxSteps ?? DEFAULT_MAX_STEPS;

        logger?.debug('Starting graph execution');

        let checkpoint = await saver.getCheckpoint(threadId);

        if (!checkpoint) {
            const firstNode = Object.keys(this.graph.nodes)[0];
            const startTasks = config.entrypoint ? [config.entrypoint] : firstNode ? [firstNode] : [];

            checkpoint = {
                checkpointId: randomUUID(),
                values: this.applyReducers(this.graph.initialState(), input),
                metadata: { step: 0, source: 'input', writes: {} },
                createdAt: new Date(),
                nextTasks: startTasks
            };
            await saver.putCheckpoint(threadId, checkpoint);
        } else {
            const values = Object.keys(input).length > 0
                ? this.applyReducers(checkpoint.values, input)
                : checkpoint.values;
            // An explicit entrypoint starts a new turn from that node, keeping values.
            checkpoint = {
                ...checkpoint,
                values,
                nextTasks: config.entrypoint ? [config.entrypoint] : checkpoint.nextTasks
            };
        }

        let current = checkpoint;
        let loopCount = 0;

        while (current.nextTasks.length > 0) {
            if (config.signal?.aborted) {
                const reason = abortReason(config.signal, `Graph execution cancelled for thread ${threadId}`);
                await this.putFailed(saver, threadId, current, reason.message);
                logger?.warn({ step: current.metadata.step }, 'Graph execution cancelled');
                throw reason;
            }

            if (loopCount++ >= maxSteps) {
                const message = `Graph Execution Error: Max steps (${maxSteps}) exceeded for thread ${threadId}`;
                await this.putFailed(saver, threadId, current, message);
                throw new Error(message);
            }

            const currentTasks = [...current.nextTasks];
            const writes: Partial<TState> = {};
            let dynamicNextTasks: string[] | undefined;

            logger?.trace({ step: loopCount, tasks: currentTasks }, 'Executing super-step');

            // Nodes receive a read-only snapshot of the current state.
            const snapshotContext = Object.assign({}, context, { state: Object.freeze({ ...current.values }) });

            try {
                await Promise.all(
                    currentTasks.map(async (taskName) => {
                        const nodeHandler = this.graph.nodes[taskName];
                        if (!nodeHandler) {
                            throw new Error(`Graph Execution Error: Node ${taskName} not found.`);
                        }

                        const result = await nodeHandler(snapshotContext);

                        Object.assign(writes, result.stateDiff);
                        if (result.nextTasks) {
                            dynamicNextTasks = [...(dynamicNextTasks ?? []), ...result.nextTasks];
                        }
                        logger?.trace({ node: taskName }, 'Node completed');
                    })
                );
            } catch (error) {
                // The failed step is recorded; values stay at the last committed barrier.
                await this.putFailed(saver, threadId, current, errorMessage(error));
                throw error;
            }

            const nextCheckpoint: StateSnapshot<TState> = {
                checkpointId: randomUUID(),
                parentCheckpointId: current.checkpointId,
                values: this.applyReducers(current.values, writes),
                metadata: {
                    step: current.metadata.step + 1,
                    source: 'loop',
                    writes
                },
                createdAt: new Date(),
                nextTasks: dynamicNextTasks ? [...new Set(dynamicNextTasks)] : []
            };

            await saver.putCheckpoint(threadId, nextCheckpoint);
            current = nextCheckpoint;
        }

        logger?.debug({ steps: loopCount }, 'Graph execution complete');
        return current;
    }

    private async putFailed(
        saver: CheckpointSaver<TState>,
        threadId: string,
        current: StateSnapshot<TState>,
        error: string
    ): Promise<void> {
        await saver.putCheckpoint(threadId, {
            checkpointId: randomUUID(),
            parentCheckpointId: current.checkpointId,
            values: current.values,
            metadata: { step: current.metadata.step + 1, source: 'failed', writes: {}, error },
            createdAt: new Date(),
            nextTasks: []
        });
    }

    private applyReducers(current: TState, writes: Partial<TState>): TState {
        const next: TState = { ...current };
        for (const key in writes) {
            const update: TState[typeof key] | undefined = writes[key];
            if (update === undefined) continue;
            next[key] = this.graph.channels[key](current[key], update);
        }
        return next;
    }
}
