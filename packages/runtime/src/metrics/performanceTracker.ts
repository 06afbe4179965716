import { randomUUID } from 'node:crypto';

import {
  type ExecutionRecord,
  type ExecutionSummary,
  type Logger,
  type PricingConfig,
  type RecordStore,
  METRICS_DEFAULTS,
  PRICING_DEFAULTS,
  errorMessage,
  executionRecordSchema
} from '@helix/core';

import { estimateCost, summarizeExecutions } from './summarize';

/** Key of the export document in the metrics record store. */
export const METRICS_EXPORT_KEY = 'metrics-export';

export interface ExecutionUsage {
  tokensIn?: number;
  tokensOut?: number;
  model?: string;
  toolCalls?: string[];
}

export interface EndExecutionInput extends ExecutionUsage {
  executionId: string;
  success: boolean;
  error?: string | null;
}

export type MetricsExport = {
  exportedAt: string;
  summary: ExecutionSummary;
  records: ExecutionRecord[];
};

export interface PerformanceTrackerOptions {
  logger: Logger;
  records?: RecordStore | undefined;
  pricing?: PricingConfig;
  defaultModel?: string;
  /** Finished records older than this leave memory once persisted (or at once without a store). */
  retentionMs?: number;
  now?: () => number;
  createId?: () => string;
}

interface ActiveExecution {
  stageName: string;
  startedAt: number;
}

/**
 * Records one ExecutionRecord per stage attempt and aggregates them. Records
 * are immutable once finalized; persistence happens on export.
 */
export class PerformanceTracker {
  private readonly active = new Map<string, ActiveExecution>();
  private finished: ExecutionRecord[] = [];
  private readonly persisted = new Set<string>();
  private readonly logger: Logger;
  private readonly store: RecordStore | undefined;
  private readonly pricing: PricingConfig;
  private readonly defaultModel: string;
  private readonly retentionMs: number;
  private readonly now: () => number;
  private readonly createId: () => string;

  public constructor(options: PerformanceTrackerOptions) {
    this.logger = options.logger.child({ component: 'performance-tracker' });
    this.store = options.records;
    this.pricing = options.pricing ?? {
      defaultRate: { ...PRICING_DEFAULTS.DEFAULT_RATE },
      models: { ...PRICING_DEFAULTS.MODELS }
    };
    this.defaultModel = options.defaultModel ?? PRICING_DEFAULTS.DEFAULT_MODEL;
    this.retentionMs = options.retentionMs ?? METRICS_DEFAULTS.RETENTION_MS;
    this.now = options.now ?? Date.now;
    this.createId = options.createId ?? randomUUID;
  }

  /** Loads previously exported records so summaries span restarts. */
  public async start(): Promise<void> {
    if (!this.store) return;

    const known = new Set(this.finished.map((record) => record.executionId));
    for (const key of await this.store.list()) {
      if (key === METRICS_EXPORT_KEY || known.has(key)) continue;

      const parsed = executionRecordSchema.safeParse(await this.store.get(key));
      if (!parsed.success) {
        this.logger.warn({ key }, 'Skipping unreadable execution record');
        continue;
      }
      Object.freeze(parsed.data.toolCalls);
      this.finished.push(Object.freeze(parsed.data));
      this.persisted.add(key);
    }
    this.finished.sort((a, b) => a.startedAt - b.startedAt);
    this.prune();
  }

  public async close(): Promise<void> {
    await this.export();
  }

  public startExecution(stageName: string): string {
    const executionId = this.createId();
    this.active.set(executionId, { stageName, startedAt: this.now() });
    return executionId;
  }

  public endExecution(input: EndExecutionInput): ExecutionRecord {
    const execution = this.active.get(input.executionId);
    if (!execution) {
      throw new Error(`Execution ${input.executionId} is not active (unknown or already finalized)`);
    }
    this.active.delete(input.executionId);

    const endedAt = this.now();
    const tokensIn = input.tokensIn ?? 0;
    const tokensOut = input.tokensOut ?? 0;
    const model = input.model ?? this.defaultModel;

    const toolCalls = [...(input.toolCalls ?? [])];
    const record: ExecutionRecord = {
      stageName: execution.stageName,
      executionId: input.executionId,
      startedAt: execution.startedAt,
      endedAt,
      durationMs: Math.max(0, endedAt - execution.startedAt),
      tokensIn,
      tokensOut,
      totalTokens: tokensIn + tokensOut,
      model,
      cost: Math.max(0, estimateCost(model, tokensIn, tokensOut, this.pricing)),
      success: input.success,
      error: input.error ?? null,
      toolCalls
    };
    Object.freeze(toolCalls);
    Object.freeze(record);

    this.finished.push(record);
    this.prune();
    this.logger.debug(
      { stage: record.stageName, executionId: record.executionId, durationMs: record.durationMs, success: record.success },
      'Execution recorded'
    );
    return record;
  }

  /**
   * Runs `run` as one execution of `stageName`. Usage reported by `usageOf`
   * lands on the record; a thrown error is recorded and rethrown. `toolCalls`
   * names the collaborators the execution invokes and is recorded either way.
   */
  public async record<T>(
    stageName: string,
    run: () => Promise<T>,
    usageOf?: (value: T) => ExecutionUsage | undefined,
    toolCalls: readonly string[] = []
  ): Promise<T> {
    const executionId = this.startExecution(stageName);
    try {
      const value = await run();
      const usage = usageOf?.(value);
      this.endExecution({
        executionId,
        success: true,
        ...usage,
        toolCalls: [...toolCalls, ...(usage?.toolCalls ?? [])]
      });
      return value;
    } catch (error) {
      this.endExecution({ executionId, success: false, error: errorMessage(error), toolCalls: [...toolCalls] });
      throw error;
    }
  }

  public summary(windowMs?: number): ExecutionSummary {
    return summarizeExecutions(this.finished, { now: this.now(), windowMs: windowMs ?? null });
  }

  public records(): readonly ExecutionRecord[] {
    return [...this.finished];
  }

  public activeCount(stageName?: string): number {
    if (stageName === undefined) return this.active.size;
    let count = 0;
    for (const execution of this.active.values()) {
      if (execution.stageName === stageName) count += 1;
    }
    return count;
  }

  /** Persists records not yet written, then the export document. */
  public async export(): Promise<MetricsExport> {
    const document: MetricsExport = {
      exportedAt: new Date(this.now()).toISOString(),
      summary: this.summary(),
      records: [...this.finished]
    };

    if (this.store) {
      for (const record of this.finished) {
        if (this.persisted.has(record.executionId)) continue;
        await this.store.put(record.executionId, record);
        this.persisted.add(record.executionId);
      }
      await this.store.put(METRICS_EXPORT_KEY, document);
      this.logger.info({ records: document.records.length }, 'Metrics exported');
    }

    this.prune();
    return document;
  }

  /**
   * Drops finished records that started before the retention window. With a
   * store, only records already persisted are dropped; the rest wait for export.
   */
  private prune(): void {
    const cutoff = this.now() - this.retentionMs;
    const kept: ExecutionRecord[] = [];
    for (const record of this.finished) {
      const awaitingExport = this.store !== undefined && !this.persisted.has(record.executionId);
      if (record.startedAt >= cutoff || awaitingExport) kept.push(record);
      else this.persisted.delete(record.executionId);
    }
    if (kept.length === this.finished.length) return;

    this.logger.debug({ dropped: this.finished.length - kept.length }, 'Pruned execution records');
    this.finished = kept;
  }
}
