import { describe, expect, it } from 'vitest';
import type { ExecutionRecord } from '@helix/core';
import { FakeLogger, MemoryRecordStore } from '@helix/testing';

import { METRICS_EXPORT_KEY, PerformanceTracker, estimateCost, summarizeExecutions } from '../src/index';

function createTracker(records?: MemoryRecordStore, retentionMs?: number) {
  let nowMs = 1_000;
  let nextId = 0;
  const tracker = new PerformanceTracker({
    logger: new FakeLogger(),
    records,
    ...(retentionMs === undefined ? {} : { retentionMs }),
    now: () => nowMs,
    createId: () => `e-${++nextId}`
  });
  return {
    tracker,
    advance: (ms: number) => {
      nowMs += ms;
    }
  };
}

describe('PerformanceTracker', () => {
  it('records one execution per call with usage and cost', () => {
    const { tracker, advance } = createTracker();

    const id = tracker.startExecution('enrichment_summary');
    expect(tracker.activeCount('enrichment_summary')).toBe(1);
    advance(250);
    const record = tracker.endExecution({
      executionId: id,
      success: true,
      tokensIn: 1_000_000,
      tokensOut: 1_000_000,
      model: 'gpt-4o',
      toolCalls: ['literature']
    });

    expect(record).toEqual({
      stageName: 'enrichment_summary',
      executionId: 'e-1',
      startedAt: 1_000,
      endedAt: 1_250,
      durationMs: 250,
      tokensIn: 1_000_000,
      tokensOut: 1_000_000,
      totalTokens: 2_000_000,
      model: 'gpt-4o',
      cost: 12.5,
      success: true,
      error: null,
      toolCalls: ['literature']
    });
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.toolCalls)).toBe(true);
    expect(tracker.activeCount()).toBe(0);
  });

  it('rejects finalizing an execution twice', () => {
    const { tracker } = createTracker();
    const id = tracker.startExecution('visualization');
    tracker.endExecution({ executionId: id, success: true });

    expect(() => tracker.endExecution({ executionId: id, success: true })).toThrow(
      'Execution e-1 is not active (unknown or already finalized)'
    );
    expect(tracker.records()).toHaveLength(1);
  });

  it('records failures and rethrows them', async () => {
    const { tracker } = createTracker();

    await expect(
      tracker.record('literature_search', async () => {
        throw new Error('search unavailable');
      })
    ).rejects.toThrow('search unavailable');

    const [record] = tracker.records();
    expect(record?.success).toBe(false);
    expect(record?.error).toBe('search unavailable');
    expect(record?.model).toBe('gpt-4o-mini');
    expect(record?.cost).toBe(0);
  });

  it('summarizes by stage, with costs that add up', async () => {
    const { tracker, advance } = createTracker();

    await tracker.record('enrichment_summary', async () => {
      advance(100);
      return { text: 'ok' };
    }, () => ({ tokensIn: 1_000_000, tokensOut: 0, model: 'unlisted-model' }));
    await tracker.record('enrichment_summary', async () => {
      advance(300);
      return { text: 'ok' };
    }, () => ({ tokensIn: 0, tokensOut: 1_000_000, model: 'gpt-4o-mini' }));
    await expect(tracker.record('visualization', async () => {
      advance(50);
      throw new Error('renderer crashed');
    })).rejects.toThrow('renderer crashed');

    const summary = tracker.summary();

    expect(summary.totalExecutions).toBe(3);
    expect(summary.successCount).toBe(2);
    expect(summary.failureCount).toBe(1);
    expect(summary.successRate).toBe(66.7);
    expect(summary.totalTokens).toBe(2_000_000);
    expect(summary.minDurationMs).toBe(50);
    expect(summary.maxDurationMs).toBe(300);
    expect(summary.avgDurationMs).toBe(150);
    expect(summary.byStage.enrichment_summary).toMatchObject({
      count: 2,
      successCount: 2,
      failureCount: 0,
      totalTokens: 2_000_000,
      avgDurationMs: 200
    });
    expect(summary.byStage.enrichment_summary?.totalCost).toBeCloseTo(0.75, 10);
    expect(summary.byStage.visualization).toMatchObject({ count: 1, failureCount: 1 });

    const stageCosts = Object.values(summary.byStage).reduce((sum, stage) => sum + stage.totalCost, 0);
    expect(summary.totalCost).toBeCloseTo(stageCosts, 10);
  });

  it('limits the summary to a trailing window', async () => {
    const { tracker, advance } = createTracker();
    await tracker.record('visualization', async () => 'old');
    advance(10_000);
    await tracker.record('visualization', async () => 'new');

    expect(tracker.summary(5_000).totalExecutions).toBe(1);
    expect(tracker.summary(5_000).windowMs).toBe(5_000);
    expect(tracker.summary().totalExecutions).toBe(2);
  });

  it('exports records and reloads them on start', async () => {
    const store = new MemoryRecordStore();
    const first = createTracker(store).tracker;
    await first.record('report_generation', async () => 'done');

    const exported = await first.export();

    expect(exported.records).toHaveLength(1);
    expect(await store.list()).toEqual(['e-1', METRICS_EXPORT_KEY]);

    const second = createTracker(store).tracker;
    await second.start();
    expect(second.records().map((r) => r.executionId)).toEqual(['e-1']);
    expect(second.summary().byStage.report_generation?.count).toBe(1);
  });

  it('drops records older than the retention window', async () => {
    const { tracker, advance } = createTracker(undefined, 1_000);
    await tracker.record('visualization', async () => 'old');
    advance(1_500);
    await tracker.record('visualization', async () => 'new');

    expect(tracker.records().map((r) => r.executionId)).toEqual(['e-2']);
    expect(tracker.summary().totalExecutions).toBe(1);
  });

  it('keeps expired records until they are exported', async () => {
    const store = new MemoryRecordStore();
    const { tracker, advance } = createTracker(store, 1_000);
    await tracker.record('visualization', async () => 'old');
    advance(1_500);
    await tracker.record('visualization', async () => 'new');

    expect(tracker.records().map((r) => r.executionId)).toEqual(['e-1', 'e-2']);

    const exported = await tracker.export();

    expect(exported.records.map((r) => r.executionId)).toEqual(['e-1', 'e-2']);
    expect(await store.list()).toEqual(['e-1', 'e-2', METRICS_EXPORT_KEY]);
    expect(tracker.records().map((r) => r.executionId)).toEqual(['e-2']);
  });
});

describe('estimateCost', () => {
  it('falls back to the default rate for unlisted models', () => {
    const pricing = { defaultRate: { input: 1, output: 2 }, models: { local: { input: 0, output: 0 } } };

    expect(estimateCost('local', 5_000, 5_000, pricing)).toBe(0);
    expect(estimateCost('other', 1_000_000, 500_000, pricing)).toBe(2);
  });

  it('does not read inherited properties as model rates', () => {
    const pricing = { defaultRate: { input: 1, output: 2 }, models: { local: { input: 0, output: 0 } } };

    expect(estimateCost('toString', 1_000_000, 500_000, pricing)).toBe(2);
    expect(estimateCost('constructor', 1_000_000, 500_000, pricing)).toBe(2);
  });
});

function execution(overrides: Partial<ExecutionRecord>): ExecutionRecord {
  return {
    stageName: 'visualization',
    executionId: 'e-1',
    startedAt: 0,
    endedAt: 10,
    durationMs: 10,
    tokensIn: 0,
    tokensOut: 0,
    totalTokens: 0,
    model: 'gpt-4o-mini',
    cost: 0,
    success: true,
    error: null,
    toolCalls: [],
    ...overrides
  };
}

describe('summarizeExecutions', () => {
  it('returns zeros for no records', () => {
    expect(summarizeExecutions([], { now: 0, windowMs: null })).toEqual({
      windowMs: null,
      totalExecutions: 0,
      successCount: 0,
      failureCount: 0,
      successRate: 0,
      totalTokens: 0,
      totalCost: 0,
      avgDurationMs: 0,
      minDurationMs: 0,
      maxDurationMs: 0,
      byStage: {},
      byModel: {}
    });
  });

  it('keeps stage names that shadow object properties as own entries', () => {
    const summary = summarizeExecutions(
      [execution({ stageName: '__proto__' }), execution({ stageName: 'constructor', executionId: 'e-2' })],
      { now: 0, windowMs: null }
    );
    const stage = { count: 1, successCount: 1, failureCount: 0, totalTokens: 0, totalCost: 0, avgDurationMs: 10 };

    expect(Object.entries(summary.byStage)).toEqual([
      ['__proto__', stage],
      ['constructor', stage]
    ]);
    expect(Object.getPrototypeOf(summary.byStage)).toBe(Object.prototype);
  });

  it('breaks token usage down by model', () => {
    const summary = summarizeExecutions(
      [
        execution({ executionId: 'e-1', model: 'gpt-4o', tokensIn: 100, tokensOut: 50, totalTokens: 150, cost: 0.5 }),
        execution({ executionId: 'e-2', model: 'gpt-4o', tokensIn: 10, totalTokens: 10, cost: 0.25 }),
        execution({ executionId: 'e-3' }),
        execution({ executionId: 'e-4', model: 'local', tokensIn: 5, tokensOut: 5, totalTokens: 10 })
      ],
      { now: 0, windowMs: null }
    );

    expect(summary.byModel).toEqual({
      'gpt-4o': { count: 2, tokensIn: 110, tokensOut: 50, totalTokens: 160, totalCost: 0.75 },
      local: { count: 1, tokensIn: 5, tokensOut: 5, totalTokens: 10, totalCost: 0 }
    });
  });
});
