import type { ExecutionRecord, ExecutionSummary, ModelUsage, PricingConfig, StageSummary } from '@helix/core';

/** USD for one call, from the per-million-token price table. */
export function estimateCost(model: string, tokensIn: number, tokensOut: number, pricing: PricingConfig): number {
  const rate = (Object.hasOwn(pricing.models, model) ? pricing.models[model] : undefined) ?? pricing.defaultRate;
  return (tokensIn / 1_000_000) * rate.input + (tokensOut / 1_000_000) * rate.output;
}

export interface SummarizeOptions {
  now: number;
  /** Only executions started within this many milliseconds of `now`; null for all. */
  windowMs: number | null;
}

interface StageAccumulator extends StageSummary {
  totalDurationMs: number;
}

/**
 * Aggregates execution records. Pure: the same records and options always give
 * the same summary. Costs are summed in record order.
 */
export function summarizeExecutions(records: readonly ExecutionRecord[], options: SummarizeOptions): ExecutionSummary {
  const { now, windowMs } = options;
  const selected = windowMs === null ? records : records.filter((record) => record.startedAt >= now - windowMs);

  const stages = new Map<string, StageAccumulator>();
  const models = new Map<string, ModelUsage>();
  let successCount = 0;
  let totalTokens = 0;
  let totalCost = 0;
  let totalDurationMs = 0;
  let minDurationMs = Number.POSITIVE_INFINITY;
  let maxDurationMs = 0;

  for (const record of selected) {
    if (record.success) successCount += 1;
    totalTokens += record.totalTokens;
    totalCost += record.cost;
    totalDurationMs += record.durationMs;
    minDurationMs = Math.min(minDurationMs, record.durationMs);
    maxDurationMs = Math.max(maxDurationMs, record.durationMs);

    const stage = stages.get(record.stageName) ?? {
      count: 0,
      successCount: 0,
      failureCount: 0,
      totalTokens: 0,
      totalCost: 0,
      avgDurationMs: 0,
      totalDurationMs: 0
    };
    stage.count += 1;
    if (record.success) stage.successCount += 1;
    else stage.failureCount += 1;
    stage.totalTokens += record.totalTokens;
    stage.totalCost += record.cost;
    stage.totalDurationMs += record.durationMs;
    stages.set(record.stageName, stage);

    if (record.totalTokens === 0) continue;
    const usage = models.get(record.model) ?? { count: 0, tokensIn: 0, tokensOut: 0, totalTokens: 0, totalCost: 0 };
    usage.count += 1;
    usage.tokensIn += record.tokensIn;
    usage.tokensOut += record.tokensOut;
    usage.totalTokens += record.totalTokens;
    usage.totalCost += record.cost;
    models.set(record.model, usage);
  }

  // fromEntries defines own keys, so names like `__proto__` stay plain entries.
  const byStage: Record<string, StageSummary> = Object.fromEntries(
    [...stages].map(([name, { totalDurationMs: stageDuration, ...stage }]) => [
      name,
      { ...stage, avgDurationMs: stageDuration / stage.count }
    ])
  );
  const byModel: Record<string, ModelUsage> = Object.fromEntries(models);

  const total = selected.length;
  return {
    windowMs,
    totalExecutions: total,
    successCount,
    failureCount: total - successCount,
    successRate: total > 0 ? Math.round((successCount / total) * 1000) / 10 : 0,
    totalTokens,
    totalCost,
    avgDurationMs: total > 0 ? totalDurationMs / total : 0,
    minDurationMs: total > 0 ? minDurationMs : 0,
    maxDurationMs,
    byStage,
    byModel
  };
}
