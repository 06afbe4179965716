import { z } from 'zod';

export const executionRecordSchema = z.object({
  stageName: z.string().min(1),
  executionId: z.string().min(1),
  startedAt: z.number(),
  endedAt: z.number(),
  durationMs: z.number().nonnegative(),
  tokensIn: z.number().int().nonnegative(),
  tokensOut: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
  model: z.string(),
  cost: z.number().nonnegative(),
  success: z.boolean(),
  error: z.string().nullable(),
  toolCalls: z.array(z.string())
});

/**
 * One finalized stage execution. Timestamps are epoch milliseconds so the record
 * survives a JSON round-trip unchanged. Frozen once created.
 */
export type ExecutionRecord = z.infer<typeof executionRecordSchema>;

export type StageSummary = {
  count: number;
  successCount: number;
  failureCount: number;
  totalTokens: number;
  totalCost: number;
  avgDurationMs: number;
};

/** Token usage of one model, over executions that consumed tokens. */
export type ModelUsage = {
  count: number;
  tokensIn: number;
  tokensOut: number;
  totalTokens: number;
  totalCost: number;
};

export type ExecutionSummary = {
  windowMs: number | null;
  totalExecutions: number;
  successCount: number;
  failureCount: number;
  /** Percentage, 0 when there were no executions. */
  successRate: number;
  totalTokens: number;
  totalCost: number;
  avgDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
  byStage: Record<string, StageSummary>;
  byModel: Record<string, ModelUsage>;
};
