import { z } from 'zod';
import { ConfigError, type HelixConfig, type HelixConfigInput, logLevelSchema, resolveConfig } from '@helix/core';

const count = z.coerce.number().int();
const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  HELIX_MAX_SESSION_AGE_MS: count.optional(),
  HELIX_SWEEP_INTERVAL_MS: count.optional(),
  HELIX_HISTORY_WINDOW: count.optional(),
  HELIX_MAX_SEQUENCE_LENGTH: count.optional(),
  HELIX_MAX_COMPARISON_LENGTH: count.optional(),
  HELIX_MAX_RETRIES: count.optional(),
  HELIX_RETRY_BASE_DELAY_MS: count.optional(),
  HELIX_RETRY_MAX_DELAY_MS: count.optional(),
  HELIX_RETRY_JITTER_MS: count.optional(),
  HELIX_COLLABORATOR_TIMEOUT_MS: count.optional(),
  HELIX_METRICS_RETENTION_MS: count.optional(),
  HELIX_DEFAULT_MODEL: z.string().optional(),
  HELIX_HYPOTHESIS_THRESHOLD: z.coerce.number().optional(),
  HELIX_SCAN_REVERSE_STRAND: flag.optional(),
  HELIX_LOG_LEVEL: logLevelSchema.optional(),
  HELIX_LOG_PRETTY: flag.optional()
});

type HelixEnv = z.infer<typeof envSchema>;

function layer(env: HelixEnv, base: HelixConfigInput): HelixConfigInput {
  return {
    ...base,
    maxSessionAgeMs: env.HELIX_MAX_SESSION_AGE_MS ?? base.maxSessionAgeMs,
    sweepIntervalMs: env.HELIX_SWEEP_INTERVAL_MS ?? base.sweepIntervalMs,
    historyWindow: env.HELIX_HISTORY_WINDOW ?? base.historyWindow,
    maxSequenceLength: env.HELIX_MAX_SEQUENCE_LENGTH ?? base.maxSequenceLength,
    maxComparisonLength: env.HELIX_MAX_COMPARISON_LENGTH ?? base.maxComparisonLength,
    collaboratorTimeoutMs: env.HELIX_COLLABORATOR_TIMEOUT_MS ?? base.collaboratorTimeoutMs,
    metricsRetentionMs: env.HELIX_METRICS_RETENTION_MS ?? base.metricsRetentionMs,
    defaultModel: env.HELIX_DEFAULT_MODEL ?? base.defaultModel,
    hypothesisConfidenceThreshold: env.HELIX_HYPOTHESIS_THRESHOLD ?? base.hypothesisConfidenceThreshold,
    retry: {
      ...base.retry,
      maxRetries: env.HELIX_MAX_RETRIES ?? base.retry?.maxRetries,
      baseDelayMs: env.HELIX_RETRY_BASE_DELAY_MS ?? base.retry?.baseDelayMs,
      maxDelayMs: env.HELIX_RETRY_MAX_DELAY_MS ?? base.retry?.maxDelayMs,
      jitterMs: env.HELIX_RETRY_JITTER_MS ?? base.retry?.jitterMs
    },
    orf: {
      ...base.orf,
      scanReverseStrand: env.HELIX_SCAN_REVERSE_STRAND ?? base.orf?.scanReverseStrand
    },
    logging: {
      ...base.logging,
      level: env.HELIX_LOG_LEVEL ?? base.logging?.level,
      prettyPrint: env.HELIX_LOG_PRETTY ?? base.logging?.prettyPrint
    }
  };
}

/**
 * Resolves the configuration from `HELIX_*` variables layered over `overrides`.
 * Empty variables count as unset.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: HelixConfigInput = {}
): HelixConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('HELIX_') && value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid helix environment: ${detail}`);
  }

  return resolveConfig(layer(parsed.data, overrides));
}
