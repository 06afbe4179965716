import { z } from 'zod';

import {
  COLLABORATOR_TIMEOUT_MS,
  COMPARISON_DEFAULTS,
  DEFAULT_SYSTEM_PROMPT,
  LOGGING_DEFAULTS,
  METRICS_DEFAULTS,
  MOTIF_DEFAULTS,
  PRICING_DEFAULTS,
  RETRY_DEFAULTS,
  SEQUENCE_LIMITS,
  SESSION_DEFAULTS,
  SIGNAL_PEPTIDE_DEFAULTS
} from './defaults';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const priceRateSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative()
});

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const motifPatternSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().regex(/^[ACGTURYKMSWBDHVN]+$/i, 'must use IUPAC nucleotide codes')
});

export const helixConfigSchema = z.object({
  maxSessionAgeMs: positiveInt.default(SESSION_DEFAULTS.MAX_AGE_MS),
  sweepIntervalMs: nonNegativeInt.default(SESSION_DEFAULTS.SWEEP_INTERVAL_MS),
  historyWindow: nonNegativeInt.default(SESSION_DEFAULTS.HISTORY_WINDOW),
  maxSequenceLength: positiveInt.default(SEQUENCE_LIMITS.MAX_SEQUENCE_LENGTH),
  maxComparisonLength: positiveInt.default(SEQUENCE_LIMITS.MAX_COMPARISON_LENGTH),
  retry: z.object({
    maxRetries: nonNegativeInt.default(RETRY_DEFAULTS.MAX_RETRIES),
    baseDelayMs: nonNegativeInt.default(RETRY_DEFAULTS.BASE_DELAY_MS),
    maxDelayMs: nonNegativeInt.default(RETRY_DEFAULTS.MAX_DELAY_MS),
    jitterMs: nonNegativeInt.default(RETRY_DEFAULTS.JITTER_MS)
  }).default({}),
  collaboratorTimeoutMs: positiveInt.default(COLLABORATOR_TIMEOUT_MS),
  metricsRetentionMs: positiveInt.default(METRICS_DEFAULTS.RETENTION_MS),
  defaultModel: z.string().min(1).default(PRICING_DEFAULTS.DEFAULT_MODEL),
  pricing: z.object({
    defaultRate: priceRateSchema.default(PRICING_DEFAULTS.DEFAULT_RATE),
    models: z.record(priceRateSchema).default(PRICING_DEFAULTS.MODELS)
  }).default({}),
  motifs: z.array(motifPatternSchema).default(MOTIF_DEFAULTS),
  orf: z.object({
    minLength: nonNegativeInt.default(0),
    scanReverseStrand: z.boolean().default(false)
  }).default({}),
  signalPeptide: z.object({
    window: positiveInt.default(SIGNAL_PEPTIDE_DEFAULTS.WINDOW),
    nRegionLength: positiveInt.default(SIGNAL_PEPTIDE_DEFAULTS.N_REGION_LENGTH),
    hydrophobicityThreshold: z.number().default(SIGNAL_PEPTIDE_DEFAULTS.HYDROPHOBICITY_THRESHOLD),
    minNRegionCharge: z.number().int().default(SIGNAL_PEPTIDE_DEFAULTS.MIN_N_REGION_CHARGE)
  }).default({}),
  comparison: z.object({
    mode: z.enum(['global', 'local']).default(COMPARISON_DEFAULTS.MODE),
    match: z.number().positive().default(COMPARISON_DEFAULTS.MATCH),
    mismatch: z.number().nonpositive().default(COMPARISON_DEFAULTS.MISMATCH),
    gap: z.number().negative().default(COMPARISON_DEFAULTS.GAP),
    partialMatchWeight: z.number().min(0).max(1).default(COMPARISON_DEFAULTS.PARTIAL_MATCH_WEIGHT),
    highHomologyThreshold: z.number().min(0).max(100).default(COMPARISON_DEFAULTS.HIGH_HOMOLOGY),
    moderateHomologyThreshold: z.number().min(0).max(100).default(COMPARISON_DEFAULTS.MODERATE_HOMOLOGY)
  }).default({}),
  hypothesisConfidenceThreshold: z.number().min(0).max(1).default(0.5),
  systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  logging: z.object({
    level: logLevelSchema.default(LOGGING_DEFAULTS.LEVEL),
    prettyPrint: z.boolean().default(LOGGING_DEFAULTS.PRETTY_PRINT)
  }).default({})
});
