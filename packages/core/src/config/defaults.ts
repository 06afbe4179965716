/**
 * Default values for the helix runtime configuration.
 */

export const SESSION_DEFAULTS = {
  /** Sessions idle for longer than this are purged by the sweep. */
  MAX_AGE_MS: 24 * 60 * 60 * 1000,
  /** How often the runtime sweeps expired sessions; 0 disables the timer. */
  SWEEP_INTERVAL_MS: 60 * 60 * 1000,
  /** Messages of prior conversation handed to the text-completion collaborator. */
  HISTORY_WINDOW: 20,
} as const;

export const RETRY_DEFAULTS = {
  MAX_RETRIES: 2,
  BASE_DELAY_MS: 75,
  MAX_DELAY_MS: 2_000,
  JITTER_MS: 25,
} as const;

export const COLLABORATOR_TIMEOUT_MS = 20_000;

export const SEQUENCE_LIMITS = {
  MAX_SEQUENCE_LENGTH: 100_000,
  MAX_COMPARISON_LENGTH: 5_000,
} as const;

/** USD per million tokens. */
export const METRICS_DEFAULTS = {
  /** Finished execution records older than this are dropped from memory once persisted. */
  RETENTION_MS: 7 * 24 * 60 * 60 * 1000,
} as const;

export const PRICING_DEFAULTS = {
  DEFAULT_MODEL: 'gpt-4o-mini',
  DEFAULT_RATE: { input: 0.15, output: 0.6 },
  MODELS: {
    'gpt-4o-mini': { input: 0.15, output: 0.6 },
    'gpt-4o': { input: 2.5, output: 10 },
    'gemini-2.0-flash': { input: 0.15, output: 0.6 },
    'gemini-1.5-flash': { input: 0.075, output: 0.3 },
    'gemini-1.5-pro': { input: 1.25, output: 5 },
    local: { input: 0, output: 0 },
  },
} as const;

/** IUPAC nucleotide patterns; W = A/T, R = A/G. */
export const MOTIF_DEFAULTS = [
  { name: 'TATA_box', pattern: 'TATAWA' },
  { name: 'CAAT_box', pattern: 'CAAT' },
  { name: 'PolyA_signal', pattern: 'AATAAA' },
  { name: 'Kozak_consensus', pattern: 'RCCATGG' },
];

export const SIGNAL_PEPTIDE_DEFAULTS = {
  WINDOW: 20,
  N_REGION_LENGTH: 5,
  HYDROPHOBICITY_THRESHOLD: 1.6,
  MIN_N_REGION_CHARGE: 1,
} as const;

export const COMPARISON_DEFAULTS = {
  MODE: 'global' as const,
  MATCH: 2,
  MISMATCH: -1,
  GAP: -2,
  PARTIAL_MATCH_WEIGHT: 0.5,
  HIGH_HOMOLOGY: 70,
  MODERATE_HOMOLOGY: 40,
};

export const LOGGING_DEFAULTS = {
  LEVEL: 'info' as const,
  /** Pretty-print outside production. */
  PRETTY_PRINT: process.env.NODE_ENV !== 'production',
};

export const DEFAULT_SYSTEM_PROMPT =
  'You are a molecular biology assistant. Answer concisely and say when a question needs a sequence analysis.';
