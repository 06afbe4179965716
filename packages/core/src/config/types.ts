import { type z } from 'zod';

import { type helixConfigSchema, type motifPatternSchema } from './schema';

/** Fully resolved configuration; every field has a value. */
export type HelixConfig = z.infer<typeof helixConfigSchema>;

/** What callers may pass; omitted fields fall back to the defaults. */
export type HelixConfigInput = z.input<typeof helixConfigSchema>;

export type MotifPattern = z.infer<typeof motifPatternSchema>;
export type PriceRate = HelixConfig['pricing']['defaultRate'];
export type PricingConfig = HelixConfig['pricing'];
export type OrfConfig = HelixConfig['orf'];
export type SignalPeptideConfig = HelixConfig['signalPeptide'];
export type ComparisonConfig = HelixConfig['comparison'];
export type LogLevel = HelixConfig['logging']['level'];
