import {
  type AnalysisResult,
  type InvalidSequenceError,
  type MotifPattern,
  type OrfConfig,
  type Result,
  MOTIF_DEFAULTS,
  SEQUENCE_LIMITS,
  ok
} from '@helix/core';

import { type CompiledMotif, compileMotif, scanMotifs } from './motifs';
import { findOrfs } from './orfs';
import { parseNucleotides, roundTo } from './sequence';

export interface SequenceAnalyzerOptions {
  maxSequenceLength?: number;
  motifs?: MotifPattern[];
  orf?: Partial<OrfConfig>;
}

/** (G + C) / length as a percentage with one decimal. */
export function gcContent(sequence: string): number {
  if (sequence.length === 0) return 0;
  let gc = 0;
  for (const base of sequence) {
    if (base === 'G' || base === 'C') gc += 1;
  }
  return roundTo((gc / sequence.length) * 100, 1);
}

/**
 * Deterministic nucleotide analysis: validation, composition, ORFs and motifs.
 * Stateless apart from its configuration, so one instance can serve every request.
 */
export class SequenceAnalyzer {
  private readonly maxSequenceLength: number;
  private readonly motifs: readonly CompiledMotif[];
  private readonly orf: OrfConfig;

  public constructor(options: SequenceAnalyzerOptions = {}) {
    this.maxSequenceLength = options.maxSequenceLength ?? SEQUENCE_LIMITS.MAX_SEQUENCE_LENGTH;
    this.motifs = (options.motifs ?? MOTIF_DEFAULTS).map(compileMotif);
    this.orf = {
      minLength: options.orf?.minLength ?? 0,
      scanReverseStrand: options.orf?.scanReverseStrand ?? false
    };
  }

  public analyze(raw: string): Result<AnalysisResult, InvalidSequenceError> {
    const parsed = parseNucleotides(raw, this.maxSequenceLength);
    if (!parsed.ok) return parsed;

    const sequence = parsed.value;
    const orfs = findOrfs(sequence, this.orf).map((orf) => Object.freeze(orf));
    const motifs = scanMotifs(sequence, this.motifs).map((hit) => Object.freeze(hit));

    const result: AnalysisResult = {
      valid: true,
      sequence,
      sequenceType: sequence.includes('U') && !sequence.includes('T') ? 'RNA' : 'DNA',
      length: sequence.length,
      gcPercent: gcContent(sequence),
      orfs: Object.freeze(orfs),
      motifs: Object.freeze(motifs)
    };
    return ok(Object.freeze(result));
  }
}
