export type SequenceType = 'DNA' | 'RNA';
export type Strand = 'forward' | 'reverse';

/** Half-open `[start, end)` coordinates on the forward strand, 0-based. */
export interface Orf {
  start: number;
  end: number;
  length: number;
  sequence: string;
  /** 1..3 on the forward strand, -1..-3 on the reverse strand. */
  frame: number;
  strand: Strand;
}

export interface MotifHit {
  name: string;
  position: number;
  match: string;
}

export interface AnalysisResult {
  valid: true;
  sequence: string;
  sequenceType: SequenceType;
  length: number;
  gcPercent: number;
  orfs: readonly Orf[];
  motifs: readonly MotifHit[];
}

export interface SignalPeptidePrediction {
  predicted: boolean;
  hRegionHydrophobicity: number;
  nRegionCharge: number;
}

export interface ProteinProfile {
  aminoAcidSequence: string;
  length: number;
  molecularWeight: number;
  hydrophobicity: number;
  signalPeptide: SignalPeptidePrediction;
}

export interface ProteinPrediction {
  orfIndex: number;
  orfId: string;
  profile: ProteinProfile;
}

export type AlignmentMode = 'global' | 'local';
export type HomologyLabel = 'high' | 'moderate' | 'low';

export interface Alignment {
  query: string;
  matches: string;
  target: string;
}

export interface ComparisonResult {
  mode: AlignmentMode;
  alignment: Alignment;
  alignmentLength: number;
  score: number;
  identityPercent: number;
  similarityPercent: number;
  homology: HomologyLabel;
}

export interface Hypothesis {
  statement: string;
  confidence: number;
  evidence: string;
  suggestedExperiments: string[];
}
