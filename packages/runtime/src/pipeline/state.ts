import type {
  AnalysisResult,
  ComparisonResult,
  ErrorKind,
  Hypothesis,
  LiteratureResult,
  PlotArtifact,
  ProteinPrediction,
  ReportArtifact
} from '@helix/core';
import { type ChannelMap, appendReducer, lastWriteWinsReducer, mergeReducer } from '@helix/engine';

export type PipelineStatus =
  | 'STARTED'
  | 'ANALYZING'
  | 'PREDICTING'
  | 'SKIPPED_NO_ORF'
  | 'ENRICHING'
  | 'VISUALIZING'
  | 'REPORTING'
  | 'COMPLETED'
  | 'FAILED';

/** Names under which stage attempts are counted and tracked. */
export type StageName =
  | 'sequence_analysis'
  | 'sequence_comparison'
  | 'protein_prediction'
  | 'literature_search'
  | 'hypothesis_synthesis'
  | 'enrichment_summary'
  | 'visualization'
  | 'report_generation';

export interface StageTransition {
  status: PipelineStatus;
  /** Epoch milliseconds. */
  at: number;
}

export interface StageFailure {
  stage: StageName;
  kind: ErrorKind;
  message: string;
}

export interface PipelineState {
  status: PipelineStatus;
  transitions: StageTransition[];
  stageAttempts: Partial<Record<StageName, number>>;
  analysis: AnalysisResult | null;
  comparison: ComparisonResult | null;
  proteins: ProteinPrediction[];
  literature: LiteratureResult | null;
  hypotheses: Hypothesis[];
  enrichment: string | null;
  plots: PlotArtifact[];
  report: ReportArtifact | null;
  failure: StageFailure | null;
}

export const PIPELINE_CHANNELS: ChannelMap<PipelineState> = {
  status: lastWriteWinsReducer(),
  transitions: appendReducer(),
  stageAttempts: mergeReducer(),
  analysis: lastWriteWinsReducer(),
  comparison: lastWriteWinsReducer(),
  proteins: lastWriteWinsReducer(),
  literature: lastWriteWinsReducer(),
  hypotheses: lastWriteWinsReducer(),
  enrichment: lastWriteWinsReducer(),
  plots: lastWriteWinsReducer(),
  report: lastWriteWinsReducer(),
  failure: lastWriteWinsReducer()
};

export function initialPipelineState(): PipelineState {
  return {
    status: 'STARTED',
    transitions: [],
    stageAttempts: {},
    analysis: null,
    comparison: null,
    proteins: [],
    literature: null,
    hypotheses: [],
    enrichment: null,
    plots: [],
    report: null,
    failure: null
  };
}
