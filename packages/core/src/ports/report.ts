import { type RuntimeResource } from '../lifecycle';
import {
  type AnalysisResult,
  type ComparisonResult,
  type Hypothesis,
  type ProteinPrediction
} from '../entities/analysis';
import { type LiteratureResult } from './literature';
import { type PlotArtifact } from './visualization';

export interface ReportRequest {
  runId: string;
  analysis: AnalysisResult;
  proteins: ProteinPrediction[];
  comparison: ComparisonResult | null;
  literature: LiteratureResult;
  hypotheses: Hypothesis[];
  enrichment: string;
  plots: PlotArtifact[];
}

export interface ReportArtifact {
  reportPath: string;
  pageCount: number;
  fileSizeBytes: number;
}

export interface ReportPort extends RuntimeResource {
  generate(request: ReportRequest, options?: { signal?: AbortSignal | undefined }): Promise<ReportArtifact>;
}
