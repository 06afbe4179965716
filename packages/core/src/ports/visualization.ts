import { type RuntimeResource } from '../lifecycle';
import { type AnalysisResult, type ProteinPrediction } from '../entities/analysis';

export interface PlotArtifact {
  name: string;
  path: string;
  format: string;
}

export interface VisualizationRequest {
  runId: string;
  analysis: AnalysisResult;
  proteins: ProteinPrediction[];
}

export interface VisualizationResult {
  plots: PlotArtifact[];
}

export interface VisualizationPort extends RuntimeResource {
  render(request: VisualizationRequest, options?: { signal?: AbortSignal | undefined }): Promise<VisualizationResult>;
}
