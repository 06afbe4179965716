import {
  type CheckpointSaver,
  type HelixConfig,
  type LiteratureSearchPort,
  type Logger,
  type RecordStore,
  type ReportPort,
  type TextCompletionPort,
  type VisualizationPort
} from '@helix/core';
import { MemoryCheckpointSaver, MemoryRecordStore, PinoLogger } from '@helix/adapters';
import type { PipelineState } from '@helix/runtime';

export interface AssistantProviders {
  textCompletion?: TextCompletionPort;
  literature?: LiteratureSearchPort;
  visualizer?: VisualizationPort;
  reports?: ReportPort;
  /** Durable sessions. Defaults to an in-memory store. */
  sessionRecords?: RecordStore;
  /** Durable execution records and metric exports. Defaults to an in-memory store. */
  metricRecords?: RecordStore;
  checkpoints?: CheckpointSaver<PipelineState>;
  logger?: Logger;
}

export interface ResolvedProviders {
  textCompletion: TextCompletionPort;
  literature: LiteratureSearchPort;
  visualizer: VisualizationPort;
  reports: ReportPort;
  sessionRecords: RecordStore;
  metricRecords: RecordStore;
  checkpoints: CheckpointSaver<PipelineState>;
  logger: Logger;
}

/** Collaborators have no local default; storage and logging do. */
export function resolveProviders(providers: AssistantProviders, config: HelixConfig): ResolvedProviders {
  const { textCompletion, literature, visualizer, reports } = providers;
  const missing: string[] = [];

  if (!textCompletion) missing.push('providers.textCompletion');
  if (!literature) missing.push('providers.literature');
  if (!visualizer) missing.push('providers.visualizer');
  if (!reports) missing.push('providers.reports');

  if (!textCompletion || !literature || !visualizer || !reports) {
    throw new Error(`Invalid assistant config: missing ${missing.join(', ')}`);
  }
  if (providers.sessionRecords && providers.sessionRecords === providers.metricRecords) {
    throw new Error('Invalid assistant config: sessionRecords and metricRecords must be different stores');
  }

  return {
    textCompletion,
    literature,
    visualizer,
    reports,
    sessionRecords: providers.sessionRecords ?? new MemoryRecordStore(),
    metricRecords: providers.metricRecords ?? new MemoryRecordStore(),
    checkpoints: providers.checkpoints ?? new MemoryCheckpointSaver<PipelineState>(),
    logger: providers.logger ?? new PinoLogger({
      name: 'helix',
      level: config.logging.level,
      prettyPrint: config.logging.prettyPrint
    })
  };
}
