import { ProteinPredictor, SequenceAnalyzer, SequenceComparator } from '@helix/analysis';
import type { HelixConfigInput, RecordStore } from '@helix/core';
import {
  FakeLogger,
  MemoryCheckpointSaver,
  MemoryRecordStore,
  createFakeCollaborators,
  createFakeConfig
} from '@helix/testing';

import {
  PerformanceTracker,
  PipelineOrchestrator,
  RequestRouter,
  SessionStore,
  type PipelineCollaborators,
  type PipelineState
} from '../src/index';

/** The runtime wired over in-memory stores and fake collaborators, on a frozen clock. */
export function createHarness(
  overrides: HelixConfigInput = {},
  collaboratorOverrides: Partial<PipelineCollaborators> = {},
  records: RecordStore = new MemoryRecordStore()
) {
  const config = createFakeConfig(overrides);
  const logger = new FakeLogger();
  const fakes = createFakeCollaborators();
  const collaborators: PipelineCollaborators = { ...fakes, ...collaboratorOverrides };
  const checkpoints = new MemoryCheckpointSaver<PipelineState>();
  const now = () => 0;

  let nextSession = 0;
  let nextRun = 0;
  let nextExecution = 0;

  const sessions = new SessionStore({
    records,
    logger,
    maxSessionAgeMs: config.maxSessionAgeMs,
    now: () => new Date(now()),
    createId: () => `s-${++nextSession}`
  });
  const tracker = new PerformanceTracker({
    logger,
    pricing: config.pricing,
    defaultModel: config.defaultModel,
    now,
    createId: () => `e-${++nextExecution}`
  });
  const orchestrator = new PipelineOrchestrator({
    analyzer: new SequenceAnalyzer({ maxSequenceLength: config.maxSequenceLength, motifs: config.motifs, orf: config.orf }),
    predictor: new ProteinPredictor({ signalPeptide: config.signalPeptide }),
    comparator: new SequenceComparator({ maxComparisonLength: config.maxComparisonLength, comparison: config.comparison }),
    collaborators,
    sessions,
    tracker,
    checkpoints,
    logger,
    retry: config.retry,
    collaboratorTimeoutMs: config.collaboratorTimeoutMs,
    hypothesisConfidenceThreshold: config.hypothesisConfidenceThreshold,
    systemPrompt: config.systemPrompt,
    now,
    createId: () => `run-${++nextRun}`,
    random: () => 0
  });
  const router = new RequestRouter({
    sessions,
    orchestrator,
    tracker,
    textCompletion: collaborators.textCompletion,
    logger,
    retry: config.retry,
    collaboratorTimeoutMs: config.collaboratorTimeoutMs,
    historyWindow: config.historyWindow,
    systemPrompt: config.systemPrompt,
    random: () => 0
  });

  return { config, logger, fakes, records, checkpoints, sessions, tracker, orchestrator, router };
}
