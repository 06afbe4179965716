import {
  type HelixConfig,
  type HelixConfigInput,
  type Logger,
  errorMessage,
  resolveConfig
} from '@helix/core';
import { ProteinPredictor, SequenceAnalyzer, SequenceComparator } from '@helix/analysis';
import {
  PerformanceTracker,
  PipelineOrchestrator,
  RequestRouter,
  SessionStore,
  closeResources,
  collectLifecycleResources,
  startResources,
  type PipelineRunInput,
  type PipelineRunResult,
  type RouteOptions,
  type RoutedResult
} from '@helix/runtime';

import { type AssistantProviders, resolveProviders } from './providers';

export interface Assistant {
  readonly config: HelixConfig;
  readonly logger: Logger;
  readonly sessions: SessionStore;
  readonly tracker: PerformanceTracker;
  readonly orchestrator: PipelineOrchestrator;
  start(): Promise<void>;
  close(): Promise<void>;
  /** Classifies one inbound message and answers it. */
  route(message: string, sessionId?: string, ownerId?: string, options?: RouteOptions): Promise<RoutedResult>;
  /** Runs the analysis pipeline directly, outside any conversation turn. */
  analyze(input: PipelineRunInput): Promise<PipelineRunResult>;
  sweepExpired(): Promise<string[]>;
}

export function createAssistant(config: HelixConfigInput, providers: AssistantProviders): Assistant {
  const resolved = resolveConfig(config);
  const resources = resolveProviders(providers, resolved);
  const logger = resources.logger;

  const sessions = new SessionStore({
    records: resources.sessionRecords,
    logger,
    maxSessionAgeMs: resolved.maxSessionAgeMs
  });
  const tracker = new PerformanceTracker({
    logger,
    records: resources.metricRecords,
    pricing: resolved.pricing,
    defaultModel: resolved.defaultModel,
    retentionMs: resolved.metricsRetentionMs
  });
  const orchestrator = new PipelineOrchestrator({
    analyzer: new SequenceAnalyzer({
      maxSequenceLength: resolved.maxSequenceLength,
      motifs: resolved.motifs,
      orf: resolved.orf
    }),
    predictor: new ProteinPredictor({ signalPeptide: resolved.signalPeptide }),
    comparator: new SequenceComparator({
      maxComparisonLength: resolved.maxComparisonLength,
      comparison: resolved.comparison
    }),
    collaborators: {
      textCompletion: resources.textCompletion,
      literature: resources.literature,
      visualizer: resources.visualizer,
      reports: resources.reports
    },
    sessions,
    tracker,
    checkpoints: resources.checkpoints,
    logger,
    retry: resolved.retry,
    collaboratorTimeoutMs: resolved.collaboratorTimeoutMs,
    hypothesisConfidenceThreshold: resolved.hypothesisConfidenceThreshold,
    systemPrompt: resolved.systemPrompt
  });
  const router = new RequestRouter({
    sessions,
    orchestrator,
    tracker,
    textCompletion: resources.textCompletion,
    logger,
    retry: resolved.retry,
    collaboratorTimeoutMs: resolved.collaboratorTimeoutMs,
    historyWindow: resolved.historyWindow,
    systemPrompt: resolved.systemPrompt
  });

  // Stores first so the session store and tracker can load from them.
  const lifecycle = collectLifecycleResources([
    resources.sessionRecords,
    resources.metricRecords,
    resources.textCompletion,
    resources.literature,
    resources.visualizer,
    resources.reports,
    sessions,
    tracker
  ]);

  let started = false;
  let sweepTimer: ReturnType<typeof setInterval> | null = null;

  const sweepExpired = async (): Promise<string[]> => sessions.sweepExpired(resolved.maxSessionAgeMs);

  return {
    config: resolved,
    logger,
    sessions,
    tracker,
    orchestrator,

    async start(): Promise<void> {
      if (started) return;
      await startResources(lifecycle);
      started = true;

      if (resolved.sweepIntervalMs > 0) {
        sweepTimer = setInterval(() => {
          sweepExpired().catch((error: unknown) => {
            logger.error({ error: errorMessage(error) }, 'Session sweep failed');
          });
        }, resolved.sweepIntervalMs);
        sweepTimer.unref();
      }
      logger.info({ sweepIntervalMs: resolved.sweepIntervalMs }, 'Assistant started');
    },

    async close(): Promise<void> {
      if (!started) return;
      if (sweepTimer) {
        clearInterval(sweepTimer);
        sweepTimer = null;
      }
      await closeResources(lifecycle);
      started = false;
      logger.info('Assistant closed');
    },

    route(message, sessionId, ownerId, options) {
      return router.route(message, sessionId, ownerId, options);
    },

    analyze(input) {
      return orchestrator.run(input);
    },

    sweepExpired
  };
}
