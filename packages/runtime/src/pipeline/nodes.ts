import {
  type AnalysisResult,
  type ComparisonResult,
  type Logger,
  type LiteratureSearchPort,
  type NodeResult,
  type ReportPort,
  type TextCompletionPort,
  type VisualizationPort,
  unwrap
} from '@helix/core';
import {
  type ProteinPredictor,
  type SequenceAnalyzer,
  type SequenceComparator,
  buildLiteratureQuery,
  synthesizeHypotheses
} from '@helix/analysis';
import { defineNode } from '@helix/engine';

import type { StageOutcome, StageRunner } from './stageRunner';
import type { PipelineState, PipelineStatus, StageName } from './state';

export interface PipelineCollaborators {
  textCompletion: TextCompletionPort;
  literature: LiteratureSearchPort;
  visualizer: VisualizationPort;
  reports: ReportPort;
}

export interface PipelineContext {
  runId: string;
  sequence: string;
  compareWith: string | undefined;
  signal: AbortSignal;
  stages: StageRunner;
  analyzer: SequenceAnalyzer;
  predictor: ProteinPredictor;
  comparator: SequenceComparator;
  collaborators: PipelineCollaborators;
  hypothesisConfidenceThreshold: number;
  systemPrompt: string;
  now: () => number;
  logger: Logger;
}

type PipelineNodeResult = NodeResult<Partial<PipelineState>>;

export const PIPELINE_ENTRYPOINT = 'analyzing';

/** Names recorded in `ExecutionRecord.toolCalls` for each collaborator. */
export const TOOL_NAMES = {
  literature: 'literature_search',
  textCompletion: 'text_completion',
  visualizer: 'visualization',
  reports: 'report_generation'
} as const;

function transitions(ctx: PipelineContext, enteredAt: number, ...statuses: PipelineStatus[]) {
  const [entered, ...rest] = statuses;
  const now = ctx.now();
  return [
    ...(entered ? [{ status: entered, at: enteredAt }] : []),
    ...rest.map((status) => ({ status, at: now }))
  ];
}

function failed(
  ctx: PipelineContext,
  entered: PipelineStatus,
  enteredAt: number,
  outcome: Extract<StageOutcome<unknown>, { ok: false }>
): PipelineNodeResult {
  ctx.logger.error({ stage: outcome.failure.stage, kind: outcome.failure.kind }, outcome.failure.message);
  return {
    stateDiff: {
      status: 'FAILED',
      transitions: transitions(ctx, enteredAt, entered, 'FAILED'),
      stageAttempts: attempts(outcome.failure.stage, outcome.attempts),
      failure: outcome.failure
    },
    nextTasks: []
  };
}

function requireAnalysis(state: Readonly<PipelineState>): AnalysisResult {
  if (!state.analysis) {
    throw new Error('Pipeline invariant violated: analysis missing after ANALYZING');
  }
  return state.analysis;
}

function attempts(stage: StageName, count: number): Partial<Record<StageName, number>> {
  const counts: Partial<Record<StageName, number>> = {};
  counts[stage] = count;
  return counts;
}

const analyzing = defineNode<PipelineState, PipelineContext>(async (ctx): Promise<PipelineNodeResult> => {
  const enteredAt = ctx.now();

  const analysis = await ctx.stages.run({
    stage: 'sequence_analysis',
    external: false,
    signal: ctx.signal,
    run: async () => ({ value: unwrap(ctx.analyzer.analyze(ctx.sequence)) })
  });
  if (!analysis.ok) return failed(ctx, 'ANALYZING', enteredAt, analysis);

  let stageAttempts = attempts('sequence_analysis', analysis.attempts);
  let comparison: ComparisonResult | null = null;

  const target = ctx.compareWith;
  if (target !== undefined) {
    const compared = await ctx.stages.run({
      stage: 'sequence_comparison',
      external: false,
      signal: ctx.signal,
      run: async () => ({ value: unwrap(ctx.comparator.compare(analysis.value.sequence, target)) })
    });
    if (!compared.ok) {
      const result = failed(ctx, 'ANALYZING', enteredAt, compared);
      return { ...result, stateDiff: { ...result.stateDiff, analysis: analysis.value, stageAttempts: { ...stageAttempts, ...result.stateDiff.stageAttempts } } };
    }
    stageAttempts = { ...stageAttempts, ...attempts('sequence_comparison', compared.attempts) };
    comparison = compared.value;
  }

  const hasOrfs = analysis.value.orfs.length > 0;
  ctx.logger.info({ length: analysis.value.length, orfs: analysis.value.orfs.length, motifs: analysis.value.motifs.length }, 'Sequence analyzed');

  return {
    stateDiff: {
      status: hasOrfs ? 'ANALYZING' : 'SKIPPED_NO_ORF',
      transitions: hasOrfs
        ? transitions(ctx, enteredAt, 'ANALYZING')
        : transitions(ctx, enteredAt, 'ANALYZING', 'SKIPPED_NO_ORF'),
      stageAttempts,
      analysis: analysis.value,
      comparison
    },
    nextTasks: [hasOrfs ? 'predicting' : 'enriching']
  };
});

const predicting = defineNode<PipelineState, PipelineContext>(async (ctx): Promise<PipelineNodeResult> => {
  const enteredAt = ctx.now();
  const analysis = requireAnalysis(ctx.state);

  const proteins = await ctx.stages.run({
    stage: 'protein_prediction',
    external: false,
    signal: ctx.signal,
    run: async () => ({
      value: analysis.orfs.map((orf, index) => ({
        orfIndex: index,
        orfId: `orf_${index + 1}`,
        profile: unwrap(ctx.predictor.predict(orf.sequence))
      }))
    })
  });
  if (!proteins.ok) return failed(ctx, 'PREDICTING', enteredAt, proteins);

  return {
    stateDiff: {
      status: 'PREDICTING',
      transitions: transitions(ctx, enteredAt, 'PREDICTING'),
      stageAttempts: attempts('protein_prediction', proteins.attempts),
      proteins: proteins.value
    },
    nextTasks: ['enriching']
  };
});

function enrichmentPrompt(state: Readonly<PipelineState>, analysis: AnalysisResult, titles: string[]): string {
  const lines = [
    `Summarize the biological significance of a ${analysis.length} bp ${analysis.sequenceType} sequence.`,
    `GC content: ${analysis.gcPercent}%. ORFs: ${analysis.orfs.length}. Motifs: ${analysis.motifs.map((hit) => hit.name).join(', ') || 'none'}.`
  ];
  for (const protein of state.proteins) {
    lines.push(
      `${protein.orfId}: ${protein.profile.length} aa, ${protein.profile.molecularWeight} Da, GRAVY ${protein.profile.hydrophobicity}` +
      (protein.profile.signalPeptide.predicted ? ', signal peptide predicted' : '')
    );
  }
  if (titles.length > 0) lines.push(`Related literature: ${titles.join('; ')}`);
  return lines.join('\n');
}

const enriching = defineNode<PipelineState, PipelineContext>(async (ctx): Promise<PipelineNodeResult> => {
  const enteredAt = ctx.now();
  const analysis = requireAnalysis(ctx.state);
  const { literature: search, textCompletion } = ctx.collaborators;

  const literature = await ctx.stages.run({
    stage: 'literature_search',
    external: true,
    signal: ctx.signal,
    toolCalls: [TOOL_NAMES.literature],
    run: async (signal) => ({ value: await search.search(buildLiteratureQuery(analysis), { signal }) })
  });
  if (!literature.ok) return failed(ctx, 'ENRICHING', enteredAt, literature);

  const hypotheses = await ctx.stages.run({
    stage: 'hypothesis_synthesis',
    external: false,
    signal: ctx.signal,
    run: async () => ({ value: synthesizeHypotheses(analysis, ctx.state.proteins, ctx.hypothesisConfidenceThreshold) })
  });
  if (!hypotheses.ok) return failed(ctx, 'ENRICHING', enteredAt, hypotheses);

  const titles = literature.value.papers.map((paper) => paper.title);
  const enrichment = await ctx.stages.run({
    stage: 'enrichment_summary',
    external: true,
    signal: ctx.signal,
    toolCalls: [TOOL_NAMES.textCompletion],
    run: async (signal) => {
      const completion = await textCompletion.complete({
        prompt: enrichmentPrompt(ctx.state, analysis, titles),
        history: [],
        systemPrompt: ctx.systemPrompt,
        signal
      });
      return {
        value: completion.text,
        usage: { tokensIn: completion.tokensIn, tokensOut: completion.tokensOut, model: completion.model }
      };
    }
  });
  if (!enrichment.ok) return failed(ctx, 'ENRICHING', enteredAt, enrichment);

  return {
    stateDiff: {
      status: 'ENRICHING',
      transitions: transitions(ctx, enteredAt, 'ENRICHING'),
      stageAttempts: {
        literature_search: literature.attempts,
        hypothesis_synthesis: hypotheses.attempts,
        enrichment_summary: enrichment.attempts
      },
      literature: literature.value,
      hypotheses: hypotheses.value,
      enrichment: enrichment.value
    },
    nextTasks: ['visualizing']
  };
});

const visualizing = defineNode<PipelineState, PipelineContext>(async (ctx): Promise<PipelineNodeResult> => {
  const enteredAt = ctx.now();
  const analysis = requireAnalysis(ctx.state);

  const rendered = await ctx.stages.run({
    stage: 'visualization',
    external: true,
    signal: ctx.signal,
    toolCalls: [TOOL_NAMES.visualizer],
    run: async (signal) => ({
      value: await ctx.collaborators.visualizer.render(
        { runId: ctx.runId, analysis, proteins: [...ctx.state.proteins] },
        { signal }
      )
    })
  });
  if (!rendered.ok) return failed(ctx, 'VISUALIZING', enteredAt, rendered);

  return {
    stateDiff: {
      status: 'VISUALIZING',
      transitions: transitions(ctx, enteredAt, 'VISUALIZING'),
      stageAttempts: attempts('visualization', rendered.attempts),
      plots: rendered.value.plots
    },
    nextTasks: ['reporting']
  };
});

const reporting = defineNode<PipelineState, PipelineContext>(async (ctx): Promise<PipelineNodeResult> => {
  const enteredAt = ctx.now();
  const analysis = requireAnalysis(ctx.state);
  const { state } = ctx;

  const report = await ctx.stages.run({
    stage: 'report_generation',
    external: true,
    signal: ctx.signal,
    toolCalls: [TOOL_NAMES.reports],
    run: async (signal) => ({
      value: await ctx.collaborators.reports.generate(
        {
          runId: ctx.runId,
          analysis,
          proteins: [...state.proteins],
          comparison: state.comparison,
          literature: state.literature ?? { totalResults: 0, papers: [] },
          hypotheses: [...state.hypotheses],
          enrichment: state.enrichment ?? '',
          plots: [...state.plots]
        },
        { signal }
      )
    })
  });
  if (!report.ok) return failed(ctx, 'REPORTING', enteredAt, report);

  return {
    stateDiff: {
      status: 'COMPLETED',
      transitions: transitions(ctx, enteredAt, 'REPORTING', 'COMPLETED'),
      stageAttempts: attempts('report_generation', report.attempts),
      report: report.value
    },
    nextTasks: []
  };
});

export const PIPELINE_NODES = {
  analyzing,
  predicting,
  enriching,
  visualizing,
  reporting
};
