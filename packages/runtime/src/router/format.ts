import type { ErrorKind } from '@helix/core';

import type { PipelineFailure, PipelineSuccess } from '../pipeline/orchestrator';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function formatRunSummary(run: PipelineSuccess): string {
  const { analysis } = run;
  const motifs = [...new Set(analysis.motifs.map((hit) => hit.name))];

  const lines = [
    `Analysis complete for a ${analysis.length} bp ${analysis.sequenceType} sequence.`,
    `GC content: ${analysis.gcPercent}%`,
    `Open reading frames: ${analysis.orfs.length}`,
    `Motifs: ${motifs.length > 0 ? motifs.join(', ') : 'none'}`
  ];

  if (run.comparison) {
    lines.push(
      `Comparison: ${run.comparison.identityPercent}% identity, ${run.comparison.similarityPercent}% similarity (${run.comparison.homology} homology)`
    );
  }
  if (run.proteins.length > 0) {
    const signal = run.proteins.filter((protein) => protein.profile.signalPeptide.predicted).length;
    lines.push(`Proteins: ${plural(run.proteins.length, 'prediction')}, ${signal} with a signal peptide`);
  }
  lines.push(`Literature: ${plural(run.literature.totalResults, 'paper')} found`);
  for (const hypothesis of run.hypotheses) {
    lines.push(`Hypothesis (${Math.round(hypothesis.confidence * 100)}%): ${hypothesis.statement}`);
  }
  if (run.enrichment.trim()) {
    lines.push('', run.enrichment.trim());
  }
  lines.push('', `Report: ${run.artifacts.report.reportPath}`);
  if (run.sessionError) {
    lines.push(`Session not updated: ${run.sessionError.message}`);
  }

  return lines.join('\n');
}

const FAILURE_MESSAGES = {
  validation: 'That sequence could not be analyzed',
  not_found: 'The analysis could not find what it needed',
  transient: 'The analysis hit a temporary problem; please try again shortly',
  permanent: 'The analysis failed',
  cancelled: 'The analysis was cancelled'
} as const;

const CONVERSATION_FAILURE_MESSAGES = {
  validation: 'I could not answer that message',
  not_found: 'I could not answer that message',
  transient: 'The assistant is temporarily unavailable; please try again shortly',
  permanent: 'I could not answer that message',
  cancelled: 'The reply was cancelled'
} as const;

/** Reply stored in the session when a conversation turn fails. */
export function formatConversationFailure(kind: ErrorKind): string {
  return CONVERSATION_FAILURE_MESSAGES[kind];
}

export function formatRunFailure(run: PipelineFailure): string {
  return `${FAILURE_MESSAGES[run.error.kind]} (stage: ${run.stage}): ${run.error.message}`;
}
