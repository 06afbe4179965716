import type { AnalysisResult, Hypothesis, ProteinPrediction } from '@helix/core';

/** GRAVY above this counts as a hydrophobic protein. */
export const HYDROPHOBIC_GRAVY = 0.5;

const PROMOTER_MOTIFS = new Set(['TATA_box', 'CAAT_box']);

interface HypothesisRule {
  confidence: number;
  statement: string;
  suggestedExperiments: string[];
  /** Returns the evidence line when the rule fires. */
  evaluate(analysis: AnalysisResult, proteins: readonly ProteinPrediction[]): string | null;
}

const RULES: readonly HypothesisRule[] = [
  {
    confidence: 0.85,
    statement: 'This sequence contains transcriptional regulatory elements that may control gene expression',
    suggestedExperiments: ['Promoter activity assay', 'ChIP-seq analysis', 'Mutagenesis study'],
    evaluate(analysis) {
      const found = [...new Set(analysis.motifs.map((hit) => hit.name).filter((name) => PROMOTER_MOTIFS.has(name)))];
      return found.length > 0 ? `Promoter elements present: ${found.join(', ')}` : null;
    }
  },
  {
    confidence: 0.78,
    statement: 'The encoded protein may be secreted or membrane-associated',
    suggestedExperiments: ['Protein localization studies', 'Western blot analysis', 'Immunofluorescence'],
    evaluate(_analysis, proteins) {
      const signal = proteins.filter((protein) => protein.profile.signalPeptide.predicted);
      if (signal.length > 0) {
        return `Signal peptide predicted for ${signal.map((protein) => protein.orfId).join(', ')}`;
      }
      const hydrophobic = proteins.filter((protein) => protein.profile.hydrophobicity > HYDROPHOBIC_GRAVY);
      if (hydrophobic.length > 0) {
        return `High hydrophobicity for ${hydrophobic.map((protein) => protein.orfId).join(', ')}`;
      }
      return null;
    }
  },
  {
    confidence: 0.75,
    statement: 'This sequence encodes a functional protein with potential biological activity',
    suggestedExperiments: ['Protein expression and purification', 'Functional assays', 'Structural analysis'],
    evaluate(analysis) {
      const count = analysis.orfs.length;
      return count > 0 ? `${count} open reading frame${count === 1 ? '' : 's'} with start and stop codons` : null;
    }
  }
];

const FALLBACK: Hypothesis = {
  statement: 'This sequence represents a genomic region requiring further characterization',
  confidence: 0.6,
  evidence: 'Basic sequence features identified, detailed function unclear',
  suggestedExperiments: ['RNA-seq analysis', 'Conservation analysis', 'Database homology searches']
};

/**
 * Rule-based hypotheses over the analysis and protein predictions. The generic
 * hypothesis is used only when no rule fires; the threshold applies to both.
 */
export function synthesizeHypotheses(
  analysis: AnalysisResult,
  proteins: readonly ProteinPrediction[],
  confidenceThreshold: number
): Hypothesis[] {
  const hypotheses: Hypothesis[] = [];
  for (const rule of RULES) {
    const evidence = rule.evaluate(analysis, proteins);
    if (evidence !== null) {
      hypotheses.push({
        statement: rule.statement,
        confidence: rule.confidence,
        evidence,
        suggestedExperiments: [...rule.suggestedExperiments]
      });
    }
  }

  if (hypotheses.length === 0) {
    hypotheses.push({ ...FALLBACK, suggestedExperiments: [...FALLBACK.suggestedExperiments] });
  }

  return hypotheses.filter((hypothesis) => hypothesis.confidence >= confidenceThreshold);
}

/** Literature query built from the strongest signals in the analysis. */
export function buildLiteratureQuery(analysis: AnalysisResult): string {
  const terms = [...new Set(analysis.motifs.map((hit) => hit.name.replace(/_/g, ' ')))];
  if (analysis.orfs.length > 0) terms.push('open reading frame');
  if (terms.length === 0) terms.push(analysis.sequenceType === 'RNA' ? 'RNA sequence' : 'DNA sequence');
  return `${terms.join(' ')} gene function`;
}
