import {
  type AlignmentMode,
  type ComparisonConfig,
  type ComparisonResult,
  type HomologyLabel,
  type InvalidSequenceError,
  type Result,
  COMPARISON_DEFAULTS,
  SEQUENCE_LIMITS,
  ok
} from '@helix/core';

import { parseNucleotides, roundTo, toDnaForm } from './sequence';

export interface SequenceComparatorOptions {
  maxComparisonLength?: number;
  comparison?: Partial<ComparisonConfig>;
}

// Traceback moves, stored per cell while filling the matrix.
const STOP = 0;
const DIAGONAL = 1;
const GAP_IN_TARGET = 2;
const GAP_IN_QUERY = 3;

const TRANSITIONS = new Set(['AG', 'GA', 'CT', 'TC']);

function isPartialMatch(a: string, b: string): boolean {
  return a === 'N' || b === 'N' || TRANSITIONS.has(a + b);
}

interface AlignedRows {
  query: string;
  target: string;
  score: number;
}

/**
 * Pairwise nucleotide alignment with a linear gap penalty: Needleman-Wunsch for
 * `global`, Smith-Waterman for `local`. Ties in the traceback prefer the
 * diagonal, then a gap in the target, then a gap in the query.
 */
export class SequenceComparator {
  private readonly maxComparisonLength: number;
  private readonly config: ComparisonConfig;

  public constructor(options: SequenceComparatorOptions = {}) {
    this.maxComparisonLength = options.maxComparisonLength ?? SEQUENCE_LIMITS.MAX_COMPARISON_LENGTH;
    this.config = {
      mode: options.comparison?.mode ?? COMPARISON_DEFAULTS.MODE,
      match: options.comparison?.match ?? COMPARISON_DEFAULTS.MATCH,
      mismatch: options.comparison?.mismatch ?? COMPARISON_DEFAULTS.MISMATCH,
      gap: options.comparison?.gap ?? COMPARISON_DEFAULTS.GAP,
      partialMatchWeight: options.comparison?.partialMatchWeight ?? COMPARISON_DEFAULTS.PARTIAL_MATCH_WEIGHT,
      highHomologyThreshold: options.comparison?.highHomologyThreshold ?? COMPARISON_DEFAULTS.HIGH_HOMOLOGY,
      moderateHomologyThreshold:
        options.comparison?.moderateHomologyThreshold ?? COMPARISON_DEFAULTS.MODERATE_HOMOLOGY
    };
  }

  public compare(
    query: string,
    target: string,
    mode: AlignmentMode = this.config.mode
  ): Result<ComparisonResult, InvalidSequenceError> {
    const parsedQuery = parseNucleotides(query, this.maxComparisonLength);
    if (!parsedQuery.ok) return parsedQuery;
    const parsedTarget = parseNucleotides(target, this.maxComparisonLength);
    if (!parsedTarget.ok) return parsedTarget;

    const rows = this.align(toDnaForm(parsedQuery.value), toDnaForm(parsedTarget.value), mode);

    let identical = 0;
    let partial = 0;
    let matches = '';
    for (let i = 0; i < rows.query.length; i += 1) {
      const a = rows.query.charAt(i);
      const b = rows.target.charAt(i);
      if (a === '-' || b === '-') {
        matches += ' ';
      } else if (a === b) {
        identical += 1;
        matches += '|';
      } else if (isPartialMatch(a, b)) {
        partial += 1;
        matches += ':';
      } else {
        matches += ' ';
      }
    }

    const alignmentLength = rows.query.length;
    const identityPercent = alignmentLength > 0 ? roundTo((identical / alignmentLength) * 100, 1) : 0;
    const similarityPercent = alignmentLength > 0
      ? roundTo(((identical + this.config.partialMatchWeight * partial) / alignmentLength) * 100, 1)
      : 0;

    return ok({
      mode,
      alignment: { query: rows.query, matches, target: rows.target },
      alignmentLength,
      score: rows.score,
      identityPercent,
      similarityPercent,
      homology: this.homologyLabel(similarityPercent)
    });
  }

  /** Labels a similarity percentage against the configured thresholds. */
  public homologyLabel(similarityPercent: number): HomologyLabel {
    if (similarityPercent >= this.config.highHomologyThreshold) return 'high';
    if (similarityPercent >= this.config.moderateHomologyThreshold) return 'moderate';
    return 'low';
  }

  private align(query: string, target: string, mode: AlignmentMode): AlignedRows {
    const { match, mismatch, gap } = this.config;
    const local = mode === 'local';
    const n = query.length;
    const m = target.length;
    const width = m + 1;
    const moves = new Uint8Array((n + 1) * width);

    let previous = new Float64Array(width);
    let current = new Float64Array(width);

    for (let j = 1; j <= m; j += 1) {
      previous[j] = local ? 0 : j * gap;
      moves[j] = local ? STOP : GAP_IN_QUERY;
    }

    let bestScore = 0;
    let bestI = 0;
    let bestJ = 0;

    for (let i = 1; i <= n; i += 1) {
      current[0] = local ? 0 : i * gap;
      moves[i * width] = local ? STOP : GAP_IN_TARGET;
      const a = query.charAt(i - 1);

      for (let j = 1; j <= m; j += 1) {
        const diagonal = (previous[j - 1] ?? 0) + (a === target.charAt(j - 1) ? match : mismatch);
        const up = (previous[j] ?? 0) + gap;
        const left = (current[j - 1] ?? 0) + gap;

        let score = diagonal;
        let move = DIAGONAL;
        if (up > score) {
          score = up;
          move = GAP_IN_TARGET;
        }
        if (left > score) {
          score = left;
          move = GAP_IN_QUERY;
        }
        if (local && score <= 0) {
          score = 0;
          move = STOP;
        }

        current[j] = score;
        moves[i * width + j] = move;

        if (local && score > bestScore) {
          bestScore = score;
          bestI = i;
          bestJ = j;
        }
      }

      [previous, current] = [current, previous];
    }

    let i = local ? bestI : n;
    let j = local ? bestJ : m;
    const score = local ? bestScore : (previous[m] ?? 0);

    const alignedQuery: string[] = [];
    const alignedTarget: string[] = [];

    while (i > 0 || j > 0) {
      const move = moves[i * width + j];
      if (move === DIAGONAL) {
        alignedQuery.push(query.charAt(i - 1));
        alignedTarget.push(target.charAt(j - 1));
        i -= 1;
        j -= 1;
      } else if (move === GAP_IN_TARGET) {
        alignedQuery.push(query.charAt(i - 1));
        alignedTarget.push('-');
        i -= 1;
      } else if (move === GAP_IN_QUERY) {
        alignedQuery.push('-');
        alignedTarget.push(target.charAt(j - 1));
        j -= 1;
      } else {
        break;
      }
    }

    return {
      query: alignedQuery.reverse().join(''),
      target: alignedTarget.reverse().join(''),
      score
    };
  }
}
