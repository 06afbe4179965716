import type { MotifHit, MotifPattern } from '@helix/core';

const IUPAC_CLASSES: Record<string, string> = {
  A: 'A',
  C: 'C',
  G: 'G',
  T: 'T',
  U: 'T',
  R: '[AG]',
  Y: '[CT]',
  K: '[GT]',
  M: '[AC]',
  S: '[CG]',
  W: '[AT]',
  B: '[CGT]',
  D: '[AGT]',
  H: '[ACT]',
  V: '[ACG]',
  N: '[ACGTN]'
};

export interface CompiledMotif {
  name: string;
  pattern: string;
  regex: RegExp;
}

export function compileMotif(motif: MotifPattern): CompiledMotif {
  const source = [...motif.pattern.toUpperCase()]
    .map((code) => {
      const cls = IUPAC_CLASSES[code];
      if (cls === undefined) {
        throw new TypeError(`Motif ${motif.name}: unknown IUPAC code '${code}'`);
      }
      return cls;
    })
    .join('');
  return { name: motif.name, pattern: motif.pattern, regex: new RegExp(source, 'g') };
}

/**
 * Non-overlapping hits of every motif on the DNA form of `sequence`, ordered by
 * position. Hits at the same position keep the motif table order.
 */
export function scanMotifs(sequence: string, motifs: readonly CompiledMotif[]): MotifHit[] {
  const dna = sequence.replace(/U/g, 'T');
  const hits: MotifHit[] = [];

  for (const motif of motifs) {
    for (const found of dna.matchAll(motif.regex)) {
      const position = found.index ?? 0;
      hits.push({ name: motif.name, position, match: sequence.slice(position, position + found[0].length) });
    }
  }

  return hits.sort((a, b) => a.position - b.position);
}
