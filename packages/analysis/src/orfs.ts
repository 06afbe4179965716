import type { Orf } from '@helix/core';

import { reverseComplement, toDnaForm } from './sequence';

export const START_CODON = 'ATG';
export const STOP_CODONS = new Set(['TAA', 'TAG', 'TGA']);

export interface OrfScanOptions {
  minLength: number;
  scanReverseStrand: boolean;
}

interface StrandHit {
  start: number;
  end: number;
}

/** Every ATG read in codon steps up to the first in-frame stop, stop included. */
function scanStrand(dna: string): StrandHit[] {
  const hits: StrandHit[] = [];
  for (let start = dna.indexOf(START_CODON); start !== -1; start = dna.indexOf(START_CODON, start + 1)) {
    for (let pos = start + 3; pos + 3 <= dna.length; pos += 3) {
      if (STOP_CODONS.has(dna.slice(pos, pos + 3))) {
        hits.push({ start, end: pos + 3 });
        break;
      }
    }
  }
  return hits;
}

/**
 * Finds open reading frames. Coordinates are 0-based, half-open and always on
 * the forward strand; reverse-strand ORFs carry the reverse-complement sequence
 * and a negative frame.
 */
export function findOrfs(sequence: string, options: OrfScanOptions): Orf[] {
  const dna = toDnaForm(sequence);
  const orfs: Orf[] = scanStrand(dna).map(({ start, end }) => ({
    start,
    end,
    length: end - start,
    sequence: sequence.slice(start, end),
    frame: (start % 3) + 1,
    strand: 'forward'
  }));

  if (options.scanReverseStrand) {
    const reverse = reverseComplement(dna);
    for (const { start, end } of scanStrand(reverse)) {
      orfs.push({
        start: dna.length - end,
        end: dna.length - start,
        length: end - start,
        sequence: reverse.slice(start, end),
        frame: -((start % 3) + 1),
        strand: 'reverse'
      });
    }
  }

  return orfs
    .filter((orf) => orf.length >= options.minLength)
    .sort((a, b) => a.start - b.start || a.frame - b.frame);
}
