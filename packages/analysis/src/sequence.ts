import { type Result, InvalidSequenceError, err, ok } from '@helix/core';

export const NUCLEOTIDE_ALPHABET = new Set(['A', 'T', 'C', 'G', 'U', 'N']);

const COMPLEMENT: Record<string, string> = { A: 'T', T: 'A', C: 'G', G: 'C', N: 'N' };

/** Uppercases and drops whitespace and digits (pasted FASTA bodies, GenBank numbering). */
export function normalizeSequence(raw: string): string {
  return raw.replace(/[\s\d]+/g, '').toUpperCase();
}

/** DNA form used for codon and pattern work. */
export function toDnaForm(sequence: string): string {
  return sequence.replace(/U/g, 'T');
}

export function reverseComplement(dna: string): string {
  let out = '';
  for (let i = dna.length - 1; i >= 0; i -= 1) {
    const base = dna.charAt(i);
    out += COMPLEMENT[base] ?? 'N';
  }
  return out;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Normalizes `raw` and checks it against the nucleotide alphabet and the length
 * bound. The error lists each offending character once, in order of appearance.
 */
export function parseNucleotides(raw: string, maxLength: number): Result<string, InvalidSequenceError> {
  const sequence = normalizeSequence(raw);
  if (sequence.length === 0) {
    return err(new InvalidSequenceError('Sequence is empty'));
  }

  const invalid = [...new Set([...sequence].filter((char) => !NUCLEOTIDE_ALPHABET.has(char)))];
  if (invalid.length > 0) {
    return err(new InvalidSequenceError(`Invalid characters in sequence: ${invalid.join(', ')}`, invalid));
  }

  if (sequence.length > maxLength) {
    return err(new InvalidSequenceError(`Sequence length ${sequence.length} exceeds the maximum of ${maxLength}`));
  }

  return ok(sequence);
}
