import { z } from 'zod';

import aminoAcidsJson from './data/amino-acids.json';
import geneticCodeJson from './data/genetic-code.json';

const geneticCodeSchema = z.object({
  name: z.string(),
  stopSymbol: z.string().length(1),
  unknownSymbol: z.string().length(1),
  codons: z.record(z.string().regex(/^[ACGT]{3}$/), z.string().length(1))
});

const residueTableSchema = z.object({
  waterMass: z.number().positive(),
  residues: z.record(
    z.string().length(1),
    z.object({ mass: z.number().positive(), hydropathy: z.number() })
  )
});

export type GeneticCode = z.infer<typeof geneticCodeSchema>;
export type ResidueTable = z.infer<typeof residueTableSchema>;

export function parseGeneticCode(raw: unknown): GeneticCode {
  const code = geneticCodeSchema.parse(raw);
  const size = Object.keys(code.codons).length;
  if (size !== 64) {
    throw new TypeError(`Genetic code ${code.name} must map 64 codons, got ${size}`);
  }
  return code;
}

export function parseResidueTable(raw: unknown): ResidueTable {
  return residueTableSchema.parse(raw);
}

/** NCBI translation table 1. */
export const STANDARD_GENETIC_CODE: GeneticCode = parseGeneticCode(geneticCodeJson);

/** Average residue masses (Da) and Kyte-Doolittle hydropathy. */
export const DEFAULT_RESIDUES: ResidueTable = parseResidueTable(aminoAcidsJson);
