import {
  type ProteinProfile,
  type Result,
  type SignalPeptideConfig,
  type SignalPeptidePrediction,
  InvalidOrfError,
  SIGNAL_PEPTIDE_DEFAULTS,
  err,
  ok
} from '@helix/core';

import { roundTo } from './sequence';
import { type GeneticCode, type ResidueTable, DEFAULT_RESIDUES, STANDARD_GENETIC_CODE } from './tables';

export interface ProteinPredictorOptions {
  signalPeptide?: Partial<SignalPeptideConfig>;
  geneticCode?: GeneticCode;
  residues?: ResidueTable;
}

const POSITIVE_RESIDUES = new Set(['K', 'R']);
const NEGATIVE_RESIDUES = new Set(['D', 'E']);

function netCharge(peptide: string): number {
  let charge = 0;
  for (const residue of peptide) {
    if (POSITIVE_RESIDUES.has(residue)) charge += 1;
    else if (NEGATIVE_RESIDUES.has(residue)) charge -= 1;
  }
  return charge;
}

export class ProteinPredictor {
  private readonly signalPeptide: SignalPeptideConfig;
  private readonly geneticCode: GeneticCode;
  private readonly residues: ResidueTable;
  /** Mass used for residues the table does not know (X). */
  private readonly meanResidueMass: number;

  public constructor(options: ProteinPredictorOptions = {}) {
    this.signalPeptide = {
      window: options.signalPeptide?.window ?? SIGNAL_PEPTIDE_DEFAULTS.WINDOW,
      nRegionLength: options.signalPeptide?.nRegionLength ?? SIGNAL_PEPTIDE_DEFAULTS.N_REGION_LENGTH,
      hydrophobicityThreshold:
        options.signalPeptide?.hydrophobicityThreshold ?? SIGNAL_PEPTIDE_DEFAULTS.HYDROPHOBICITY_THRESHOLD,
      minNRegionCharge: options.signalPeptide?.minNRegionCharge ?? SIGNAL_PEPTIDE_DEFAULTS.MIN_N_REGION_CHARGE
    };
    this.geneticCode = options.geneticCode ?? STANDARD_GENETIC_CODE;
    this.residues = options.residues ?? DEFAULT_RESIDUES;

    const masses = Object.values(this.residues.residues).map((entry) => entry.mass);
    this.meanResidueMass = masses.length > 0 ? masses.reduce((sum, mass) => sum + mass, 0) / masses.length : 0;
  }

  /**
   * Reads codons until the first stop. Trailing bases that do not fill a codon
   * are ignored.
   */
  public translate(dna: string): string {
    let protein = '';
    for (let i = 0; i + 3 <= dna.length; i += 3) {
      const residue = this.geneticCode.codons[dna.slice(i, i + 3)] ?? this.geneticCode.unknownSymbol;
      if (residue === this.geneticCode.stopSymbol) break;
      protein += residue;
    }
    return protein;
  }

  public predict(orfSequence: string): Result<ProteinProfile, InvalidOrfError> {
    const dna = orfSequence.replace(/\s+/g, '').toUpperCase().replace(/U/g, 'T');

    if (!dna.startsWith('ATG')) {
      return err(new InvalidOrfError('ORF must start with the ATG start codon'));
    }
    if (dna.length % 3 !== 0) {
      return err(new InvalidOrfError(`ORF length ${dna.length} is not a multiple of 3`));
    }

    const protein = this.translate(dna);

    return ok({
      aminoAcidSequence: protein,
      length: protein.length,
      molecularWeight: this.molecularWeight(protein),
      hydrophobicity: this.gravy(protein),
      signalPeptide: this.predictSignalPeptide(protein)
    });
  }

  /** Average residue masses plus one water for the free termini. */
  public molecularWeight(protein: string): number {
    if (protein.length === 0) return 0;
    let mass = this.residues.waterMass;
    for (const residue of protein) {
      mass += this.residues.residues[residue]?.mass ?? this.meanResidueMass;
    }
    return roundTo(mass, 2);
  }

  /** Grand average of hydropathy. */
  public gravy(protein: string): number {
    if (protein.length === 0) return 0;
    return roundTo(this.hydropathySum(protein) / protein.length, 2);
  }

  public predictSignalPeptide(protein: string): SignalPeptidePrediction {
    const { window, nRegionLength, hydrophobicityThreshold, minNRegionCharge } = this.signalPeptide;
    const hRegion = protein.slice(nRegionLength, window);
    const hRegionHydrophobicity = hRegion.length > 0 ? roundTo(this.hydropathySum(hRegion) / hRegion.length, 2) : 0;
    const nRegionCharge = netCharge(protein.slice(0, nRegionLength));

    return {
      predicted:
        protein.length >= window &&
        hRegionHydrophobicity >= hydrophobicityThreshold &&
        nRegionCharge >= minNRegionCharge,
      hRegionHydrophobicity,
      nRegionCharge
    };
  }

  private hydropathySum(peptide: string): number {
    let sum = 0;
    for (const residue of peptide) {
      sum += this.residues.residues[residue]?.hydropathy ?? 0;
    }
    return sum;
  }
}
