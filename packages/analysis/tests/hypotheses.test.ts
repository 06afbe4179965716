import { describe, expect, it } from "vitest";
import { unwrap } from "@helix/core";
import {
  STANDARD_GENETIC_CODE,
  SequenceAnalyzer,
  buildLiteratureQuery,
  parseGeneticCode,
  synthesizeHypotheses,
} from "../src/index";

const analyzer = new SequenceAnalyzer();

describe("synthesizeHypotheses", () => {
  it("fires the promoter and coding rules", () => {
    const analysis = unwrap(analyzer.analyze("TATAAAATGAAATAA"));
    const hypotheses = synthesizeHypotheses(analysis, [], 0.5);

    expect(hypotheses.map((h) => h.confidence)).toEqual([0.85, 0.75]);
    expect(hypotheses[0]?.evidence).toBe("Promoter elements present: TATA_box");
    expect(hypotheses[1]?.evidence).toBe("1 open reading frame with start and stop codons");
    expect(hypotheses[0]?.suggestedExperiments).toEqual([
      "Promoter activity assay",
      "ChIP-seq analysis",
      "Mutagenesis study",
    ]);
  });

  it("filters by the confidence threshold", () => {
    const analysis = unwrap(analyzer.analyze("TATAAAATGAAATAA"));
    expect(synthesizeHypotheses(analysis, [], 0.8).map((h) => h.confidence)).toEqual([0.85]);
  });

  it("falls back to a generic hypothesis when no rule fires", () => {
    const analysis = unwrap(analyzer.analyze("GGGGCCCC"));
    const hypotheses = synthesizeHypotheses(analysis, [], 0.5);
    expect(hypotheses).toHaveLength(1);
    expect(hypotheses[0]?.confidence).toBe(0.6);
    expect(synthesizeHypotheses(analysis, [], 0.7)).toEqual([]);
  });

  it("builds a literature query from motifs and ORFs", () => {
    const analysis = unwrap(analyzer.analyze("TATAAAATGAAATAA"));
    expect(buildLiteratureQuery(analysis)).toBe("TATA box open reading frame gene function");
    expect(buildLiteratureQuery(unwrap(analyzer.analyze("GGGG")))).toBe("DNA sequence gene function");
  });
});

describe("genetic code table", () => {
  it("maps all 64 codons with stop symbols", () => {
    expect(Object.keys(STANDARD_GENETIC_CODE.codons)).toHaveLength(64);
    expect(STANDARD_GENETIC_CODE.codons["TAA"]).toBe("_");
    expect(STANDARD_GENETIC_CODE.codons["ATG"]).toBe("M");
  });

  it("rejects incomplete tables", () => {
    expect(() => parseGeneticCode({ name: "broken", stopSymbol: "_", unknownSymbol: "X", codons: { ATG: "M" } }))
      .toThrow("Genetic code broken must map 64 codons, got 1");
  });
});
