import { describe, expect, it } from "vitest";
import { SequenceComparator } from "../src/index";

describe("SequenceComparator", () => {
  const comparator = new SequenceComparator();

  it("aligns identical sequences", () => {
    const result = comparator.compare("ACGTACGT", "acgt acgt");
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value).toEqual({
      mode: "global",
      alignment: { query: "ACGTACGT", matches: "||||||||", target: "ACGTACGT" },
      alignmentLength: 8,
      score: 16,
      identityPercent: 100,
      similarityPercent: 100,
      homology: "high",
    });
  });

  it("marks transitions as partial matches", () => {
    const result = comparator.compare("ACGT", "ATGT");
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.alignment.matches).toBe("|:||");
    expect(result.value.score).toBe(5);
    expect(result.value.identityPercent).toBe(75);
    expect(result.value.similarityPercent).toBe(87.5);
  });

  it("counts gap columns as mismatches", () => {
    const result = comparator.compare("ACGTT", "ACGT");
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.alignment).toEqual({ query: "ACGTT", matches: "||| |", target: "ACG-T" });
    expect(result.value.score).toBe(6);
    expect(result.value.identityPercent).toBe(80);
  });

  it("reports low homology for unrelated sequences", () => {
    const result = comparator.compare("AAAA", "CCCC");
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.alignment.matches).toBe("    ");
    expect(result.value.score).toBe(-4);
    expect(result.value.identityPercent).toBe(0);
    expect(result.value.homology).toBe("low");
  });

  it("finds the best local alignment", () => {
    const result = comparator.compare("TTACGTTT", "GGACGTGG", "local");
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.mode).toBe("local");
    expect(result.value.alignment).toEqual({ query: "ACGT", matches: "||||", target: "ACGT" });
    expect(result.value.score).toBe(8);
  });

  it("reads U as T", () => {
    const result = comparator.compare("ACGU", "ACGT");
    expect(result.ok && result.value.identityPercent).toBe(100);
  });

  it("rejects invalid input", () => {
    const result = comparator.compare("ACGT", "AXGT");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.invalidCharacters).toEqual(["X"]);
  });

  it("labels homology from similarity rather than identity", () => {
    const result = comparator.compare("AAAAAAAAAA", "AAAAAAGGGG");
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.alignment.matches).toBe("||||||::::");
    expect(result.value.identityPercent).toBe(60);
    expect(result.value.similarityPercent).toBe(80);
    expect(result.value.homology).toBe("high");
  });

  it("labels similarity at the thresholds", () => {
    expect(comparator.homologyLabel(70)).toBe("high");
    expect(comparator.homologyLabel(69.9)).toBe("moderate");
    expect(comparator.homologyLabel(40)).toBe("moderate");
    expect(comparator.homologyLabel(39.9)).toBe("low");
  });
});
