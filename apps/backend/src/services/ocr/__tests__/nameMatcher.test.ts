import { describe, it, expect } from "vitest";
import { fuzzyMatch, nameSimilarity, normalizeName } from "../nameMatcher";
import type { DrugNameEntry } from "../../../domain/catalog";

describe("normalizeName", () => {
  it("lower-cases and strips whitespace", () => {
    expect(normalizeName("  Vitamin C\tTablets ")).toBe("vitaminctablets");
  });
});

describe("nameSimilarity", () => {
  it("scores containment in either direction as 0.9", () => {
    expect(nameSimilarity("Aspirin Tablets", "aspirin")).toBe(0.9);
    expect(nameSimilarity("aspirin", "Aspirin Tablets")).toBe(0.9);
    expect(nameSimilarity("阿司匹林肠溶片", "阿司匹林")).toBe(0.9);
  });

  it("falls back to character-set Jaccard", () => {
    expect(nameSimilarity("abc", "bcd")).toBe(0.5);
    expect(nameSimilarity("abc", "xyz")).toBe(0);
  });

  it("scores blank input as 0", () => {
    expect(nameSimilarity("", "aspirin")).toBe(0);
    expect(nameSimilarity("   ", "aspirin")).toBe(0);
    expect(nameSimilarity("aspirin", "")).toBe(0);
  });
});

describe("fuzzyMatch", () => {
  const names: DrugNameEntry[] = [
    { id: 1, chinese_name: "甲药", english_name: "abc" },
    { id: 2, chinese_name: "乙药", english_name: "bcd" },
    { id: 3, chinese_name: "阿司匹林", english_name: null },
  ];

  it("keeps each drug's best line, ranked by combined confidence", () => {
    const matches = fuzzyMatch(
      [
        { text: "abc", confidence: 0.5 },
        { text: "ABC tablets", confidence: 1 },
      ],
      names
    );

    expect(matches.map((m) => [m.drugId, m.matchedText, m.nameSimilarity])).toEqual([
      [1, "ABC tablets", 0.9],
      [2, "abc", 0.5],
    ]);
    expect(matches[0].confidence).toBeCloseTo(0.96, 10);
    expect(matches[1].confidence).toBeCloseTo(0.5, 10);
  });

  it("matches on the chinese name when there is no english one", () => {
    const matches = fuzzyMatch([{ text: "阿司匹林肠溶片", confidence: 0.8 }], names);

    expect(matches.map((m) => m.drugId)).toEqual([3]);
    expect(matches[0].confidence).toBeCloseTo(0.84, 10);
  });

  it("drops names below the similarity floor", () => {
    expect(fuzzyMatch([{ text: "xyz", confidence: 1 }], names)).toEqual([]);
    expect(fuzzyMatch([{ text: "abc", confidence: 1 }], names, { minNameSimilarity: 0.6 }).map((m) => m.drugId)).toEqual([1]);
  });

  it("caps matches per line and breaks ties by drug id", () => {
    const letters: DrugNameEntry[] = [3, 1, 2].map((id) => ({
      id,
      chinese_name: `药${id}`,
      english_name: String.fromCharCode(96 + id),
    }));

    const matches = fuzzyMatch([{ text: "abc", confidence: 1 }], letters, { perLine: 2 });

    expect(matches.map((m) => m.drugId)).toEqual([1, 2]);
  });

  it("returns nothing for no lines", () => {
    expect(fuzzyMatch([], names)).toEqual([]);
  });
});
