import { describe, expect, test } from "vitest";
import { paper } from "../../tests/fixtures";
import { corpusFacets, summarizeCorpus } from "./corpusSummary";

const docs = [
  paper("a", { primaryCategory: "cs.LG", year: 2019 }),
  paper("b", { primaryCategory: "cs.CV", year: 2023 }),
  paper("c", { primaryCategory: "cs.LG", year: 2021 }),
  paper("d", { primaryCategory: "", year: 2020 }),
];

describe("summarizeCorpus", () => {
  test("counts documents per primary category", () => {
    expect(summarizeCorpus(docs)).toEqual({
      totalDocuments: 4,
      categories: { "cs.LG": 2, "cs.CV": 1 },
      yearRange: [2019, 2023],
    });
  });

  test("counts categories named like object properties", () => {
    const { categories } = summarizeCorpus([
      paper("a", { primaryCategory: "constructor" }),
      paper("b", { primaryCategory: "__proto__" }),
      paper("c", { primaryCategory: "constructor" }),
    ]);

    expect(categories["constructor"]).toBe(2);
    expect(categories["__proto__"]).toBe(1);
    expect(Object.keys(categories)).toEqual(["constructor", "__proto__"]);
  });

  test("has no year range for an empty corpus", () => {
    expect(summarizeCorpus([])).toEqual({ totalDocuments: 0, categories: {}, yearRange: null });
  });
});

describe("corpusFacets", () => {
  test("lists categories in sorted order", () => {
    expect(corpusFacets(docs)).toEqual({
      categories: ["cs.CV", "cs.LG"],
      yearRange: [2019, 2023],
    });
  });
});
