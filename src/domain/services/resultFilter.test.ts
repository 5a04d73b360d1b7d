/**
 * Tests for filtering, sorting and truncation
 */

import { describe, expect, test } from "vitest";
import type { Document, ScoredResult } from "../entities";
import { UnknownSortModeError } from "../entities";
import { paper } from "../../tests/fixtures";
import {
  applyFilters,
  clampLimit,
  matchesFilters,
  parseSortMode,
  selectEntries,
} from "./resultFilter";

const docs: Document[] = [
  paper("old", {
    year: 2018,
    published: "2018-05-01",
    primaryCategory: "cs.CV",
    authors: ["Alice Smith"],
  }),
  paper("early21", {
    year: 2021,
    published: "2021-01-10",
    primaryCategory: "cs.LG",
    authors: ["Bob Jones", "Carol White"],
  }),
  paper("late21", {
    year: 2021,
    published: "2021-06-01",
    primaryCategory: "cs.CL",
    authors: ["Carol White"],
  }),
  paper("new", { year: 2023, published: "2023-02-14", primaryCategory: "cs.LG" }),
];
const byId = new Map(docs.map((d) => [d.id, d]));
const lookup = (id: string) => byId.get(id);

function scored(docId: string, score: number): ScoredResult {
  return { docId, score, matchedTermCount: 1, matchedTerms: ["term"] };
}

// Ranker order: best first
const ranked = [scored("new", 4), scored("old", 3), scored("late21", 2), scored("early21", 1)];

const ids = (results: ScoredResult[]) => results.map((r) => r.docId);

describe("parseSortMode", () => {
  test("accepts known modes", () => {
    expect(parseSortMode("relevance")).toBe("relevance");
    expect(parseSortMode("date_desc")).toBe("date_desc");
    expect(parseSortMode("date_asc")).toBe("date_asc");
  });

  test("rejects anything else", () => {
    expect(() => parseSortMode("newest")).toThrow(UnknownSortModeError);
    expect(() => parseSortMode("newest")).toThrow(
      'Unknown sort mode "newest" (expected one of: relevance, date_desc, date_asc)'
    );
  });
});

describe("clampLimit", () => {
  test("clamps into bounds", () => {
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(-3)).toBe(1);
    expect(clampLimit(1000)).toBe(100);
    expect(clampLimit(25)).toBe(25);
  });

  test("falls back to the default", () => {
    expect(clampLimit(undefined)).toBe(50);
    expect(clampLimit(NaN)).toBe(50);
    expect(clampLimit(undefined, { min: 1, max: 10, default: 5 })).toBe(5);
  });

  test("keeps an out-of-range default inside the bounds", () => {
    expect(clampLimit(undefined, { min: 1, max: 10, default: 50 })).toBe(10);
    expect(clampLimit(NaN, { min: 5, max: 10, default: 2 })).toBe(5);
  });

  test("truncates fractions", () => {
    expect(clampLimit(7.9)).toBe(7);
  });
});

describe("matchesFilters", () => {
  const doc = docs[1];

  test("matches category exactly", () => {
    expect(matchesFilters(doc, { category: "cs.LG" })).toBe(true);
    expect(matchesFilters(doc, { category: "cs.lg" })).toBe(false);
  });

  test("treats year bounds as inclusive", () => {
    expect(matchesFilters(doc, { yearFrom: 2021, yearTo: 2021 })).toBe(true);
    expect(matchesFilters(doc, { yearFrom: 2022 })).toBe(false);
    expect(matchesFilters(doc, { yearTo: 2020 })).toBe(false);
  });

  test("matches author substrings case-insensitively", () => {
    expect(matchesFilters(doc, { author: "carol" })).toBe(true);
    expect(matchesFilters(doc, { author: "JONES, CAROL" })).toBe(true);
    expect(matchesFilters(doc, { author: "smith" })).toBe(false);
  });

  test("passes everything with no filters", () => {
    expect(matchesFilters(doc)).toBe(true);
  });
});

describe("applyFilters", () => {
  test("keeps ranker order for relevance", () => {
    expect(ids(applyFilters(ranked, lookup))).toEqual(["new", "old", "late21", "early21"]);
  });

  test("filters by year range", () => {
    expect(ids(applyFilters(ranked, lookup, { filters: { yearFrom: 2020, yearTo: 2022 } }))).toEqual([
      "late21",
      "early21",
    ]);
  });

  test("returns nothing for an inverted year range", () => {
    expect(applyFilters(ranked, lookup, { filters: { yearFrom: 2023, yearTo: 2018 } })).toEqual([]);
  });

  test("sorts newest first", () => {
    expect(ids(applyFilters(ranked, lookup, { sort: "date_desc" }))).toEqual([
      "new",
      "late21",
      "early21",
      "old",
    ]);
  });

  test("sorts oldest first", () => {
    expect(ids(applyFilters(ranked, lookup, { sort: "date_asc" }))).toEqual([
      "old",
      "early21",
      "late21",
      "new",
    ]);
  });

  test("orders same-date results by score, then id", () => {
    const sameDay = [paper("b"), paper("a"), paper("c")];
    const sameDayLookup = (id: string) => sameDay.find((d) => d.id === id);
    const results = [scored("c", 2), scored("b", 1), scored("a", 1)];

    expect(ids(applyFilters(results, sameDayLookup, { sort: "date_desc" }))).toEqual([
      "c",
      "a",
      "b",
    ]);
  });

  test("drops results whose document is unknown", () => {
    expect(ids(applyFilters([scored("ghost", 9), scored("old", 1)], lookup))).toEqual(["old"]);
  });

  test("truncates to the clamped limit", () => {
    expect(ids(applyFilters(ranked, lookup, { limit: 2 }))).toEqual(["new", "old"]);
    expect(applyFilters(ranked, lookup, { limit: 0 })).toHaveLength(1);
  });
});

describe("selectEntries", () => {
  test("counts matches before truncation", () => {
    const { page, totalMatches, limit } = selectEntries(ranked, lookup, {
      filters: { category: "cs.LG" },
      limit: 1,
    });
    expect(totalMatches).toBe(2);
    expect(limit).toBe(1);
    expect(page.map((e) => e.doc.id)).toEqual(["new"]);
  });
});
