/**
 * Ranking properties that must hold for any corpus and query
 */

import { describe, expect, test } from "vitest";
import type { Document } from "../domain/entities";
import {
  QueryExpander,
  applyFilters,
  buildIndex,
  scoreQuery,
} from "../domain/services";
import { searchPapers } from "../domain/usecases";
import { SCENARIO_LEXICON, TEST_SETTINGS, paper } from "./fixtures";

const WORDS = [
  "graph",
  "neural",
  "network",
  "vision",
  "language",
  "model",
  "quantum",
  "robotics",
  "privacy",
  "learning",
];
const CATEGORIES = ["cs.LG", "cs.CV", "cs.CL"];

/** 120 papers, each titled "study of" plus three vocabulary words */
function generateCorpus(): Document[] {
  return Array.from({ length: 120 }, (_, i) => {
    const year = 2015 + (i % 9);
    return paper(`p${String(i).padStart(3, "0")}`, {
      title: `study of ${WORDS[i % 10]} ${WORDS[(i * 3) % 10]} ${WORDS[(i * 7) % 10]}`,
      primaryCategory: CATEGORIES[i % 3],
      categories: [CATEGORIES[i % 3]],
      year,
      published: `${year}-06-01`,
    });
  });
}

const corpus = generateCorpus();
const index = buildIndex(corpus);
const expander = new QueryExpander(SCENARIO_LEXICON);
const deps = { index, expander };
const lookup = (id: string) => index.getDocument(id);

const QUERIES = ["graph neural", "ai", "ai chatbot", "quantum privacy", "language model"];

describe("properties", () => {
  test("the same query returns the same ordered results", () => {
    for (const query of QUERIES) {
      const first = searchPapers({ query, semantic: true, sort: "date_desc" }, deps, TEST_SETTINGS);
      const second = searchPapers({ query, semantic: true, sort: "date_desc" }, deps, TEST_SETTINGS);
      expect(second.results).toEqual(first.results);
    }
  });

  test("expansion keeps every literal term", () => {
    for (const query of QUERIES) {
      const literal = expander.expand(query, false).expandedTerms.map((t) => t.term);
      const expanded = expander.expand(query, true).expandedTerms.map((t) => t.term);
      expect(expanded).toEqual(expect.arrayContaining(literal));
    }
  });

  test("expansion never loses a literal match", () => {
    for (const query of QUERIES) {
      const literal = searchPapers({ query, limit: 100 }, deps, TEST_SETTINGS);
      const semantic = searchPapers({ query, semantic: true, limit: 100 }, deps, TEST_SETTINGS);
      const semanticIds = new Set(semantic.results.map((h) => h.document.id));
      for (const hit of literal.results) {
        expect(semanticIds.has(hit.document.id)).toBe(true);
      }
    }
  });

  test("another occurrence of the query term does not lower the score", () => {
    const before = buildIndex([
      paper("target", { title: "graph neural model" }),
      paper("other", { title: "image dataset benchmark" }),
    ]);
    const after = buildIndex([
      paper("target", { title: "graph graph neural model" }),
      paper("other", { title: "image dataset benchmark" }),
    ]);

    const [scoreBefore] = scoreQuery(before, ["graph"]);
    const [scoreAfter] = scoreQuery(after, ["graph"]);
    expect(scoreAfter.score).toBeGreaterThanOrEqual(scoreBefore.score);
  });

  test("a query matching nothing returns no results", () => {
    const response = searchPapers({ query: "thermodynamics entropy" }, deps, TEST_SETTINGS);
    expect(response.results).toEqual([]);
    expect(response.totalMatches).toBe(0);
  });

  test("filters commute", () => {
    const ranked = scoreQuery(index, ["graph", "vision", "privacy"]);
    const category = { category: "cs.CV" };
    const years = { yearFrom: 2017, yearTo: 2020 };
    const limit = 100;

    const categoryThenYears = applyFilters(
      applyFilters(ranked, lookup, { filters: category, limit }),
      lookup,
      { filters: years, limit }
    );
    const yearsThenCategory = applyFilters(
      applyFilters(ranked, lookup, { filters: years, limit }),
      lookup,
      { filters: category, limit }
    );
    const together = applyFilters(ranked, lookup, { filters: { ...category, ...years }, limit });

    expect(categoryThenYears.length).toBeGreaterThan(0);
    expect(categoryThenYears).toEqual(together);
    expect(yearsThenCategory).toEqual(together);
  });

  test("equal scores are ordered by ascending id", () => {
    // Every title contains "study" once and has four terms, so all scores tie
    const first = searchPapers({ query: "study", limit: 5 }, deps, TEST_SETTINGS);
    const second = searchPapers({ query: "study", limit: 5 }, deps, TEST_SETTINGS);

    expect(first.results.map((h) => h.document.id)).toEqual(["p000", "p001", "p002", "p003", "p004"]);
    expect(second.results.map((h) => h.document.id)).toEqual(
      first.results.map((h) => h.document.id)
    );
  });

  test("limits are clamped to the bounds", () => {
    const zero = searchPapers({ query: "study", limit: 0 }, deps, TEST_SETTINGS);
    const huge = searchPapers({ query: "study", limit: 1000 }, deps, TEST_SETTINGS);

    expect(zero.results).toHaveLength(1);
    expect(zero.limit).toBe(1);
    expect(huge.results).toHaveLength(100);
    expect(huge.totalMatches).toBe(120);
  });
});
