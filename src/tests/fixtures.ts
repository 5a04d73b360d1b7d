/**
 * Shared test data builders
 */

import type { Document, Lexicon } from "../domain/entities";
import type { SearchSettings } from "../domain/usecases";

/**
 * A paper with empty text fields, published 2021 in cs.LG unless overridden.
 */
export function paper(id: string, fields: Partial<Omit<Document, "id">> = {}): Document {
  return {
    id,
    title: "",
    abstract: "",
    authors: [],
    primaryCategory: "cs.LG",
    categories: ["cs.LG"],
    year: 2021,
    published: "2021-01-01",
    ...fields,
  };
}

/**
 * A lexicon from a plain key -> expansions table.
 */
export function lexiconOf(
  expansions: Record<string, string[]>,
  popularSearches: string[] = []
): Lexicon {
  return {
    version: "1.0.0",
    entries: Object.entries(expansions).map(([term, values]) => ({
      term,
      expansions: values,
    })),
    popularSearches,
  };
}

/** Expansion table used by the ranking scenarios */
export const SCENARIO_LEXICON: Lexicon = lexiconOf({
  ai: ["artificial intelligence", "deep learning", "neural network"],
  chatbot: ["conversational", "dialogue", "language model"],
});

export const TEST_SETTINGS: SearchSettings = {
  bm25: { k1: 1.5, b: 0.75 },
  limitBounds: { min: 1, max: 100, default: 50 },
  semanticByDefault: false,
};
