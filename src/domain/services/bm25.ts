/**
 * BM25 (Best Matching 25) Ranker
 *
 * Scores documents of an InvertedIndex against a set of query units. This
 * is a pure domain service: no I/O, no mutation of the index.
 *
 * BM25 estimates relevance of documents to a search query using term frequency
 * and inverse document frequency with length normalization.
 *
 * A query unit is a literal term or an expansion phrase. A unit's
 * contribution to a document is its weight times the mean BM25 score of its
 * tokens, so "deep learning" counts as one matched term and a single-token
 * unit of weight 1 is exactly classic BM25.
 */

import type {
  BM25Parameters,
  DocId,
  InvertedIndex,
  ScoredResult,
  Term,
} from "../entities";
import { DEFAULT_BM25_PARAMETERS } from "../entities";

/**
 * A unit of a query: one or more index terms scored together.
 * ExpandedTerm satisfies this shape.
 */
export interface QueryUnit {
  tokens: readonly Term[];
  /** Default: 1 */
  weight?: number;
  /** Display form; defaults to the tokens joined by a space */
  term?: string;
}

/**
 * Inverse document frequency with the +1 inside the log, so it stays
 * positive even for terms present in every document.
 */
export function idf(documentCount: number, df: number): number {
  if (df <= 0) return 0;
  return Math.log(1 + (documentCount - df + 0.5) / (df + 0.5));
}

/**
 * BM25 contribution of one term to one document.
 */
export function termScore(
  tf: number,
  docLength: number,
  avgDocLength: number,
  termIdf: number,
  params: BM25Parameters = DEFAULT_BM25_PARAMETERS
): number {
  const { k1, b } = params;
  const lengthRatio = avgDocLength > 0 ? docLength / avgDocLength : 0;
  const numerator = tf * (k1 + 1);
  const denominator = tf + k1 * (1 - b + b * lengthRatio);
  return termIdf * (numerator / denominator);
}

/**
 * Descending score, then ascending document id.
 */
export function compareScored(a: ScoredResult, b: ScoredResult): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0;
}

function toUnit(input: QueryUnit | Term): QueryUnit {
  return typeof input === "string" ? { tokens: [input] } : input;
}

interface Accumulator {
  score: number;
  matchedTerms: string[];
}

/**
 * Score every document that matches at least one query unit.
 *
 * Terms absent from the dictionary contribute nothing; a query with no
 * matching terms returns an empty array.
 *
 * @param index - Index snapshot to read
 * @param terms - Query units; plain strings are single-term units of weight 1
 * @param params - BM25 constants (k1, b)
 * @returns Results sorted by score descending, ties by document id ascending
 */
export function scoreQuery(
  index: InvertedIndex,
  terms: ReadonlyArray<QueryUnit | Term>,
  params: BM25Parameters = DEFAULT_BM25_PARAMETERS
): ScoredResult[] {
  const { documentCount, avgDocLength } = index.stats;
  if (documentCount === 0 || terms.length === 0) return [];

  const accumulators = new Map<DocId, Accumulator>();
  const seenUnits = new Set<string>();

  for (const input of terms) {
    const unit = toUnit(input);
    const tokens = Array.from(new Set(unit.tokens));
    if (tokens.length === 0) continue;

    const key = tokens.join(" ");
    if (seenUnits.has(key)) continue;
    seenUnits.add(key);

    const unitScores = new Map<DocId, number>();
    for (const token of tokens) {
      const list = index.getPostings(token);
      if (!list) continue;

      const termIdf = idf(documentCount, list.df);
      for (const posting of list.postings) {
        const docLength = index.docLength(posting.docId) ?? 0;
        const s = termScore(posting.tf, docLength, avgDocLength, termIdf, params);
        unitScores.set(posting.docId, (unitScores.get(posting.docId) ?? 0) + s);
      }
    }

    const weight = unit.weight ?? 1;
    const label = unit.term ?? key;
    for (const [docId, sum] of unitScores) {
      let acc = accumulators.get(docId);
      if (!acc) {
        acc = { score: 0, matchedTerms: [] };
        accumulators.set(docId, acc);
      }
      acc.score += (weight * sum) / tokens.length;
      acc.matchedTerms.push(label);
    }
  }

  const results: ScoredResult[] = [];
  for (const [docId, acc] of accumulators) {
    results.push({
      docId,
      score: acc.score,
      matchedTermCount: acc.matchedTerms.length,
      matchedTerms: acc.matchedTerms,
    });
  }

  results.sort(compareScored);
  return results;
}
