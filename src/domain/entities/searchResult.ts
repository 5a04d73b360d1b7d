/**
 * SearchResult Entity
 *
 * Request and response shapes of the query path, from the per-document
 * BM25 score up to the page handed back to a caller.
 */

import type { DocId, Document } from "./document";
import type { ExpandedQuery } from "./lexicon";

/**
 * A document scored against a query. Ephemeral, never stored.
 */
export interface ScoredResult {
  docId: DocId;

  /** BM25 relevance, always > 0 */
  score: number;

  /** Number of query units that contributed to the score */
  matchedTermCount: number;

  /** Display form of the contributing units, in query order */
  matchedTerms: string[];
}

export const SORT_MODES = ["relevance", "date_desc", "date_asc"] as const;

export type SortMode = (typeof SORT_MODES)[number];

/**
 * Post-retrieval predicates. Every field is optional; present ones are ANDed.
 */
export interface SearchFilters {
  /** Exact match on the primary category */
  category?: string;

  /** Inclusive lower bound on the publication year */
  yearFrom?: number;

  /** Inclusive upper bound on the publication year */
  yearTo?: number;

  /** Case-insensitive substring of the author list */
  author?: string;
}

export interface LimitBounds {
  min: number;
  max: number;
  default: number;
}

export const DEFAULT_LIMIT_BOUNDS: LimitBounds = {
  min: 1,
  max: 100,
  default: 50,
};

/**
 * A search request as the request layer hands it over.
 */
export interface SearchRequest {
  /** Free-text query */
  query: string;

  /** Enable lexicon expansion */
  semantic?: boolean;

  filters?: SearchFilters;

  /** Sort key; validated, unknown values are rejected */
  sort?: SortMode | string;

  /** Requested page size; clamped into the configured bounds */
  limit?: number;
}

/**
 * A scored result joined to its document.
 */
export interface SearchHit {
  document: Document;
  score: number;
  matchedTermCount: number;
  matchedTerms: string[];
}

export interface SearchResponse {
  /** The query as received (trimmed) */
  query: string;

  /** Expansion details, including which keys matched */
  expansion: ExpandedQuery;

  results: SearchHit[];

  /** Matches surviving the filters, before truncation */
  totalMatches: number;

  /** Effective limit after clamping */
  limit: number;

  sort: SortMode;

  tookMs: number;
}
