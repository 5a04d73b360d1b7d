/**
 * Result Filter
 *
 * Post-retrieval filtering, ordering and truncation of scored results.
 *
 * Filters are independent predicates combined with AND, so their order of
 * application does not matter. An inverted year range (yearFrom > yearTo)
 * can never be satisfied and therefore yields no results.
 */

import type {
  Document,
  DocumentLookup,
  LimitBounds,
  ScoredResult,
  SearchFilters,
  SortMode,
} from "../entities";
import {
  DEFAULT_LIMIT_BOUNDS,
  SORT_MODES,
  UnknownSortModeError,
} from "../entities";

export interface ApplyOptions {
  filters?: SearchFilters;
  /** Default: "relevance" */
  sort?: SortMode;
  /** Requested count; clamped into limitBounds */
  limit?: number;
  limitBounds?: LimitBounds;
}

function isSortMode(value: string): value is SortMode {
  return (SORT_MODES as readonly string[]).includes(value);
}

/**
 * Validate a sort key.
 *
 * @throws UnknownSortModeError for anything outside SORT_MODES
 */
export function parseSortMode(value: string): SortMode {
  if (!isSortMode(value)) {
    throw new UnknownSortModeError(value, SORT_MODES);
  }
  return value;
}

/**
 * Clamp a requested result count into bounds. Missing or non-numeric
 * values fall back to the default, which is clamped as well; fractions
 * are truncated.
 */
export function clampLimit(
  limit: number | undefined,
  bounds: LimitBounds = DEFAULT_LIMIT_BOUNDS
): number {
  const requested = limit === undefined || Number.isNaN(limit) ? bounds.default : limit;
  return Math.min(bounds.max, Math.max(bounds.min, Math.trunc(requested)));
}

/**
 * Whether a document passes every filter that is set.
 */
export function matchesFilters(doc: Document, filters: SearchFilters = {}): boolean {
  if (filters.category !== undefined && doc.primaryCategory !== filters.category) {
    return false;
  }
  if (filters.yearFrom !== undefined && doc.year < filters.yearFrom) {
    return false;
  }
  if (filters.yearTo !== undefined && doc.year > filters.yearTo) {
    return false;
  }
  if (filters.author !== undefined) {
    const needle = filters.author.toLowerCase();
    if (!doc.authors.join(", ").toLowerCase().includes(needle)) {
      return false;
    }
  }
  return true;
}

function compareDates(a: Document, b: Document): number {
  if (a.year !== b.year) return a.year - b.year;
  return a.published < b.published ? -1 : a.published > b.published ? 1 : 0;
}

function compareIds(a: ScoredResult, b: ScoredResult): number {
  return a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0;
}

/**
 * Order filtered entries. Relevance keeps the ranker's order; date modes
 * sort by date, then score descending, then id ascending.
 */
function sortEntries(
  entries: Array<{ result: ScoredResult; doc: Document }>,
  sort: SortMode
): void {
  if (sort === "relevance") return;

  const direction = sort === "date_desc" ? -1 : 1;
  entries.sort(
    (x, y) =>
      direction * compareDates(x.doc, y.doc) ||
      y.result.score - x.result.score ||
      compareIds(x.result, y.result)
  );
}

/**
 * Filter, sort and truncate ranked results.
 *
 * @param results - Ranker output, best first
 * @param lookup - Resolves result ids to documents; unknown ids are dropped
 * @returns At most clampLimit(options.limit) results
 */
export function applyFilters(
  results: readonly ScoredResult[],
  lookup: DocumentLookup,
  options: ApplyOptions = {}
): ScoredResult[] {
  return selectEntries(results, lookup, options).page.map((entry) => entry.result);
}

/**
 * applyFilters, keeping the resolved documents and the number of matches
 * before truncation.
 */
export function selectEntries(
  results: readonly ScoredResult[],
  lookup: DocumentLookup,
  options: ApplyOptions = {}
): { page: Array<{ result: ScoredResult; doc: Document }>; totalMatches: number; limit: number } {
  const entries: Array<{ result: ScoredResult; doc: Document }> = [];
  for (const result of results) {
    const doc = lookup(result.docId);
    if (doc && matchesFilters(doc, options.filters)) {
      entries.push({ result, doc });
    }
  }

  sortEntries(entries, options.sort ?? "relevance");

  const limit = clampLimit(options.limit, options.limitBounds);
  return {
    page: entries.slice(0, limit),
    totalMatches: entries.length,
    limit,
  };
}
