/**
 * Search Papers Use Case
 *
 * Runs one search request against one index snapshot:
 * 1. Validates the request
 * 2. Expands the query (when semantic search is on)
 * 3. Scores candidates with BM25
 * 4. Filters, sorts and truncates
 * 5. Joins the page to document metadata
 *
 * Nothing here mutates the index; a caller may abandon a request at any
 * point without side effects.
 */

import type {
  BM25Parameters,
  InvertedIndex,
  LimitBounds,
  SearchFilters,
  SearchRequest,
  SearchResponse,
  SortMode,
} from "../entities";
import { InvalidFilterError, InvalidQueryError } from "../entities";
import type { Logger } from "../ports";
import { scoreQuery } from "../services/bm25";
import type { QueryExpander } from "../services/lexicon";
import { parseSortMode, selectEntries } from "../services/resultFilter";

/** Longest accepted query, in characters. */
export const MAX_QUERY_LENGTH = 4096;

/**
 * Settings applied to every request.
 */
export interface SearchSettings {
  bm25: BM25Parameters;
  limitBounds: LimitBounds;
  /** Expansion when the request leaves `semantic` unset */
  semanticByDefault: boolean;
}

/**
 * Dependencies required by this use case
 */
export interface SearchPapersDependencies {
  index: InvertedIndex;
  expander: QueryExpander;
  logger?: Logger;
}

function validateFilters(filters: SearchFilters): SearchFilters {
  for (const field of ["yearFrom", "yearTo"] as const) {
    const value = filters[field];
    if (value !== undefined && !Number.isInteger(value)) {
      throw new InvalidFilterError(field, "must be an integer year");
    }
  }
  return filters;
}

/**
 * Search the index.
 *
 * @throws InvalidQueryError for a blank or oversized query
 * @throws InvalidFilterError for a non-integer year bound
 * @throws UnknownSortModeError for an unrecognized sort key
 */
export function searchPapers(
  request: SearchRequest,
  deps: SearchPapersDependencies,
  settings: SearchSettings
): SearchResponse {
  const started = Date.now();
  const { index, expander, logger } = deps;

  const query = request.query.trim();
  if (!query) {
    throw new InvalidQueryError("Query must not be empty");
  }
  if (query.length > MAX_QUERY_LENGTH) {
    throw new InvalidQueryError(`Query must be at most ${MAX_QUERY_LENGTH} characters`);
  }

  const sort: SortMode = parseSortMode(request.sort ?? "relevance");
  const filters = validateFilters(request.filters ?? {});
  const semantic = request.semantic ?? settings.semanticByDefault;

  const expansion = expander.expand(query, semantic);
  if (expansion.wasExpanded) {
    logger?.debug(
      `Expanded "${query}" via [${expansion.matchedKeys.join(", ")}] to ${expansion.expandedTerms.length} terms`
    );
  }

  const scored = scoreQuery(index, expansion.expandedTerms, settings.bm25);
  const { page, totalMatches, limit } = selectEntries(
    scored,
    (id) => index.getDocument(id),
    { filters, sort, limit: request.limit, limitBounds: settings.limitBounds }
  );

  const tookMs = Date.now() - started;
  logger?.debug(
    `Query "${query}": ${scored.length} scored, ${totalMatches} after filters, ${page.length} returned in ${tookMs}ms`
  );

  return {
    query,
    expansion,
    results: page.map(({ result, doc }) => ({
      document: doc,
      score: result.score,
      matchedTermCount: result.matchedTermCount,
      matchedTerms: result.matchedTerms,
    })),
    totalMatches,
    limit,
    sort,
    tookMs,
  };
}

/**
 * Format search results for display.
 */
export function formatSearchResults(response: SearchResponse): string {
  if (response.results.length === 0) {
    return `No results for "${response.query}".`;
  }

  const lines: string[] = [];
  const shown = response.results.length;
  lines.push(
    `Found ${response.totalMatches} result${response.totalMatches === 1 ? "" : "s"} for "${response.query}"` +
      (shown < response.totalMatches ? ` (showing ${shown})` : "")
  );
  if (response.expansion.matchedKeys.length > 0) {
    lines.push(`Expanded: ${response.expansion.matchedKeys.join(", ")}`);
  }
  lines.push("");

  response.results.forEach((hit, i) => {
    const doc = hit.document;
    lines.push(`${i + 1}. ${doc.title} [${doc.id}]`);
    lines.push(
      `   ${doc.primaryCategory || "uncategorized"} · ${doc.published || doc.year} · score ${hit.score.toFixed(3)}`
    );
    if (doc.authors.length > 0) {
      lines.push(`   ${doc.authors.join(", ")}`);
    }
    lines.push(`   matched: ${hit.matchedTerms.join(", ")}`);
    lines.push("");
  });

  return lines.join("\n").trimEnd();
}
