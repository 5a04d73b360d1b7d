/**
 * Domain Entities
 *
 * Core data types with no external dependencies.
 */

// Document - The unit of indexing
export type { Document, DocId, Term, DocumentLookup } from "./document";

// Inverted index - Read side of the BM25 index
export type {
  InvertedIndex,
  Posting,
  PostingList,
  CorpusStats,
} from "./invertedIndex";

// BM25 tuning
export type { BM25Parameters } from "./bm25";
export { DEFAULT_BM25_PARAMETERS } from "./bm25";

// Lexicon - Expansion table and expanded queries
export type {
  Lexicon,
  LexiconEntry,
  ExpandedTerm,
  ExpandedQuery,
  ExpansionOptions,
} from "./lexicon";
export { DEFAULT_EXPANSION_OPTIONS } from "./lexicon";

// SearchResult - Query requests and results
export type {
  ScoredResult,
  SortMode,
  SearchFilters,
  LimitBounds,
  SearchRequest,
  SearchHit,
  SearchResponse,
} from "./searchResult";
export { SORT_MODES, DEFAULT_LIMIT_BOUNDS } from "./searchResult";

// Config - Application configuration
export type { SearchConfig, ExpansionConfig, WatchConfig } from "./config";
export { CONFIG_FILE_NAME, createDefaultConfig } from "./config";

// Errors
export type { SearchErrorCode } from "./errors";
export {
  SearchError,
  EmptyCorpusError,
  InvalidDocumentError,
  DuplicateDocumentError,
  UnknownSortModeError,
  InvalidQueryError,
  InvalidFilterError,
  IndexNotReadyError,
  CorpusFormatError,
  LexiconFormatError,
  ConfigError,
  isSearchError,
} from "./errors";
