/**
 * Domain Services
 *
 * Pure algorithms and business logic with no external dependencies.
 * These services operate only on domain entities and primitive data.
 */

// Tokenization
export {
  tokenize,
  normalizeWords,
  MIN_TOKEN_LENGTH,
  DEFAULT_STOP_WORDS,
  type TokenizerOptions,
} from "./tokenizer";

// Index building
export {
  IndexBuilder,
  buildIndex,
  indexedText,
  type IndexBuildOptions,
} from "./indexBuilder";

// BM25 ranking
export {
  scoreQuery,
  idf,
  termScore,
  compareScored,
  type QueryUnit,
} from "./bm25";

// Query expansion
export { QueryExpander, buildLookupMap, normalizeKey } from "./lexicon";

// Filtering and sorting
export {
  applyFilters,
  selectEntries,
  matchesFilters,
  parseSortMode,
  clampLimit,
  type ApplyOptions,
} from "./resultFilter";

// Corpus statistics
export {
  summarizeCorpus,
  corpusFacets,
  type CorpusSummary,
  type CorpusFacets,
} from "./corpusSummary";

// Suggestions
export { suggestQueries } from "./suggestions";

// Record normalization
export { normalizePaperRecord, isRecord } from "./documentNormalizer";

// Configuration validation
export {
  validateConfig,
  formatValidationIssues,
  type ValidationIssue,
  type ValidationResult,
} from "./configValidator";
