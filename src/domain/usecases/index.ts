/**
 * Application Use Cases
 *
 * Business logic orchestration layer.
 */

export {
  searchPapers,
  formatSearchResults,
  MAX_QUERY_LENGTH,
  type SearchSettings,
  type SearchPapersDependencies,
} from "./searchPapers";
