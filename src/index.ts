/**
 * papersift - BM25 search over research paper metadata
 *
 * Ranks papers by title and abstract with BM25, optionally expanding
 * casual queries ("ai chatbot") into academic vocabulary first.
 *
 * @example
 * ```ts
 * import papersift from 'papersift';
 *
 * // Reads papersift.config.json (if any) and builds the index
 * const service = await papersift.open('/path/to/project');
 *
 * const response = service.search({
 *   query: 'ai chatbot',
 *   semantic: true,
 *   filters: { yearFrom: 2020 },
 *   sort: 'relevance',
 *   limit: 10,
 * });
 * console.log(papersift.formatSearchResults(response));
 * ```
 *
 * @example Searching documents already in memory
 * ```ts
 * import { buildIndex, QueryExpander, searchPapers } from 'papersift';
 *
 * const index = buildIndex(documents);
 * const expander = new QueryExpander({ version: '1', entries: [], popularSearches: [] });
 * const response = searchPapers({ query: 'graph' }, { index, expander }, {
 *   bm25: { k1: 1.5, b: 0.75 },
 *   limitBounds: { min: 1, max: 100, default: 50 },
 *   semanticByDefault: false,
 * });
 * ```
 */

import { createSearchService, type CreateSearchServiceOptions } from "./composition";
import type { SearchService } from "./app/search";
import { formatSearchResults } from "./domain/usecases";

// Domain: entities, ports, services and use cases
export * from "./domain";

// Infrastructure adapters
export {
  NodeFileSystem,
  nodeFileSystem,
  JsonCorpusSource,
  loadConfig,
  mergeConfig,
  getConfigPath,
  DEFAULT_CONFIG,
  BUNDLED_LEXICON_PATH,
  loadLexicon,
  parseLexicon,
  ConsoleLogger,
  InlineProgressLogger,
  SilentLogger,
  MemoryLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
  type JsonCorpusSourceOptions,
  type LoggerOptions,
} from "./infrastructure";

// Application
export {
  SearchService,
  type SearchServiceOptions,
  type IndexSnapshot,
  type RebuildResult,
} from "./app/search";
export { watchCorpus, type CorpusWatcher, type WatchOptions } from "./app/indexer";
export {
  createSearchService,
  createExpander,
  searchSettingsFromConfig,
  type CreateSearchServiceOptions,
  type SearchContainer,
} from "./composition";

/**
 * Create a search service for a project directory and build its index.
 *
 * @param directory - Directory containing papersift.config.json (optional file)
 * @returns A service ready to answer queries
 */
export async function open(
  directory: string,
  options: CreateSearchServiceOptions = {}
): Promise<SearchService> {
  const { service } = await createSearchService(directory, options);
  await service.rebuild();
  return service;
}

// Default export for convenient importing
const papersift = {
  open,
  formatSearchResults,
};

export default papersift;
