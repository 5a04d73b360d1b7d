/**
 * Composition Root
 *
 * This is the single place where all dependencies are wired together.
 * The composition root creates concrete implementations and injects them
 * into the search service.
 *
 * This is the only file that knows about concrete implementations.
 * Everything else depends only on interfaces (ports).
 */

import type { Lexicon, SearchConfig } from "./domain/entities";
import { ConfigError } from "./domain/entities";
import type { CorpusSource, FileSystem, Logger } from "./domain/ports";
import {
  QueryExpander,
  formatValidationIssues,
  validateConfig,
} from "./domain/services";
import type { SearchSettings } from "./domain/usecases";
import {
  BUNDLED_LEXICON_PATH,
  loadConfig,
  resolveConfigPaths,
} from "./infrastructure/config";
import { JsonCorpusSource } from "./infrastructure/corpus";
import { nodeFileSystem } from "./infrastructure/filesystem";
import { loadLexicon } from "./infrastructure/lexicon";
import { createSilentLogger } from "./infrastructure/logger";
import { SearchService } from "./app/search";

// ============================================================================
// Settings
// ============================================================================

/**
 * Per-request settings derived from a config.
 */
export function searchSettingsFromConfig(config: SearchConfig): SearchSettings {
  return {
    bm25: { ...config.bm25 },
    limitBounds: { ...config.limit },
    semanticByDefault: config.expansion.enabledByDefault,
  };
}

/**
 * Build the query expander a config describes.
 */
export function createExpander(lexicon: Lexicon, config: SearchConfig): QueryExpander {
  return new QueryExpander(lexicon, {
    expansionWeight: config.expansion.weight,
    maxPhraseWords: config.expansion.maxPhraseWords,
    maxTerms: config.expansion.maxTerms,
  });
}

// ============================================================================
// Service Container
// ============================================================================

export interface CreateSearchServiceOptions {
  logger?: Logger;
  fileSystem?: FileSystem;
  /** Use this config instead of reading `papersift.config.json`; paths resolve against rootDir */
  config?: SearchConfig;
  /** Use this lexicon instead of the configured one */
  lexicon?: Lexicon;
  /** Use this corpus instead of the configured JSON export */
  corpus?: CorpusSource;
}

export interface SearchContainer {
  config: SearchConfig;
  lexicon: Lexicon;
  service: SearchService;
}

/**
 * Create a search service for a project directory. No index is built;
 * call `service.rebuild()`.
 *
 * @throws ConfigError when the config file is unreadable or invalid
 * @throws LexiconFormatError when the lexicon file is malformed
 */
export async function createSearchService(
  rootDir: string,
  options: CreateSearchServiceOptions = {}
): Promise<SearchContainer> {
  const logger = options.logger ?? createSilentLogger();
  const fileSystem = options.fileSystem ?? nodeFileSystem;

  const config = options.config
    ? resolveConfigPaths(options.config, rootDir)
    : await loadConfig(rootDir);
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigError(
      `Invalid configuration:\n${formatValidationIssues(validation.getErrors())}`
    );
  }
  for (const warning of validation.getWarnings()) {
    logger.warn(`Config ${warning.path}: ${warning.message}`);
  }

  const lexiconPath = config.lexiconPath ?? BUNDLED_LEXICON_PATH;
  const lexicon = options.lexicon ?? (await loadLexicon(lexiconPath, fileSystem));
  logger.debug(
    `Lexicon ${options.lexicon ? "<provided>" : lexiconPath}: ${lexicon.entries.length} keys`
  );

  const corpus =
    options.corpus ??
    new JsonCorpusSource({
      path: config.corpusPath,
      pattern: config.corpusPattern,
      fileSystem,
      logger,
    });

  const service = new SearchService({
    corpus,
    expander: createExpander(lexicon, config),
    settings: searchSettingsFromConfig(config),
    logger,
  });

  return { config, lexicon, service };
}
