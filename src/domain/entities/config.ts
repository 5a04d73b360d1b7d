/**
 * Config Entity
 *
 * Configuration for papersift indexing and search.
 */

import type { BM25Parameters } from "./bm25";
import type { LimitBounds } from "./searchResult";

/**
 * Query expansion settings.
 */
export interface ExpansionConfig {
  /** Whether searches expand queries when the request does not say */
  enabledByDefault: boolean;

  /** Weight of expansion units relative to literal terms */
  weight: number;

  /** Longest lexicon key, in words, matched against the raw query */
  maxPhraseWords: number;

  /** Maximum expansion units per query */
  maxTerms: number;
}

/**
 * Corpus watch settings.
 */
export interface WatchConfig {
  /** Debounce delay in milliseconds before a rebuild */
  debounceMs: number;
}

/**
 * Main papersift configuration.
 */
export interface SearchConfig {
  /** Config format version */
  version: string;

  /** JSON file, or directory of JSON files, holding the corpus */
  corpusPath: string;

  /** Glob used to find corpus files when corpusPath is a directory */
  corpusPattern: string;

  /** YAML or JSON expansion table; the bundled table when unset */
  lexiconPath?: string;

  /** BM25 tuning constants */
  bm25: BM25Parameters;

  /** Result-count bounds */
  limit: LimitBounds;

  expansion: ExpansionConfig;

  watch: WatchConfig;
}

/** Name of the config file looked up in a project directory. */
export const CONFIG_FILE_NAME = "papersift.config.json";

/**
 * Create a default configuration.
 */
export function createDefaultConfig(): SearchConfig {
  return {
    version: "0.1.0",
    corpusPath: "papers_data.json",
    corpusPattern: "**/*.json",
    bm25: { k1: 1.5, b: 0.75 },
    limit: { min: 1, max: 100, default: 50 },
    expansion: {
      enabledByDefault: false,
      weight: 1.0,
      maxPhraseWords: 3,
      maxTerms: 40,
    },
    watch: {
      debounceMs: 300,
    },
  };
}
