/**
 * Infrastructure Layer
 *
 * Contains adapters that implement domain ports.
 * These connect the domain to external systems (filesystem, config and
 * lexicon files, the corpus export).
 */

// FileSystem
export { NodeFileSystem, nodeFileSystem } from "./filesystem";

// Config
export {
  DEFAULT_CONFIG,
  BUNDLED_LEXICON_PATH,
  getConfigPath,
  resolveConfigPaths,
  mergeConfig,
  loadConfig,
} from "./config";

// Lexicon
export { loadLexicon, parseLexicon, toLexicon } from "./lexicon";

// Corpus
export { JsonCorpusSource, type JsonCorpusSourceOptions } from "./corpus";

// Logger
export {
  ConsoleLogger,
  InlineProgressLogger,
  SilentLogger,
  MemoryLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from "./logger";
