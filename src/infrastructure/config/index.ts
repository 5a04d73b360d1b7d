/**
 * Configuration Infrastructure
 *
 * Handles loading papersift configuration from the filesystem.
 */

export {
  // Constants
  DEFAULT_CONFIG,
  BUNDLED_LEXICON_PATH,
  // Path utilities
  getConfigPath,
  resolveConfigPaths,
  // Merging
  mergeConfig,
  // I/O operations
  loadConfig,
} from "./configLoader";
