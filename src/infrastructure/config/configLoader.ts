/**
 * Configuration Loader
 *
 * Infrastructure adapter for loading papersift configuration.
 * Handles file I/O operations for configuration management.
 */

import * as path from "path";
import * as fs from "fs/promises";
import type { SearchConfig } from "../../domain/entities";
import {
  CONFIG_FILE_NAME,
  ConfigError,
  createDefaultConfig,
} from "../../domain/entities";
import { isRecord } from "../../domain/services";

// ============================================================================
// Constants
// ============================================================================

/** Default configuration instance */
export const DEFAULT_CONFIG: SearchConfig = createDefaultConfig();

/** Lexicon bundled with the package, used when lexiconPath is unset */
export const BUNDLED_LEXICON_PATH = path.resolve(__dirname, "../../../data/lexicon.yaml");

// ============================================================================
// Path Utilities (pure functions)
// ============================================================================

/**
 * Get the config file path for a project directory.
 */
export function getConfigPath(rootDir: string): string {
  return path.join(path.resolve(rootDir), CONFIG_FILE_NAME);
}

/**
 * Resolve the corpus and lexicon paths of a config against its directory.
 */
export function resolveConfigPaths(config: SearchConfig, rootDir: string): SearchConfig {
  const root = path.resolve(rootDir);
  return {
    ...config,
    corpusPath: path.resolve(root, config.corpusPath),
    lexiconPath:
      config.lexiconPath !== undefined ? path.resolve(root, config.lexiconPath) : undefined,
  };
}

// ============================================================================
// Merging (pure functions)
// ============================================================================

function section<T extends object>(defaults: T, value: unknown): T {
  return isRecord(value) ? { ...defaults, ...value } : defaults;
}

function stringField(saved: Record<string, unknown>, key: string, fallback: string): string {
  const value = saved[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string") {
    throw new ConfigError(`${key} must be a string`);
  }
  return value;
}

/**
 * Merge a parsed config file over the defaults, one level into each
 * nested section. Numeric fields are checked by validateConfig.
 */
export function mergeConfig(saved: Record<string, unknown>): SearchConfig {
  const defaults = createDefaultConfig();
  const lexiconPath = saved.lexiconPath;
  if (lexiconPath !== undefined && typeof lexiconPath !== "string") {
    throw new ConfigError("lexiconPath must be a string");
  }

  return {
    version: stringField(saved, "version", defaults.version),
    corpusPath: stringField(saved, "corpusPath", defaults.corpusPath),
    corpusPattern: stringField(saved, "corpusPattern", defaults.corpusPattern),
    lexiconPath,
    bm25: section(defaults.bm25, saved.bm25),
    limit: section(defaults.limit, saved.limit),
    expansion: section(defaults.expansion, saved.expansion),
    watch: section(defaults.watch, saved.watch),
  };
}

// ============================================================================
// Config I/O (infrastructure)
// ============================================================================

/**
 * Load config from `<rootDir>/papersift.config.json`, or the defaults when
 * the file does not exist. Paths in the result are absolute.
 *
 * @throws ConfigError when the file exists but cannot be read or parsed
 */
export async function loadConfig(rootDir: string): Promise<SearchConfig> {
  const configPath = getConfigPath(rootDir);

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return resolveConfigPaths(createDefaultConfig(), rootDir);
    }
    throw new ConfigError(`Cannot read ${configPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`${configPath} is not valid JSON`, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath} must contain a JSON object`);
  }

  return resolveConfigPaths(mergeConfig(parsed), rootDir);
}
