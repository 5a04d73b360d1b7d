/**
 * FileSystem Port
 *
 * Abstract interface for the filesystem operations the corpus and lexicon
 * loaders need, keeping the domain independent of Node's fs module.
 */

/**
 * File statistics
 */
export interface FileStats {
  /** ISO timestamp of last modification */
  lastModified: string;
  /** File size in bytes (undefined for directories) */
  size?: number;
  /** Whether this is a directory */
  isDirectory: boolean;
}

/**
 * Abstract filesystem interface.
 */
export interface FileSystem {
  /**
   * Read a file's content as UTF-8 string
   */
  readFile(filepath: string): Promise<string>;

  /**
   * Get file statistics
   */
  getStats(filepath: string): Promise<FileStats>;

  /**
   * Check if a file exists
   */
  exists(filepath: string): Promise<boolean>;

  /**
   * Find files matching patterns, as absolute paths in sorted order
   * @param rootDir - Root directory to search from
   * @param patterns - Glob patterns to match (e.g., ['**\/*.json'])
   * @param ignore - Patterns to ignore
   */
  findFiles(rootDir: string, patterns: string[], ignore: string[]): Promise<string[]>;

  /**
   * Resolve to absolute path
   */
  resolve(...segments: string[]): string;

  /**
   * Get file extension
   */
  extname(filepath: string): string;
}
