/**
 * Node.js FileSystem Adapter
 *
 * Implements the FileSystem port using Node.js fs/promises and path modules.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { glob } from "glob";
import type { FileSystem, FileStats } from "../../domain/ports";

/**
 * Node.js implementation of the FileSystem port.
 */
export class NodeFileSystem implements FileSystem {
  async readFile(filepath: string): Promise<string> {
    return fs.readFile(filepath, "utf-8");
  }

  async getStats(filepath: string): Promise<FileStats> {
    const stats = await fs.stat(filepath);
    return {
      lastModified: stats.mtime.toISOString(),
      size: stats.isDirectory() ? undefined : stats.size,
      isDirectory: stats.isDirectory(),
    };
  }

  async exists(filepath: string): Promise<boolean> {
    try {
      await fs.access(filepath);
      return true;
    } catch {
      return false;
    }
  }

  async findFiles(rootDir: string, patterns: string[], ignore: string[]): Promise<string[]> {
    const ignorePatterns = ignore.map((p) => `**/${p}/**`);

    const files: string[] = [];
    for (const pattern of patterns) {
      const matches = await glob(pattern, {
        cwd: rootDir,
        absolute: true,
        nodir: true,
        ignore: ignorePatterns,
      });
      files.push(...matches);
    }

    // Remove duplicates; sort so corpus order is stable across runs
    return [...new Set(files)].sort();
  }

  resolve(...segments: string[]): string {
    return path.resolve(...segments);
  }

  extname(filepath: string): string {
    return path.extname(filepath);
  }
}

/**
 * Default singleton instance
 */
export const nodeFileSystem = new NodeFileSystem();
