/**
 * Corpus watcher
 *
 * Rebuilds the served index when the corpus changes on disk:
 * - Debouncing: a burst of writes (an export rewriting several files)
 *   triggers one rebuild
 * - Queuing: changes seen during a rebuild schedule exactly one more
 * - Error recovery: a failed rebuild is reported and watching continues,
 *   with the previous index still serving
 */

import { watch, type FSWatcher } from "chokidar";
import * as path from "path";
import type { RebuildResult, SearchService } from "../search";

/** Default debounce delay in milliseconds */
const DEFAULT_DEBOUNCE_MS = 300;

export type CorpusChangeEvent = "add" | "change" | "unlink";

export interface WatchOptions {
  /** Debounce delay in milliseconds (default: 300) */
  debounceMs?: number;
  /** Only files with these extensions trigger a rebuild (default: [".json"]) */
  extensions?: string[];
  /** Callback when a rebuild starts */
  onRebuildStart?: (changedFiles: string[]) => void;
  /** Callback when a rebuild completes */
  onRebuildComplete?: (result: RebuildResult) => void;
  /** Callback when a corpus file change is detected */
  onFileChange?: (event: CorpusChangeEvent, filepath: string) => void;
  /** Callback for rebuild and watcher errors */
  onError?: (error: Error) => void;
}

export interface CorpusWatcher {
  /** Stop watching and clean up */
  stop: () => Promise<void>;
  /** Whether the watcher is currently running */
  isRunning: () => boolean;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Watch a corpus file or directory and rebuild `service` on change.
 * Resolves once the underlying watcher is ready.
 */
export async function watchCorpus(
  service: SearchService,
  corpusPath: string,
  options: WatchOptions = {}
): Promise<CorpusWatcher> {
  const {
    debounceMs = DEFAULT_DEBOUNCE_MS,
    extensions = [".json"],
    onRebuildStart,
    onRebuildComplete,
    onFileChange,
    onError,
  } = options;

  const target = path.resolve(corpusPath);
  const validExtensions = new Set(extensions.map((e) => e.toLowerCase()));

  let running = true;
  let rebuilding = false;
  const pendingChanges = new Set<string>();
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;

  async function processPendingChanges(): Promise<void> {
    if (!running || rebuilding || pendingChanges.size === 0) {
      return;
    }

    rebuilding = true;
    const changedFiles = [...pendingChanges];
    pendingChanges.clear();

    try {
      onRebuildStart?.(changedFiles);
      const result = await service.rebuild();
      onRebuildComplete?.(result);
    } catch (error) {
      onError?.(toError(error));
    } finally {
      rebuilding = false;

      // Changes that arrived during the rebuild
      if (running && pendingChanges.size > 0) {
        scheduleProcessing();
      }
    }
  }

  function scheduleProcessing(): void {
    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }
    debounceTimer = setTimeout(() => {
      debounceTimer = null;
      void processPendingChanges();
    }, debounceMs);
  }

  function handleFileEvent(event: CorpusChangeEvent, filepath: string): void {
    if (!running) return;
    if (!validExtensions.has(path.extname(filepath).toLowerCase())) return;

    onFileChange?.(event, filepath);
    pendingChanges.add(filepath);
    scheduleProcessing();
  }

  const watcher: FSWatcher = watch(target, {
    ignored: ["**/node_modules/**", "**/.git/**"],
    persistent: true,
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 100,
      pollInterval: 50,
    },
    atomic: true,
  });

  watcher.on("add", (filepath: string) => handleFileEvent("add", filepath));
  watcher.on("change", (filepath: string) => handleFileEvent("change", filepath));
  watcher.on("unlink", (filepath: string) => handleFileEvent("unlink", filepath));
  watcher.on("error", (error: unknown) => {
    onError?.(toError(error));
  });

  await new Promise<void>((resolve) => {
    watcher.once("ready", () => resolve());
  });

  return {
    stop: async () => {
      running = false;
      if (debounceTimer) {
        clearTimeout(debounceTimer);
        debounceTimer = null;
      }
      await watcher.close();
    },
    isRunning: () => running,
  };
}
