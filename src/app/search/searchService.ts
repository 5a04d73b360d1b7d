/**
 * Search Service
 *
 * Owns the index currently being served. A rebuild produces a complete new
 * index and then replaces the reference in one assignment; queries read the
 * reference once on entry and never observe a half-built index.
 */

import type {
  Document,
  InvertedIndex,
  SearchRequest,
  SearchResponse,
} from "../../domain/entities";
import { IndexNotReadyError } from "../../domain/entities";
import type { CorpusSource, Logger } from "../../domain/ports";
import {
  buildIndex,
  corpusFacets,
  suggestQueries,
  summarizeCorpus,
  type CorpusFacets,
  type CorpusSummary,
  type QueryExpander,
} from "../../domain/services";
import { searchPapers, type SearchSettings } from "../../domain/usecases";
import { createSilentLogger } from "../../infrastructure/logger";

/**
 * An index together with when it was built.
 */
export interface IndexSnapshot {
  index: InvertedIndex;
  /** Increments with every successful rebuild, starting at 1 */
  generation: number;
  builtAt: Date;
}

export interface RebuildResult {
  generation: number;
  documentCount: number;
  termCount: number;
  durationMs: number;
}

export interface SearchServiceOptions {
  corpus: CorpusSource;
  expander: QueryExpander;
  settings: SearchSettings;
  logger?: Logger;
}

export class SearchService {
  private snapshot: IndexSnapshot | null = null;
  private generation = 0;
  private queue: Promise<unknown> = Promise.resolve();

  private readonly corpus: CorpusSource;
  private readonly expander: QueryExpander;
  private readonly settings: SearchSettings;
  private readonly logger: Logger;

  constructor(options: SearchServiceOptions) {
    this.corpus = options.corpus;
    this.expander = options.expander;
    this.settings = options.settings;
    this.logger = options.logger ?? createSilentLogger();
  }

  /** Whether an index is being served. */
  get ready(): boolean {
    return this.snapshot !== null;
  }

  /** The snapshot being served, or null before the first build. */
  current(): IndexSnapshot | null {
    return this.snapshot;
  }

  /**
   * Reload the corpus and swap in a freshly built index.
   *
   * Calls made while a rebuild runs wait for it and then run in order.
   * When a rebuild fails the previous index keeps serving and the error
   * is rethrown.
   */
  rebuild(): Promise<RebuildResult> {
    const run = this.queue.then(() => this.runRebuild());
    // Keep the chain alive after a failure; the caller still sees it via `run`
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Serve an index built elsewhere (tests, embedding hosts).
   */
  useIndex(index: InvertedIndex): IndexSnapshot {
    return this.swap(index);
  }

  /**
   * @throws IndexNotReadyError before the first successful build
   */
  search(request: SearchRequest): SearchResponse {
    const { index } = this.requireSnapshot();
    return searchPapers(
      request,
      { index, expander: this.expander, logger: this.logger },
      this.settings
    );
  }

  /** Document by id from the current index. */
  getDocument(id: string): Document | undefined {
    return this.requireSnapshot().index.getDocument(id);
  }

  stats(): CorpusSummary {
    return summarizeCorpus(this.requireSnapshot().index.documents());
  }

  facets(): CorpusFacets {
    return corpusFacets(this.requireSnapshot().index.documents());
  }

  /** Does not need an index; suggestions come from the lexicon only. */
  suggest(partial: string, limit?: number): string[] {
    return suggestQueries(partial, this.expander, limit);
  }

  private requireSnapshot(): IndexSnapshot {
    const snapshot = this.snapshot;
    if (!snapshot) {
      throw new IndexNotReadyError();
    }
    return snapshot;
  }

  private async runRebuild(): Promise<RebuildResult> {
    const started = Date.now();
    this.logger.info(`Loading corpus from ${this.corpus.description}`);

    try {
      const documents = await this.corpus.load();
      const index = buildIndex(documents, {
        expectedTotal: documents.length,
        onProgress: ({ current, total }) => {
          this.logger.progress(`  Indexing documents ${current}/${total}`);
        },
      });
      this.logger.clearProgress();

      const snapshot = this.swap(index);
      const result: RebuildResult = {
        generation: snapshot.generation,
        documentCount: index.stats.documentCount,
        termCount: index.termCount,
        durationMs: Date.now() - started,
      };
      this.logger.info(
        `Indexed ${result.documentCount} documents (${result.termCount} terms) in ${result.durationMs}ms`
      );
      return result;
    } catch (error) {
      this.logger.clearProgress();
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        this.snapshot
          ? `Rebuild failed, still serving generation ${this.snapshot.generation}: ${message}`
          : `Rebuild failed: ${message}`
      );
      throw error;
    }
  }

  private swap(index: InvertedIndex): IndexSnapshot {
    const snapshot: IndexSnapshot = {
      index,
      generation: ++this.generation,
      builtAt: new Date(),
    };
    this.snapshot = snapshot;
    return snapshot;
  }
}
