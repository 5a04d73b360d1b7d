/**
 * Index Builder
 *
 * Turns a corpus into an immutable InvertedIndex in a single pass.
 *
 * Documents are accumulated into private state; nothing is readable until
 * build() returns, so a serving layer can keep answering from its previous
 * index and swap in the new one afterwards.
 *
 * Data structure:
 * - term -> postings (docId, tf), in ingestion order
 * - docId -> document length (tokens of title + abstract)
 */

import type {
  CorpusStats,
  DocId,
  Document,
  InvertedIndex,
  Posting,
  PostingList,
  Term,
} from "../entities";
import {
  DuplicateDocumentError,
  EmptyCorpusError,
  InvalidDocumentError,
} from "../entities";
import type { ProgressInfo } from "../ports";
import { tokenize } from "./tokenizer";

export interface IndexBuildOptions {
  /** Called every `progressInterval` documents while adding */
  onProgress?: (progress: ProgressInfo) => void;
  /** Default: 1000 */
  progressInterval?: number;
  /** Expected corpus size, reported as ProgressInfo.total when known */
  expectedTotal?: number;
}

/**
 * Text a document is indexed under: title and abstract as one field.
 */
export function indexedText(doc: Document): string {
  return `${doc.title} ${doc.abstract}`;
}

class FrozenInvertedIndex implements InvertedIndex {
  constructor(
    readonly stats: CorpusStats,
    private readonly dictionary: ReadonlyMap<Term, PostingList>,
    private readonly lengths: ReadonlyMap<DocId, number>,
    private readonly docs: ReadonlyMap<DocId, Document>
  ) {}

  get termCount(): number {
    return this.dictionary.size;
  }

  getPostings(term: Term): PostingList | undefined {
    return this.dictionary.get(term);
  }

  hasTerm(term: Term): boolean {
    return this.dictionary.has(term);
  }

  docLength(docId: DocId): number | undefined {
    return this.lengths.get(docId);
  }

  getDocument(docId: DocId): Document | undefined {
    return this.docs.get(docId);
  }

  documents(): IterableIterator<Document> {
    return this.docs.values();
  }
}

/**
 * Single-use builder for an InvertedIndex.
 *
 * @example
 * ```ts
 * const builder = new IndexBuilder();
 * for (const doc of corpus) builder.add(doc);
 * const index = builder.build();
 * ```
 */
export class IndexBuilder {
  private readonly postings = new Map<Term, Posting[]>();
  private readonly lengths = new Map<DocId, number>();
  private readonly docs = new Map<DocId, Document>();
  private totalLength = 0;
  private built = false;

  constructor(private readonly options: IndexBuildOptions = {}) {}

  /** Number of documents added so far. */
  get size(): number {
    return this.docs.size;
  }

  add(doc: Document): void {
    if (this.built) {
      throw new Error("IndexBuilder.add() called after build()");
    }
    if (typeof doc.id !== "string" || doc.id.trim().length === 0) {
      throw new InvalidDocumentError("Document id must be a non-empty string");
    }
    if (this.docs.has(doc.id)) {
      throw new DuplicateDocumentError(doc.id);
    }

    const frequencies = new Map<Term, number>();
    let length = 0;
    for (const term of tokenize(indexedText(doc))) {
      frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
      length++;
    }

    for (const [term, tf] of frequencies) {
      let list = this.postings.get(term);
      if (!list) {
        list = [];
        this.postings.set(term, list);
      }
      list.push(Object.freeze({ docId: doc.id, tf }));
    }

    this.docs.set(doc.id, freezeDocument(doc));
    this.lengths.set(doc.id, length);
    this.totalLength += length;

    const interval = this.options.progressInterval ?? 1000;
    if (this.options.onProgress && this.docs.size % interval === 0) {
      this.options.onProgress({
        current: this.docs.size,
        total: this.options.expectedTotal ?? this.docs.size,
        message: `Indexed ${this.docs.size} documents`,
      });
    }
  }

  addAll(corpus: Iterable<Document>): this {
    for (const doc of corpus) {
      this.add(doc);
    }
    return this;
  }

  /**
   * Finalize the index. Fails with EmptyCorpusError when nothing was added.
   */
  build(): InvertedIndex {
    if (this.built) {
      throw new Error("IndexBuilder.build() called twice");
    }
    const documentCount = this.docs.size;
    if (documentCount === 0) {
      throw new EmptyCorpusError();
    }
    this.built = true;

    const dictionary = new Map<Term, PostingList>();
    for (const [term, postings] of this.postings) {
      dictionary.set(
        term,
        Object.freeze({ term, df: postings.length, postings: Object.freeze(postings) })
      );
    }

    const stats: CorpusStats = Object.freeze({
      documentCount,
      totalLength: this.totalLength,
      avgDocLength: this.totalLength / documentCount,
    });

    return new FrozenInvertedIndex(stats, dictionary, this.lengths, this.docs);
  }
}

/**
 * Build an index from a whole corpus in one call.
 *
 * @throws EmptyCorpusError when the corpus has no documents
 * @throws InvalidDocumentError / DuplicateDocumentError on bad ids
 */
export function buildIndex(
  corpus: Iterable<Document>,
  options: IndexBuildOptions = {}
): InvertedIndex {
  return new IndexBuilder(options).addAll(corpus).build();
}

function freezeDocument(doc: Document): Document {
  const authors = [...doc.authors];
  const categories = [...doc.categories];
  Object.freeze(authors);
  Object.freeze(categories);
  return Object.freeze({ ...doc, authors, categories });
}
