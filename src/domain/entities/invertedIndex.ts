/**
 * Inverted Index Types
 *
 * The read side of the BM25 index. An InvertedIndex value is immutable once
 * built; readers can share it without coordination.
 */

import type { DocId, Document, Term } from "./document";

export interface Posting {
  docId: DocId;
  /** term frequency within the document's title + abstract, always >= 1 */
  tf: number;
}

export interface PostingList {
  term: Term;
  /** number of documents containing the term */
  df: number;
  /** one entry per document, in the order documents were added */
  postings: readonly Posting[];
}

export interface CorpusStats {
  documentCount: number;
  /** sum of all document lengths, in tokens */
  totalLength: number;
  avgDocLength: number;
}

export interface InvertedIndex {
  readonly stats: CorpusStats;

  /** number of distinct terms in the dictionary */
  readonly termCount: number;

  /** Postings for a term; undefined when the term is not in the dictionary. */
  getPostings(term: Term): PostingList | undefined;

  hasTerm(term: Term): boolean;

  /** Document length in tokens. */
  docLength(docId: DocId): number | undefined;

  getDocument(docId: DocId): Document | undefined;

  /** Documents in ingestion order. */
  documents(): IterableIterator<Document>;
}
