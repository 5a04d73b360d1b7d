/**
 * Document Entity
 *
 * One research paper as the index sees it. Documents are created by the
 * corpus source, frozen by the index builder and never mutated afterwards;
 * a rebuild replaces the whole set.
 */

/** Unique, non-empty paper identifier (e.g. an arXiv id). */
export type DocId = string;

/**
 * A normalized index term (lowercase, no short or stop tokens).
 */
export type Term = string;

/**
 * A paper record.
 */
export interface Document {
  /** Unique identifier */
  id: DocId;

  /** Paper title */
  title: string;

  /** Paper abstract */
  abstract: string;

  /** Authors in byline order */
  authors: string[];

  /** Primary category (e.g. "cs.LG") */
  primaryCategory: string;

  /** Every category the paper is listed under, primary included */
  categories: string[];

  /** Publication year */
  year: number;

  /** Raw published date as supplied by the source (ISO 8601 when known) */
  published: string;
}

/**
 * Read-only lookup of documents by id, as consumed by the filter layer.
 */
export type DocumentLookup = (id: DocId) => Document | undefined;
