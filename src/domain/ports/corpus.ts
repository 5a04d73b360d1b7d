/**
 * Corpus Source Port
 *
 * Supplies the finite set of documents a rebuild indexes. The fetch/storage
 * side of the product lives behind this interface.
 */

import type { Document } from "../entities";

export interface CorpusSource {
  /** Human-readable origin, used in log and error messages */
  readonly description: string;

  /**
   * Load the full corpus. Ids must be unique and non-empty; the index
   * builder rejects violations.
   */
  load(): Promise<Document[]>;
}
