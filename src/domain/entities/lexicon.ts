/**
 * Lexicon Types
 *
 * The expansion table behind "semantic" search: casual or shorthand keys
 * mapped to the academic vocabulary papers actually use. A lexicon is
 * loaded once at start-up and handed to the QueryExpander; it is never
 * mutated while queries are served.
 */

import type { Term } from "./document";

/**
 * One key of the expansion table.
 */
export interface LexiconEntry {
  /** The lookup key; may span several words ("self driving") */
  term: string;

  /** Related terms or phrases added to the query when the key matches */
  expansions: string[];
}

/**
 * The expansion table.
 */
export interface Lexicon {
  /** Version for compatibility checking */
  version: string;

  /** All expansion entries */
  entries: LexiconEntry[];

  /** Frequently run searches, offered as suggestions */
  popularSearches: string[];
}

/**
 * A query unit after expansion.
 *
 * Literal terms are single-token units. An expansion phrase such as
 * "deep learning" is one unit of several tokens and is scored as a whole.
 */
export interface ExpandedTerm {
  /** Display form: the unit's tokens joined by a space */
  term: string;

  /** Index terms making up the unit */
  tokens: Term[];

  /** Scoring weight (1.0 for literal terms) */
  weight: number;

  /** How this unit was derived */
  source: "original" | "expansion";

  /** The lexicon key this unit was expanded from (expansions only) */
  expandedFrom?: string;
}

/**
 * Result of expanding a query.
 */
export interface ExpandedQuery {
  /** Original query string */
  originalQuery: string;

  /** Literal query terms (tokenized, de-duplicated) */
  originalTerms: Term[];

  /** Literal terms first, then expansion units */
  expandedTerms: ExpandedTerm[];

  /** Lexicon keys that matched the raw query, in query order */
  matchedKeys: string[];

  /** Whether any expansion unit was added */
  wasExpanded: boolean;
}

/**
 * Options for query expansion.
 */
export interface ExpansionOptions {
  /** Longest key, in words, looked up in the raw query. Default: 3 */
  maxPhraseWords?: number;

  /** Weight of expansion units relative to literal terms. Default: 1.0 */
  expansionWeight?: number;

  /** Maximum number of expansion units added. Default: 40 */
  maxTerms?: number;
}

export const DEFAULT_EXPANSION_OPTIONS: Required<ExpansionOptions> = {
  maxPhraseWords: 3,
  expansionWeight: 1.0,
  maxTerms: 40,
};
