/**
 * Tokenizer
 *
 * Normalizes paper text into index terms. Pure and deterministic: the same
 * input always yields the same sequence.
 *
 * Policy:
 * - lowercase
 * - punctuation becomes a separator, except hyphens and periods inside a
 *   word ("q-learning", "gpt-3.5")
 * - tokens shorter than MIN_TOKEN_LENGTH are dropped
 * - stopwords are dropped
 * - no stemming; expansion supplies related forms instead
 */

import type { Term } from "../entities";

/** Shortest token kept in the index. */
export const MIN_TOKEN_LENGTH = 3;

export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set([
  "and",
  "are",
  "but",
  "can",
  "for",
  "from",
  "has",
  "have",
  "into",
  "its",
  "not",
  "our",
  "such",
  "than",
  "that",
  "the",
  "their",
  "then",
  "there",
  "these",
  "they",
  "this",
  "those",
  "via",
  "was",
  "were",
  "which",
  "while",
  "will",
  "with",
  "e.g",
  "i.e",
  "etc",
]);

export interface TokenizerOptions {
  /** Minimum token length. Default: MIN_TOKEN_LENGTH */
  minLength?: number;
  /** Stopword set. Default: DEFAULT_STOP_WORDS */
  stopWords?: ReadonlySet<string>;
}

const SEPARATORS = /[^\p{L}\p{N}\s.-]+/gu;
const EDGE_PUNCTUATION = /^[.-]+|[.-]+$/g;

/**
 * Split text into normalized words without applying the length or
 * stopword policy. Used to match lexicon keys such as "ai".
 */
export function normalizeWords(text: string): string[] {
  const words: string[] = [];
  for (const piece of text.toLowerCase().replace(SEPARATORS, " ").split(/\s+/)) {
    const word = piece.replace(EDGE_PUNCTUATION, "");
    if (word.length > 0) {
      words.push(word);
    }
  }
  return words;
}

function* generateTerms(
  text: string,
  minLength: number,
  stopWords: ReadonlySet<string>
): Generator<Term> {
  for (const word of normalizeWords(text)) {
    if (word.length < minLength) continue;
    if (stopWords.has(word)) continue;
    yield word;
  }
}

/**
 * Tokenize text into index terms.
 *
 * The returned iterable is lazy and restartable: each iteration walks the
 * text again from the start.
 */
export function tokenize(text: string, options: TokenizerOptions = {}): Iterable<Term> {
  const minLength = options.minLength ?? MIN_TOKEN_LENGTH;
  const stopWords = options.stopWords ?? DEFAULT_STOP_WORDS;
  return {
    [Symbol.iterator]: () => generateTerms(text, minLength, stopWords),
  };
}
