/**
 * Lexicon Service
 *
 * Query expansion using a static expansion table: casual or shorthand
 * words ("ai", "chatbot", "self driving") are mapped to the vocabulary
 * papers are written in.
 *
 * Expansion is additive. The literal query terms are always kept, so an
 * expanded query is a superset of the literal one.
 *
 * This is a pure domain service with no external dependencies.
 */

import type {
  ExpandedQuery,
  ExpandedTerm,
  ExpansionOptions,
  Lexicon,
  Term,
} from "../entities";
import { DEFAULT_EXPANSION_OPTIONS } from "../entities";
import { normalizeWords, tokenize } from "./tokenizer";

/**
 * Normalize a lexicon key the same way raw query words are normalized.
 */
export function normalizeKey(key: string): string {
  return normalizeWords(key).join(" ");
}

/**
 * Build a lookup map from a lexicon for fast key lookup.
 * Entries with the same normalized key are merged.
 */
export function buildLookupMap(lexicon: Lexicon): Map<string, string[]> {
  const map = new Map<string, string[]>();
  for (const entry of lexicon.entries) {
    const key = normalizeKey(entry.term);
    if (!key) continue;
    const existing = map.get(key);
    map.set(key, existing ? [...existing, ...entry.expansions] : [...entry.expansions]);
  }
  return map;
}

/**
 * Expands queries against one lexicon. The lexicon is fixed at
 * construction; swap the expander to change tables.
 */
export class QueryExpander {
  private readonly lookup: ReadonlyMap<string, readonly string[]>;
  private readonly options: Required<ExpansionOptions>;

  constructor(readonly lexicon: Lexicon, options: ExpansionOptions = {}) {
    this.lookup = buildLookupMap(lexicon);
    this.options = { ...DEFAULT_EXPANSION_OPTIONS, ...options };
  }

  /**
   * Expansions for a key, or an empty array if the key is unknown.
   */
  getExpansions(key: string): readonly string[] {
    return this.lookup.get(normalizeKey(key)) ?? [];
  }

  /**
   * Lexicon keys found in the raw query, in query order.
   *
   * Every run of 1..maxPhraseWords consecutive words is looked up, so both
   * "ai" (which the tokenizer would drop as too short) and "self driving"
   * can match.
   */
  findKeys(query: string): string[] {
    const words = normalizeWords(query);
    const found: string[] = [];
    const seen = new Set<string>();

    for (let start = 0; start < words.length; start++) {
      for (let size = 1; size <= this.options.maxPhraseWords; size++) {
        if (start + size > words.length) break;
        const key = words.slice(start, start + size).join(" ");
        if (!seen.has(key) && this.lookup.has(key)) {
          seen.add(key);
          found.push(key);
        }
      }
    }
    return found;
  }

  /**
   * Expand a query.
   *
   * @param query - The raw query string
   * @param enabled - When false only the literal terms are returned
   */
  expand(query: string, enabled: boolean): ExpandedQuery {
    const originalTerms = Array.from(new Set(tokenize(query)));
    const expandedTerms = originalTerms.map((term): ExpandedTerm => ({
      term,
      tokens: [term],
      weight: 1.0,
      source: "original",
    }));

    if (!enabled) {
      return {
        originalQuery: query,
        originalTerms,
        expandedTerms,
        matchedKeys: [],
        wasExpanded: false,
      };
    }

    const seenUnits = new Set<string>(originalTerms);
    const matchedKeys = this.findKeys(query);
    let added = 0;

    for (const key of matchedKeys) {
      for (const phrase of this.lookup.get(key) ?? []) {
        if (added >= this.options.maxTerms) break;

        const tokens: Term[] = Array.from(new Set(tokenize(phrase)));
        if (tokens.length === 0) continue;

        const unitKey = tokens.join(" ");
        if (seenUnits.has(unitKey)) continue;
        seenUnits.add(unitKey);

        expandedTerms.push({
          term: unitKey,
          tokens,
          weight: this.options.expansionWeight,
          source: "expansion",
          expandedFrom: key,
        });
        added++;
      }
    }

    return {
      originalQuery: query,
      originalTerms,
      expandedTerms,
      matchedKeys,
      wasExpanded: added > 0,
    };
  }
}
