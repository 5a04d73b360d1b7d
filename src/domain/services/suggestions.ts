/**
 * Search suggestions for partially typed queries.
 *
 * Popular searches containing the input come first, then the input
 * extended with the leading expansions of every lexicon key it contains.
 */

import type { QueryExpander } from "./lexicon";

/** Expansions offered per matched key. */
const EXPANSIONS_PER_KEY = 3;

export function suggestQueries(
  partial: string,
  expander: QueryExpander,
  limit: number = 5
): string[] {
  const query = partial.trim();
  if (!query || limit <= 0) return [];

  const needle = query.toLowerCase();
  const suggestions: string[] = [];
  const seen = new Set<string>();

  const push = (suggestion: string): void => {
    const key = suggestion.toLowerCase();
    if (seen.has(key)) return;
    seen.add(key);
    suggestions.push(suggestion);
  };

  for (const popular of expander.lexicon.popularSearches) {
    if (popular.toLowerCase().includes(needle)) {
      push(popular);
    }
  }

  for (const key of expander.findKeys(query)) {
    for (const expansion of expander.getExpansions(key).slice(0, EXPANSIONS_PER_KEY)) {
      push(`${query} ${expansion}`);
    }
  }

  return suggestions.slice(0, limit);
}
