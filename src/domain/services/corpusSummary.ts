/**
 * Corpus Summary
 *
 * Statistics and filter facets over the indexed documents.
 */

import type { Document } from "../entities";

export interface CorpusSummary {
  totalDocuments: number;
  /** document count per primary category */
  categories: Record<string, number>;
  /** [earliest, latest] publication year, or null for an empty corpus */
  yearRange: [number, number] | null;
}

export interface CorpusFacets {
  /** distinct primary categories, sorted */
  categories: string[];
  yearRange: [number, number] | null;
}

export function summarizeCorpus(documents: Iterable<Document>): CorpusSummary {
  const counts = new Map<string, number>();
  let total = 0;
  let minYear = Infinity;
  let maxYear = -Infinity;

  for (const doc of documents) {
    total++;
    if (doc.primaryCategory) {
      counts.set(doc.primaryCategory, (counts.get(doc.primaryCategory) ?? 0) + 1);
    }
    minYear = Math.min(minYear, doc.year);
    maxYear = Math.max(maxYear, doc.year);
  }

  // Null prototype: category names such as "constructor" are plain keys
  const categories: Record<string, number> = Object.create(null);
  for (const [category, count] of counts) {
    categories[category] = count;
  }

  return {
    totalDocuments: total,
    categories,
    yearRange: total > 0 ? [minYear, maxYear] : null,
  };
}

export function corpusFacets(documents: Iterable<Document>): CorpusFacets {
  const summary = summarizeCorpus(documents);
  return {
    categories: Object.keys(summary.categories).sort(),
    yearRange: summary.yearRange,
  };
}
