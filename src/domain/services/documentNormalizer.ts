/**
 * Document Normalizer
 *
 * Maps raw paper records onto Document. Two shapes are accepted:
 *
 * - the metadata export: `paper_id`, `primary_category`, space-separated
 *   `categories`, comma-separated `authors`
 * - the Document field names themselves (`id`, `primaryCategory`, arrays)
 *
 * `year` is taken from the record when present, otherwise from the first
 * four digits of `published`.
 */

import type { Document } from "../entities";
import { InvalidDocumentError } from "../entities";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function firstString(record: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = asString(record[key]);
    if (value !== undefined) return value;
  }
  return undefined;
}

function stringList(value: unknown, separator: RegExp): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  if (typeof value === "string") {
    return value
      .split(separator)
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  return [];
}

function parseYear(record: Record<string, unknown>, published: string): number | undefined {
  const year = record.year;
  if (typeof year === "number" && Number.isInteger(year)) return year;
  if (typeof year === "string" && /^\d{4}$/.test(year.trim())) return Number(year.trim());

  const match = /^(\d{4})/.exec(published.trim());
  return match ? Number(match[1]) : undefined;
}

/**
 * Convert one raw record into a Document.
 *
 * @param raw - Parsed JSON value
 * @param position - Human-readable location for error messages
 * @throws InvalidDocumentError when the id or the year cannot be determined
 */
export function normalizePaperRecord(raw: unknown, position: string): Document {
  if (!isRecord(raw)) {
    throw new InvalidDocumentError(`${position}: record must be an object`);
  }

  const id = firstString(raw, ["id", "paper_id"])?.trim();
  if (!id) {
    throw new InvalidDocumentError(`${position}: missing id`);
  }

  const categories = stringList(raw.categories, /\s+/);
  const primaryCategory =
    firstString(raw, ["primaryCategory", "primary_category", "category"])?.trim() ||
    categories[0] ||
    "";
  if (primaryCategory && !categories.includes(primaryCategory)) {
    categories.unshift(primaryCategory);
  }

  const published = firstString(raw, ["published", "published_date"]) ?? "";
  const year = parseYear(raw, published);
  if (year === undefined) {
    throw new InvalidDocumentError(`${position} (${id}): cannot determine publication year`);
  }

  return {
    id,
    title: firstString(raw, ["title"]) ?? "",
    abstract: firstString(raw, ["abstract", "summary"]) ?? "",
    authors: stringList(raw.authors, /\s*,\s*/),
    primaryCategory,
    categories,
    year,
    published,
  };
}
