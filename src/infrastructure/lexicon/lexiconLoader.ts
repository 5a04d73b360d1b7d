/**
 * Lexicon Loader
 *
 * Reads an expansion table from YAML or JSON. The file format:
 *
 * ```yaml
 * version: "1.0.0"
 * expansions:
 *   ai: [artificial intelligence, deep learning]
 *   self driving: [autonomous vehicle]
 * popular:
 *   - graph neural networks
 * ```
 *
 * JSON is parsed through the YAML parser as well, since YAML 1.2 is a
 * superset of JSON.
 */

import { parse } from "yaml";
import type { Lexicon, LexiconEntry } from "../../domain/entities";
import { LexiconFormatError } from "../../domain/entities";
import type { FileSystem } from "../../domain/ports";
import { isRecord } from "../../domain/services";
import { nodeFileSystem } from "../filesystem";

const DEFAULT_LEXICON_VERSION = "1.0.0";

function stringArray(value: unknown, source: string, where: string): string[] {
  if (!Array.isArray(value)) {
    throw new LexiconFormatError(source, `${where} must be a list of strings`);
  }
  const items: string[] = [];
  value.forEach((item: unknown, i) => {
    if (typeof item !== "string" && typeof item !== "number") {
      throw new LexiconFormatError(source, `${where}[${i}] must be a string`);
    }
    const text = String(item).trim();
    if (text) items.push(text);
  });
  return items;
}

/**
 * Turn parsed lexicon data into a Lexicon.
 *
 * @param data - The parsed file content
 * @param source - File name used in error messages
 */
export function toLexicon(data: unknown, source: string): Lexicon {
  if (!isRecord(data)) {
    throw new LexiconFormatError(source, "expected a mapping at the top level");
  }

  const version = data.version ?? DEFAULT_LEXICON_VERSION;
  if (typeof version !== "string" && typeof version !== "number") {
    throw new LexiconFormatError(source, "version must be a string");
  }

  const expansions = data.expansions ?? {};
  if (!isRecord(expansions)) {
    throw new LexiconFormatError(source, "expansions must map each key to a list");
  }

  const entries: LexiconEntry[] = Object.entries(expansions).map(([term, value]) => ({
    term,
    expansions: stringArray(value, source, `expansions.${term}`),
  }));

  const popularSearches =
    data.popular === undefined ? [] : stringArray(data.popular, source, "popular");

  return { version: String(version), entries, popularSearches };
}

/**
 * Parse lexicon file content.
 *
 * @throws LexiconFormatError on malformed YAML/JSON or an unexpected shape
 */
export function parseLexicon(content: string, source = "<lexicon>"): Lexicon {
  let data: unknown;
  try {
    data = parse(content);
  } catch (error) {
    throw new LexiconFormatError(source, "cannot parse lexicon file", { cause: error });
  }
  return toLexicon(data, source);
}

/**
 * Load a lexicon file from disk.
 *
 * @throws LexiconFormatError when the file cannot be read or parsed
 */
export async function loadLexicon(
  filepath: string,
  fileSystem: FileSystem = nodeFileSystem
): Promise<Lexicon> {
  let content: string;
  try {
    content = await fileSystem.readFile(filepath);
  } catch (error) {
    const reason =
      (error as NodeJS.ErrnoException).code === "ENOENT"
        ? "lexicon file does not exist"
        : "cannot read lexicon file";
    throw new LexiconFormatError(filepath, reason, { cause: error });
  }
  return parseLexicon(content, filepath);
}
