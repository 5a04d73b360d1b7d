/**
 * Error Taxonomy
 *
 * Every failure the search core reports is a SearchError with a stable
 * `code`. Build errors are fatal to one rebuild attempt; query errors are
 * scoped to one request.
 */

export type SearchErrorCode =
  | "EMPTY_CORPUS"
  | "INVALID_DOCUMENT"
  | "DUPLICATE_DOCUMENT"
  | "UNKNOWN_SORT_MODE"
  | "INVALID_QUERY"
  | "INVALID_FILTER"
  | "INDEX_NOT_READY"
  | "CORPUS_FORMAT"
  | "LEXICON_FORMAT"
  | "CONFIG_INVALID";

export class SearchError extends Error {
  readonly code: SearchErrorCode;

  constructor(code: SearchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Build invoked with zero documents. */
export class EmptyCorpusError extends SearchError {
  constructor() {
    super("EMPTY_CORPUS", "Cannot build an index from an empty corpus");
  }
}

/** A document without a usable id or required field. */
export class InvalidDocumentError extends SearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_DOCUMENT", message, options);
  }
}

/** The same id supplied twice in one corpus. */
export class DuplicateDocumentError extends SearchError {
  readonly docId: string;

  constructor(docId: string) {
    super("DUPLICATE_DOCUMENT", `Duplicate document id: ${docId}`);
    this.docId = docId;
  }
}

export class UnknownSortModeError extends SearchError {
  readonly sortMode: string;

  constructor(sortMode: string, allowed: readonly string[]) {
    super(
      "UNKNOWN_SORT_MODE",
      `Unknown sort mode "${sortMode}" (expected one of: ${allowed.join(", ")})`
    );
    this.sortMode = sortMode;
  }
}

export class InvalidQueryError extends SearchError {
  constructor(message: string) {
    super("INVALID_QUERY", message);
  }
}

export class InvalidFilterError extends SearchError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("INVALID_FILTER", `${field}: ${message}`);
    this.field = field;
  }
}

/** A query arrived before the first successful build. */
export class IndexNotReadyError extends SearchError {
  constructor() {
    super("INDEX_NOT_READY", "No index has been built yet");
  }
}

export class CorpusFormatError extends SearchError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("CORPUS_FORMAT", `${source}: ${message}`, options);
    this.source = source;
  }
}

export class LexiconFormatError extends SearchError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("LEXICON_FORMAT", `${source}: ${message}`, options);
    this.source = source;
  }
}

export class ConfigError extends SearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

export function isSearchError(value: unknown): value is SearchError {
  return value instanceof SearchError;
}
