/**
 * JSON Corpus Source
 *
 * Loads paper records from a JSON export. The configured path is either a
 * single file or a directory, in which case every file matching the
 * corpus pattern is read in sorted path order.
 *
 * Each file holds an array of records, or an object with a `papers` array.
 */

import type { Document } from "../../domain/entities";
import { CorpusFormatError } from "../../domain/entities";
import type { CorpusSource, FileSystem, Logger } from "../../domain/ports";
import { isRecord, normalizePaperRecord } from "../../domain/services";
import { nodeFileSystem } from "../filesystem";

/** Directories never searched for corpus files */
const IGNORED_DIRECTORIES = ["node_modules", ".git"];

export interface JsonCorpusSourceOptions {
  /** File or directory holding the corpus */
  path: string;
  /** Glob used when `path` is a directory. Default: "**\/*.json" */
  pattern?: string;
  fileSystem?: FileSystem;
  logger?: Logger;
}

export class JsonCorpusSource implements CorpusSource {
  readonly description: string;
  private readonly path: string;
  private readonly pattern: string;
  private readonly fileSystem: FileSystem;
  private readonly logger?: Logger;

  constructor(options: JsonCorpusSourceOptions) {
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.path = this.fileSystem.resolve(options.path);
    this.pattern = options.pattern ?? "**/*.json";
    this.logger = options.logger;
    this.description = this.path;
  }

  /**
   * Read every corpus file and normalize its records.
   *
   * @throws CorpusFormatError when a file is not a JSON array of records
   * @throws InvalidDocumentError when a record lacks an id or a year
   */
  async load(): Promise<Document[]> {
    const files = await this.listFiles();
    const documents: Document[] = [];

    for (const file of files) {
      const records = await this.readRecords(file);
      records.forEach((raw, i) => {
        documents.push(normalizePaperRecord(raw, `${file}[${i}]`));
      });
      this.logger?.debug(`  ${file}: ${records.length} records`);
    }

    return documents;
  }

  private async listFiles(): Promise<string[]> {
    if (!(await this.fileSystem.exists(this.path))) {
      throw new CorpusFormatError(this.path, "corpus path does not exist");
    }

    const stats = await this.fileSystem.getStats(this.path);
    if (!stats.isDirectory) {
      return [this.path];
    }
    return this.fileSystem.findFiles(this.path, [this.pattern], IGNORED_DIRECTORIES);
  }

  private async readRecords(file: string): Promise<unknown[]> {
    const content = await this.fileSystem.readFile(file);

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new CorpusFormatError(file, "invalid JSON", { cause: error });
    }

    if (Array.isArray(parsed)) return parsed;
    if (isRecord(parsed) && Array.isArray(parsed.papers)) return parsed.papers;
    throw new CorpusFormatError(file, "expected an array of paper records");
  }
}
