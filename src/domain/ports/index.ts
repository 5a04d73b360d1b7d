/**
 * Domain Ports
 *
 * Interfaces defining what the domain needs from external systems.
 * These are implemented by infrastructure adapters.
 */

export type { FileSystem, FileStats } from "./filesystem";
export type { CorpusSource } from "./corpus";
export type { Logger, ProgressInfo } from "./logger";
