/**
 * Logger Implementations
 *
 * Provides different logging strategies for various use cases:
 * - ConsoleLogger: Standard console output (default for SDK)
 * - InlineProgressLogger: Progress with inline replacement (for CLI)
 * - SilentLogger: No output (for quiet mode)
 * - MemoryLogger: Records messages (for tests and embedding hosts)
 *
 * Everything except info goes to stderr, so CLI output on stdout can be
 * piped (e.g. `papersift search --json`).
 */

import type { Logger } from "../../domain/ports";

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Show debug messages */
  verbose?: boolean;
}

/**
 * Standard console logger.
 * Logs messages normally without inline replacement.
 * Default for SDK usage.
 */
export class ConsoleLogger implements Logger {
  private verbose: boolean;

  constructor(options?: LoggerOptions) {
    this.verbose = options?.verbose ?? false;
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.error(message);
    }
  }

  progress(message: string): void {
    // For SDK, just log the message normally
    if (this.verbose) {
      console.error(message);
    }
  }

  clearProgress(): void {
    // No-op for console logger
  }
}

/**
 * CLI logger with inline progress replacement.
 * Uses carriage return to overwrite progress lines in place on stderr.
 */
export class InlineProgressLogger implements Logger {
  private verbose: boolean;
  private lastProgressLength = 0;
  private hasProgress = false;

  constructor(
    options?: LoggerOptions,
    private readonly stream: NodeJS.WriteStream = process.stderr
  ) {
    this.verbose = options?.verbose ?? false;
  }

  info(message: string): void {
    this.clearProgress();
    console.log(message);
  }

  warn(message: string): void {
    this.clearProgress();
    console.warn(message);
  }

  error(message: string): void {
    this.clearProgress();
    console.error(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.clearProgress();
      console.error(message);
    }
  }

  progress(message: string): void {
    if (!this.stream.isTTY) {
      // Carriage returns only make sense on a terminal
      this.debug(message);
      return;
    }
    this.stream.write(`\r${message}`);
    // Pad with spaces to clear any leftover characters from previous progress
    const padding = Math.max(0, this.lastProgressLength - message.length);
    if (padding > 0) {
      this.stream.write(" ".repeat(padding));
    }
    this.lastProgressLength = message.length;
    this.hasProgress = true;
  }

  clearProgress(): void {
    if (this.hasProgress && this.lastProgressLength > 0) {
      this.stream.write("\r" + " ".repeat(this.lastProgressLength) + "\r");
      this.lastProgressLength = 0;
      this.hasProgress = false;
    }
  }
}

/**
 * Silent logger that produces no output.
 * Used for quiet mode or testing.
 */
export class SilentLogger implements Logger {
  info(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
  progress(): void {}
  clearProgress(): void {}
}

export type LogLevel = "info" | "warn" | "error" | "debug" | "progress";

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Logger that keeps every message in memory.
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  progress(message: string): void {
    this.entries.push({ level: "progress", message });
  }

  clearProgress(): void {}

  /** Messages logged at one level, in order. */
  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

/**
 * Create a standard console logger.
 * Default for SDK usage.
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}

/**
 * Create an inline progress logger for CLI usage.
 * Progress messages replace the current line.
 */
export function createInlineLogger(options?: LoggerOptions): Logger {
  return new InlineProgressLogger(options);
}

/**
 * Create a silent logger.
 * Produces no output.
 */
export function createSilentLogger(): Logger {
  return new SilentLogger();
}
