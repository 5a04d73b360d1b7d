/**
 * Logger Infrastructure
 *
 * Implements the Logger port with various logging strategies.
 */

export {
  ConsoleLogger,
  InlineProgressLogger,
  SilentLogger,
  MemoryLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from "./loggers";
