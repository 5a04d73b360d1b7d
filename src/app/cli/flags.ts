/**
 * CLI flag parsing
 *
 * Kept free of process I/O: bad input throws a CliUsageError and the entry
 * point decides how to report it.
 */

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/**
 * Parsed CLI flags from command line arguments
 */
export interface ParsedFlags {
  /** Expand the query through the lexicon (undefined: config default) */
  semantic?: boolean;
  /** Exact primary category, e.g. 'cs.LG' */
  category?: string;
  /** Earliest publication year, inclusive */
  yearFrom?: number;
  /** Latest publication year, inclusive */
  yearTo?: number;
  /** Case-insensitive author substring */
  author?: string;
  /** relevance | date_desc | date_asc */
  sort?: string;
  /** Number of results to return */
  limit?: number;
  /** Print machine-readable JSON */
  json: boolean;
  /** Directory holding papersift.config.json */
  configDir?: string;
  /** Show help message */
  help: boolean;
  /** Show detailed progress */
  verbose: boolean;
  /** Keep rebuilding on corpus changes */
  watch: boolean;
  /** Remaining positional arguments */
  remaining: string[];
}

function requireValue(args: string[], i: number, flag: string, hint: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith("-")) {
    throw new CliUsageError(`${flag} requires ${hint}`);
  }
  return value;
}

function parseYear(value: string, flag: string): number {
  if (!/^\d{1,4}$/.test(value)) {
    throw new CliUsageError(`Invalid year for ${flag}: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * Parse CLI flags from command line arguments
 * @param args - Array of command line arguments (excluding command name)
 * @returns Parsed flags object
 * @throws CliUsageError on a missing or malformed flag value
 */
export function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = {
    json: false,
    help: false,
    verbose: false,
    watch: false,
    remaining: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      flags.help = true;
    } else if (arg === "--verbose" || arg === "-v") {
      flags.verbose = true;
    } else if (arg === "--watch" || arg === "-w") {
      flags.watch = true;
    } else if (arg === "--json") {
      flags.json = true;
    } else if (arg === "--semantic" || arg === "-s") {
      flags.semantic = true;
    } else if (arg === "--no-semantic") {
      flags.semantic = false;
    } else if (arg === "--category" || arg === "-c") {
      flags.category = requireValue(args, ++i, arg, "a category (e.g., cs.LG)");
    } else if (arg === "--from") {
      flags.yearFrom = parseYear(requireValue(args, ++i, arg, "a year"), arg);
    } else if (arg === "--to") {
      flags.yearTo = parseYear(requireValue(args, ++i, arg, "a year"), arg);
    } else if (arg === "--author" || arg === "-a") {
      flags.author = requireValue(args, ++i, arg, "an author name");
    } else if (arg === "--sort") {
      flags.sort = requireValue(args, ++i, arg, "relevance, date_desc or date_asc");
    } else if (arg === "--limit" || arg === "-k") {
      const value = requireValue(args, ++i, arg, "a number");
      const limit = parseInt(value, 10);
      if (isNaN(limit)) {
        throw new CliUsageError(`Invalid limit: ${value}. Must be a number.`);
      }
      flags.limit = limit;
    } else if (arg === "--config") {
      flags.configDir = requireValue(args, ++i, arg, "a directory");
    } else if (arg.startsWith("-") && arg.length > 1) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      flags.remaining.push(arg);
    }
  }

  return flags;
}
