#!/usr/bin/env node
// Main CLI entry point for papersift

import * as fs from "fs";
import * as path from "path";
import type {
  SearchFilters,
  SearchRequest,
  SearchResponse,
} from "../../domain/entities";
import { isSearchError } from "../../domain/entities";
import type { Logger } from "../../domain/ports";
import { formatSearchResults } from "../../domain/usecases";
import {
  createInlineLogger,
  createSilentLogger,
} from "../../infrastructure/logger";
import { createSearchService } from "../../composition";
import { CliUsageError, parseFlags, type ParsedFlags } from "./flags";

function readVersion(): string {
  // Same relative location from src/app/cli and dist/app/cli
  const pkgPath = path.resolve(__dirname, "../../../package.json");
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
    return String(pkg.version);
  }
  return "0.0.0";
}

const VERSION = readVersion();

const args = process.argv.slice(2);
const command = args[0];

// Handle --version / -v at top level (before any command)
if (command === "--version" || command === "-v") {
  console.log(`papersift v${VERSION}`);
  process.exit(0);
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function toRequest(flags: ParsedFlags): SearchRequest {
  const filters: SearchFilters = {
    category: flags.category,
    yearFrom: flags.yearFrom,
    yearTo: flags.yearTo,
    author: flags.author,
  };
  return {
    query: flags.remaining.join(" "),
    semantic: flags.semantic,
    filters,
    sort: flags.sort,
    limit: flags.limit,
  };
}

function toJson(response: SearchResponse): unknown {
  return {
    query: response.query,
    expandedTerms: response.expansion.expandedTerms.map((t) => t.term),
    totalMatches: response.totalMatches,
    limit: response.limit,
    sort: response.sort,
    results: response.results.map((hit) => ({
      ...hit.document,
      score: hit.score,
      matchedTerms: hit.matchedTerms,
    })),
  };
}

/**
 * Load config, lexicon and corpus, and build the first index.
 */
async function openService(flags: ParsedFlags, logger: Logger) {
  const rootDir = path.resolve(flags.configDir ?? process.cwd());
  const container = await createSearchService(rootDir, { logger });
  await container.service.rebuild();
  return container;
}

/** Progress on the terminal only when asked for; JSON output stays clean. */
function queryLogger(flags: ParsedFlags): Logger {
  return flags.verbose && !flags.json
    ? createInlineLogger({ verbose: true })
    : createSilentLogger();
}

async function main(): Promise<void> {
  const flags = parseFlags(args.slice(1)); // Skip the command itself

  switch (command) {
    case "search": {
      if (flags.help) {
        console.log(`
papersift search - Search the paper corpus

Usage:
  papersift search <query> [options]

Options:
  -s, --semantic         Expand casual terms into academic vocabulary
      --no-semantic      Disable expansion even if enabled in config
  -c, --category <cat>   Only papers whose primary category is <cat>
      --from <year>      Published in or after <year>
      --to <year>        Published in or before <year>
  -a, --author <name>    Author name contains <name> (case-insensitive)
      --sort <mode>      relevance (default), date_desc or date_asc
  -k, --limit <n>        Number of results, 1-100 (default: 50)
      --json             Print results as JSON
      --config <dir>     Directory containing papersift.config.json
  -v, --verbose          Show indexing progress and query timing
  -h, --help             Show this help message

Examples:
  papersift search "graph neural networks"
  papersift search "ai chatbot" --semantic --limit 10
  papersift search transformer --category cs.CL --from 2020 --to 2022
  papersift search "diffusion" --sort date_desc --json
`);
        return;
      }

      if (flags.remaining.length === 0) {
        throw new CliUsageError("Usage: papersift search <query>");
      }

      const { service } = await openService(flags, queryLogger(flags));
      const response = service.search(toRequest(flags));
      if (flags.json) {
        printJson(toJson(response));
      } else {
        console.log(formatSearchResults(response));
        if (flags.verbose) {
          console.log(`\n(${response.tookMs}ms)`);
        }
      }
      break;
    }

    case "stats": {
      if (flags.help) {
        console.log(`
papersift stats - Show corpus statistics

Usage:
  papersift stats [--json] [--config <dir>]
`);
        return;
      }

      const { service } = await openService(flags, queryLogger(flags));
      const stats = service.stats();
      if (flags.json) {
        printJson(stats);
        break;
      }

      console.log(`Documents: ${stats.totalDocuments}`);
      if (stats.yearRange) {
        console.log(`Years:     ${stats.yearRange[0]}-${stats.yearRange[1]}`);
      }
      console.log("Categories:");
      const byCount = Object.entries(stats.categories).sort(
        (a, b) => b[1] - a[1] || a[0].localeCompare(b[0])
      );
      for (const [category, count] of byCount) {
        console.log(`  ${category.padEnd(16)} ${count}`);
      }
      break;
    }

    case "facets": {
      if (flags.help) {
        console.log(`
papersift facets - List the values the search filters accept

Usage:
  papersift facets [--json] [--config <dir>]
`);
        return;
      }

      const { service } = await openService(flags, queryLogger(flags));
      const facets = service.facets();
      if (flags.json) {
        printJson(facets);
        break;
      }

      console.log(`Categories: ${facets.categories.join(", ") || "(none)"}`);
      if (facets.yearRange) {
        console.log(`Years:      ${facets.yearRange[0]}-${facets.yearRange[1]}`);
      }
      break;
    }

    case "suggest": {
      if (flags.help) {
        console.log(`
papersift suggest - Suggest searches for partially typed text

Usage:
  papersift suggest <text> [-k <n>] [--json]
`);
        return;
      }

      const partial = flags.remaining.join(" ");
      if (!partial.trim()) {
        throw new CliUsageError("Usage: papersift suggest <text>");
      }

      const rootDir = path.resolve(flags.configDir ?? process.cwd());
      const { service } = await createSearchService(rootDir, {
        logger: queryLogger(flags),
      });
      const suggestions = service.suggest(partial, flags.limit);
      if (flags.json) {
        printJson({ suggestions });
      } else if (suggestions.length === 0) {
        console.log(`No suggestions for "${partial}".`);
      } else {
        for (const suggestion of suggestions) {
          console.log(suggestion);
        }
      }
      break;
    }

    case "index": {
      if (flags.help) {
        console.log(`
papersift index - Build the index and report on the corpus

Usage:
  papersift index [options]

Options:
  -w, --watch            Rebuild whenever the corpus changes
      --config <dir>     Directory containing papersift.config.json
  -v, --verbose          Show detailed progress
  -h, --help             Show this help message
`);
        return;
      }

      // Create inline logger for CLI (progress replaces current line)
      const logger = createInlineLogger({ verbose: flags.verbose });
      const { service, config } = await openService(flags, logger);

      if (!flags.watch) {
        break;
      }

      const { watchCorpus } = await import("../indexer");
      const watcher = await watchCorpus(service, config.corpusPath, {
        debounceMs: config.watch.debounceMs,
        onFileChange: (event, filepath) => {
          if (flags.verbose) {
            const symbol = event === "add" ? "+" : event === "unlink" ? "-" : "~";
            logger.info(`  ${symbol} ${filepath}`);
          }
        },
        // The service has already logged the failure; the old index keeps serving
        onError: (error) => logger.debug(`Watch: ${error.message}`),
      });

      logger.info(`\nWatching ${config.corpusPath} for changes... (Ctrl+C to stop)`);

      // Handle graceful shutdown
      const shutdown = (): void => {
        logger.info("\nStopping watcher...");
        watcher.stop().then(
          () => process.exit(0),
          (error: unknown) => {
            console.error("Error stopping watcher:", error);
            process.exit(1);
          }
        );
      };

      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);
      break;
    }

    default:
      console.log(`
papersift v${VERSION} - BM25 search over research paper metadata

Usage:
  papersift <command> [options]

Commands:
  search    Search the corpus
  stats     Show corpus statistics
  facets    List categories and the year range
  suggest   Suggest searches for partially typed text
  index     Build the index (optionally watching for changes)

Options:
  -h, --help     Show help for a command
  -v, --version  Show version number

Examples:
  papersift search "reinforcement learning" --limit 5
  papersift search "self driving car" --semantic
  papersift suggest "deep"
  papersift index --watch

Run 'papersift <command> --help' for more information.
`);
      if (command && command !== "--help" && command !== "-h") {
        throw new CliUsageError(`Unknown command: ${command}`);
      }
  }
}

main().catch((error: unknown) => {
  if (error instanceof CliUsageError) {
    console.error(error.message);
    console.error('Run "papersift --help" for more information.');
  } else if (isSearchError(error)) {
    console.error(`Error (${error.code}): ${error.message}`);
  } else {
    console.error("Unexpected error:", error);
  }
  process.exit(1);
});
