/**
 * Configuration Validator
 *
 * Validates papersift configuration for correctness and provides
 * helpful error messages for invalid configurations.
 */

import type { SearchConfig } from "../entities/config";

/**
 * Validation result for a single field or section.
 */
export interface ValidationIssue {
  /** The path to the invalid field (e.g., "bm25.k1") */
  path: string;

  /** The type of issue: error (invalid), warning (suboptimal), info (suggestion) */
  severity: "error" | "warning" | "info";

  /** Human-readable description of the issue */
  message: string;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Overall validation result.
 */
export interface ValidationResult {
  /** Whether the configuration is valid (no errors) */
  valid: boolean;

  /** List of all issues found */
  issues: ValidationIssue[];

  /** Helper method to get issues by severity */
  getErrors(): ValidationIssue[];
  getWarnings(): ValidationIssue[];
  getInfos(): ValidationIssue[];
}

/** Corpus formats the JSON corpus source can read. */
const CORPUS_EXTENSIONS = [".json"];

/** Lexicon formats the lexicon loader can read. */
const LEXICON_EXTENSIONS = [".yaml", ".yml", ".json"];

function extensionOf(filepath: string): string {
  const base = filepath.split(/[\\/]/).pop() ?? "";
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(dot).toLowerCase() : "";
}

function isPositiveInteger(value: unknown): boolean {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/**
 * Validate a papersift configuration.
 *
 * @param config - The configuration to validate
 * @returns Validation result with any issues found
 */
export function validateConfig(config: SearchConfig): ValidationResult {
  const issues: ValidationIssue[] = [];

  // Validate version
  if (!config.version) {
    issues.push({
      path: "version",
      severity: "error",
      message: "Configuration version is required",
      suggestion: "Add a version field (e.g., '0.1.0')",
    });
  } else if (!/^\d+\.\d+\.\d+$/.test(config.version)) {
    issues.push({
      path: "version",
      severity: "warning",
      message: `Version '${config.version}' is not in semver format`,
      suggestion: "Use semantic versioning (e.g., '0.1.0')",
    });
  }

  // Validate corpus location
  if (!config.corpusPath) {
    issues.push({
      path: "corpusPath",
      severity: "error",
      message: "Corpus path is required",
      suggestion: "Point corpusPath at a JSON export or a directory of them",
    });
  } else {
    const ext = extensionOf(config.corpusPath);
    if (ext && !CORPUS_EXTENSIONS.includes(ext)) {
      issues.push({
        path: "corpusPath",
        severity: "warning",
        message: `Corpus file '${config.corpusPath}' does not look like JSON`,
        suggestion: "Export the corpus as a JSON array of paper records",
      });
    }
  }

  if (!config.corpusPattern) {
    issues.push({
      path: "corpusPattern",
      severity: "error",
      message: "Corpus file pattern is required",
      suggestion: "Use '**/*.json' (default)",
    });
  }

  if (config.lexiconPath !== undefined) {
    const ext = extensionOf(config.lexiconPath);
    if (!LEXICON_EXTENSIONS.includes(ext)) {
      issues.push({
        path: "lexiconPath",
        severity: "error",
        message: `Unsupported lexicon format '${ext || config.lexiconPath}'`,
        suggestion: `Use one of: ${LEXICON_EXTENSIONS.join(", ")}`,
      });
    }
  }

  validateBm25(config, issues);
  validateLimit(config, issues);
  validateExpansion(config, issues);

  if (!Number.isFinite(config.watch.debounceMs) || config.watch.debounceMs < 0) {
    issues.push({
      path: "watch.debounceMs",
      severity: "error",
      message: "Debounce delay must be a non-negative number of milliseconds",
      suggestion: "Use 300 (default)",
    });
  }

  return createValidationResult(issues);
}

/**
 * Validate BM25 constants.
 */
function validateBm25(config: SearchConfig, issues: ValidationIssue[]): void {
  const { k1, b } = config.bm25;

  if (!Number.isFinite(k1) || k1 < 0) {
    issues.push({
      path: "bm25.k1",
      severity: "error",
      message: "k1 must be a non-negative number",
      suggestion: "Typical values are 1.2-2.0 (default 1.5)",
    });
  } else if (k1 > 3) {
    issues.push({
      path: "bm25.k1",
      severity: "info",
      message: `k1 = ${k1} is unusually high; term frequency will barely saturate`,
    });
  }

  if (!Number.isFinite(b) || b < 0 || b > 1) {
    issues.push({
      path: "bm25.b",
      severity: "error",
      message: "b must be a number between 0 and 1",
      suggestion: "Use 0.75 (default)",
    });
  }
}

/**
 * Validate result-count bounds.
 */
function validateLimit(config: SearchConfig, issues: ValidationIssue[]): void {
  const { min, max } = config.limit;
  const fallback = config.limit.default;

  for (const [field, value] of [
    ["min", min],
    ["max", max],
    ["default", fallback],
  ] as const) {
    if (!isPositiveInteger(value)) {
      issues.push({
        path: `limit.${field}`,
        severity: "error",
        message: `limit.${field} must be a positive integer`,
      });
    }
  }

  if (isPositiveInteger(min) && isPositiveInteger(max) && min > max) {
    issues.push({
      path: "limit",
      severity: "error",
      message: `limit.min (${min}) is greater than limit.max (${max})`,
    });
  } else if (
    isPositiveInteger(fallback) &&
    isPositiveInteger(min) &&
    isPositiveInteger(max) &&
    (fallback < min || fallback > max)
  ) {
    issues.push({
      path: "limit.default",
      severity: "warning",
      message: `limit.default (${fallback}) is outside [${min}, ${max}] and will be clamped`,
    });
  }
}

/**
 * Validate query expansion options.
 */
function validateExpansion(config: SearchConfig, issues: ValidationIssue[]): void {
  const { enabledByDefault, weight, maxPhraseWords, maxTerms } = config.expansion;

  if (typeof enabledByDefault !== "boolean") {
    issues.push({
      path: "expansion.enabledByDefault",
      severity: "error",
      message: "enabledByDefault must be true or false",
    });
  }

  if (!Number.isFinite(weight) || weight <= 0) {
    issues.push({
      path: "expansion.weight",
      severity: "error",
      message: "Expansion weight must be a positive number",
      suggestion: "Use 1.0 (default) to score expansions like literal terms",
    });
  } else if (weight > 1) {
    issues.push({
      path: "expansion.weight",
      severity: "warning",
      message: "Expansion terms outweigh the words actually typed",
    });
  }

  if (!isPositiveInteger(maxPhraseWords)) {
    issues.push({
      path: "expansion.maxPhraseWords",
      severity: "error",
      message: "maxPhraseWords must be a positive integer",
      suggestion: "Use 3 (default)",
    });
  }

  if (!isPositiveInteger(maxTerms)) {
    issues.push({
      path: "expansion.maxTerms",
      severity: "error",
      message: "maxTerms must be a positive integer",
      suggestion: "Use 40 (default)",
    });
  }
}

/**
 * Create a validation result object with helper methods.
 */
function createValidationResult(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter((i) => i.severity === "error");
  const warnings = issues.filter((i) => i.severity === "warning");
  const infos = issues.filter((i) => i.severity === "info");

  return {
    valid: errors.length === 0,
    issues,
    getErrors: () => errors,
    getWarnings: () => warnings,
    getInfos: () => infos,
  };
}

/**
 * Format validation issues for display.
 */
export function formatValidationIssues(issues: ValidationIssue[]): string {
  if (issues.length === 0) {
    return "Configuration is valid.";
  }

  const lines: string[] = [];
  const sections: Array<[ValidationIssue["severity"], string, string]> = [
    ["error", "ERRORS:", "✗"],
    ["warning", "WARNINGS:", "⚠"],
    ["info", "INFO:", "ℹ"],
  ];

  for (const [severity, heading, marker] of sections) {
    const matching = issues.filter((i) => i.severity === severity);
    if (matching.length === 0) continue;

    if (lines.length > 0) lines.push("");
    lines.push(heading);
    for (const issue of matching) {
      lines.push(`  ${marker} ${issue.path}: ${issue.message}`);
      if (issue.suggestion) {
        lines.push(`    → ${issue.suggestion}`);
      }
    }
  }

  return lines.join("\n");
}
