import { MalformedTagError, formatTag, isOutside, type Tag } from "../scheme/tag.js";
import { decodeTag } from "../scheme/scheme.js";
import { getScheme, type SchemeLike } from "../scheme/registry.js";
import { START, END, isLegalTransition, type Source } from "../transition/transition.js";
import { LintOptionsSchema, readOptions, type LintOptions } from "../config/options.js";

/**
 * A lint issue (error or warning).
 */
export interface LintIssue {
  type: "malformed" | "transition" | "type";
  severity: "error" | "warning";
  message: string;
  /** Token index; the sequence length for a problem at its end */
  index: number;
}

/**
 * Result of linting a single tag sequence.
 */
export interface LintResult {
  source: string;
  errors: LintIssue[];
  warnings: LintIssue[];
}

/**
 * Summary of all lint results.
 */
export interface LintSummary {
  results: LintResult[];
  totalErrors: number;
  totalWarnings: number;
  sequencesChecked: number;
  sequencesWithErrors: number;
}

/**
 * A named tag sequence to lint.
 */
export interface LintInput {
  source: string;
  tags: readonly string[];
}

const DEFAULT_SOURCE = "<input>";

function label(value: Source): string {
  return value === START ? START : formatTag(value);
}

/**
 * Lint a single tag sequence.
 *
 * Unlike parsing, this never stops early: every malformed tag and every
 * invalid transition between two readable tags is reported.
 *
 * @throws UnknownSchemeError if the scheme name is not recognized
 * @throws OptionsError if the options are invalid
 */
export function lintTags(
  tags: readonly string[],
  scheme: SchemeLike,
  options: LintOptions = {}
): LintResult {
  const resolved = getScheme(scheme);
  const { source = DEFAULT_SOURCE, types } = readOptions(LintOptionsSchema, options, "lint");
  const known = types ? new Set(types) : undefined;
  const reported = new Set<string>();
  const errors: LintIssue[] = [];
  const warnings: LintIssue[] = [];

  // Undefined right after a malformed tag: there is nothing to check against
  let previous: Source | undefined = START;

  for (const [index, raw] of tags.entries()) {
    let tag: Tag;
    try {
      tag = decodeTag(raw, resolved, index);
    } catch (e) {
      if (!(e instanceof MalformedTagError)) throw e;
      errors.push({ type: "malformed", severity: "error", message: e.message, index });
      previous = undefined;
      continue;
    }

    if (previous !== undefined && !isLegalTransition(previous, tag, resolved)) {
      errors.push({
        type: "transition",
        severity: "error",
        message: `Invalid ${resolved.name} transition: ${label(previous)} -> ${raw}`,
        index,
      });
    }

    if (known && !isOutside(tag) && !known.has(tag.type) && !reported.has(tag.type)) {
      reported.add(tag.type);
      warnings.push({
        type: "type",
        severity: "warning",
        message: `Unknown type "${tag.type}"`,
        index,
      });
    }

    previous = tag;
  }

  if (previous !== undefined && !isLegalTransition(previous, END, resolved)) {
    errors.push({
      type: "transition",
      severity: "error",
      message: `Invalid ${resolved.name} transition: ${label(previous)} -> ${END}`,
      index: tags.length,
    });
  }

  return { source, errors, warnings };
}

/**
 * Whether a tag sequence has no lint errors under a scheme.
 */
export function isWellFormed(tags: readonly string[], scheme: SchemeLike): boolean {
  return lintTags(tags, scheme).errors.length === 0;
}

/**
 * Lint a list of tag sequences.
 */
export function lintSequences(
  sequences: readonly LintInput[],
  scheme: SchemeLike,
  options: Omit<LintOptions, "source"> = {}
): LintSummary {
  const results: LintResult[] = [];
  let totalErrors = 0;
  let totalWarnings = 0;
  let sequencesWithErrors = 0;

  for (const sequence of sequences) {
    const result = lintTags(sequence.tags, scheme, { ...options, source: sequence.source });
    results.push(result);

    totalErrors += result.errors.length;
    totalWarnings += result.warnings.length;

    if (result.errors.length > 0) {
      sequencesWithErrors++;
    }
  }

  return {
    results,
    totalErrors,
    totalWarnings,
    sequencesChecked: results.length,
    sequencesWithErrors,
  };
}
