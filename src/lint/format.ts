import type { LintResult, LintSummary, LintIssue } from "./lint.js";

/**
 * Options for formatting lint results.
 */
export interface FormatOptions {
  /** Use colors in output (default: true) */
  colors?: boolean;
  /** Show only sequences with issues (default: false) */
  onlyIssues?: boolean;
}

type Style = "red" | "yellow" | "green" | "gray" | "bold";

const ANSI: Record<Style, string> = {
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  gray: "\x1b[90m",
  bold: "\x1b[1m",
};

type Paint = (style: Style, text: string) => string;

function painter(options: FormatOptions): Paint {
  if (!(options.colors ?? true)) return (_style, text) => text;
  return (style, text) => `${ANSI[style]}${text}\x1b[0m`;
}

function plural(count: number, noun: string): string {
  return `${String(count)} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * Format a single lint issue.
 */
function formatIssue(issue: LintIssue, paint: Paint): string {
  const severity =
    issue.severity === "error" ? paint("red", "error") : paint("yellow", "warning");
  return `  ${paint("gray", `token ${String(issue.index)}`)} ${severity}: ${issue.message}`;
}

/**
 * Format a single lint result.
 *
 * @returns The source name followed by one line per issue, or an empty
 *   string for a clean result
 */
export function formatLintResult(result: LintResult, options: FormatOptions = {}): string {
  const paint = painter(options);

  if (result.errors.length === 0 && result.warnings.length === 0) {
    return "";
  }

  const issues = [...result.errors, ...result.warnings];
  return [paint("bold", result.source), ...issues.map((issue) => formatIssue(issue, paint)), ""]
    .join("\n");
}

/**
 * Format all lint results.
 */
export function formatLintResults(summary: LintSummary, options: FormatOptions = {}): string {
  const paint = painter(options);
  const checked = `${plural(summary.sequencesChecked, "sequence")} checked`;

  const lines: string[] = [];
  for (const result of summary.results) {
    const formatted = formatLintResult(result, options);
    if (formatted) {
      lines.push(formatted);
    } else if (!options.onlyIssues) {
      lines.push(`${paint("green", "✓")} ${result.source}`);
    }
  }

  const counts: string[] = [];
  if (summary.totalErrors > 0) counts.push(paint("red", plural(summary.totalErrors, "error")));
  if (summary.totalWarnings > 0) {
    counts.push(paint("yellow", plural(summary.totalWarnings, "warning")));
  }

  lines.push(
    counts.length === 0
      ? `${paint("green", "✓")} ${checked}, no issues found`
      : `${checked}, ${counts.join(" and ")} in ${plural(summary.sequencesWithErrors, "sequence")}`
  );
  return lines.join("\n");
}

/**
 * Format lint results as JSON.
 */
export function formatLintResultsJson(summary: LintSummary): string {
  return JSON.stringify(summary, null, 2);
}
