export {
  lintTags,
  lintSequences,
  isWellFormed,
  type LintIssue,
  type LintResult,
  type LintSummary,
  type LintInput,
} from "./lint.js";

export {
  formatLintResult,
  formatLintResults,
  formatLintResultsJson,
  type FormatOptions,
} from "./format.js";
