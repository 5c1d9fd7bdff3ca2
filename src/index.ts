// Tagspan - parse, encode, convert and validate span-tagging sequences

// Schemes and tags
export {
  Marker,
  OUTSIDE,
  DELIMITER,
  MalformedTagError,
  isMarker,
  isOutside,
  extractMarker,
  extractType,
  formatTag,
  sameTag,
  IOB,
  BIO,
  IOBES,
  BILOU,
  BMEWO,
  SCHEMES,
  defineScheme,
  decodeTag,
  roleOf,
  renderMarker,
  SchemeRegistry,
  UnknownSchemeError,
  getScheme,
  type EntityMarker,
  type EntityTag,
  type OutsideTag,
  type Tag,
  type EncodingScheme,
  type SchemeConfig,
  type SchemeFamily,
  type SchemeLike,
  type Role,
  type Position,
} from "./scheme/index.js";

// Spans
export { type Span, SpanSchema, createSpan, spanLength, sortSpans } from "./span/span.js";

// Options
export {
  ErrorPolicySchema,
  ParseOptionsSchema,
  LintOptionsSchema,
  DEFAULT_POLICY,
  OptionsError,
  type ErrorPolicy,
  type ParseOptions,
  type LintOptions,
} from "./config/options.js";

// Parser
export {
  parse,
  parseSpans,
  InvalidTransitionError,
  type ParseResult,
  type Repair,
  type RepairKind,
} from "./parser/parse.js";

// Encoder
export { encode, InvalidSpanError, OutOfRangeError, OverlapError } from "./encode/encode.js";

// Converter
export { convert, convertWithRepairs, type ConvertResult } from "./convert/convert.js";

// Transitions
export {
  START,
  END,
  isLegalTransition,
  legalSuccessors,
  tagsFor,
  transitionTable,
  TransitionTable,
  type Start,
  type End,
  type Source,
  type Target,
  type Transition,
} from "./transition/transition.js";

// Lint
export {
  lintTags,
  lintSequences,
  isWellFormed,
  formatLintResult,
  formatLintResults,
  formatLintResultsJson,
  type LintIssue,
  type LintResult,
  type LintSummary,
  type LintInput,
  type FormatOptions,
} from "./lint/index.js";
