import type { ZodError } from "zod";
import { Marker, DELIMITER } from "../scheme/tag.js";
import { renderMarker, type EncodingScheme, type Position } from "../scheme/scheme.js";
import { getScheme, type SchemeLike } from "../scheme/registry.js";
import { SpanSchema, sortSpans, type Span } from "../span/span.js";

/**
 * Error thrown when a value passed as a span is not a well-formed span.
 */
export class InvalidSpanError extends Error {
  constructor(
    message: string,
    public readonly span: unknown,
    public readonly zodError: ZodError
  ) {
    super(message);
    this.name = "InvalidSpanError";
  }
}

/**
 * Error thrown when a span reaches outside `[0, length)`.
 */
export class OutOfRangeError extends Error {
  constructor(
    public readonly span: Span,
    public readonly length: number
  ) {
    super(
      `Span ${describe(span)} is out of range for ${String(length)} token${length === 1 ? "" : "s"}`
    );
    this.name = "OutOfRangeError";
  }
}

/**
 * Error thrown when two spans cover the same token.
 */
export class OverlapError extends Error {
  constructor(
    public readonly first: Span,
    public readonly second: Span
  ) {
    super(`Span ${describe(first)} overlaps span ${describe(second)}`);
    this.name = "OverlapError";
  }
}

function describe(span: Span): string {
  return `${span.type}[${String(span.start)}, ${String(span.end)})`;
}

function positionOf(token: number, span: Span): Position {
  if (span.end - span.start === 1) return "only";
  if (token === span.start) return "first";
  if (token === span.end - 1) return "last";
  return "middle";
}

function validateSpans(spans: readonly Span[]): void {
  for (const span of spans) {
    const result = SpanSchema.safeParse(span);
    if (!result.success) {
      const first = result.error.issues[0];
      throw new InvalidSpanError(
        `Invalid span: ${first?.message ?? "unknown validation error"}`,
        span,
        result.error
      );
    }
  }
}

/**
 * Check range, then overlap, of spans that passed validation.
 *
 * @returns The spans in start order
 */
function checkSpans(spans: readonly Span[], length: number): Span[] {
  const sorted = sortSpans(spans);
  let last: Span | undefined;
  for (const span of sorted) {
    if (span.start < 0 || span.end > length) {
      throw new OutOfRangeError(span, length);
    }
    // Empty spans cover no token and cannot overlap anything
    if (span.start === span.end) continue;
    if (last && last.end > span.start) {
      throw new OverlapError(last, span);
    }
    last = span;
  }
  return sorted;
}

/**
 * Render spans as a tag sequence.
 *
 * Without `length`, the sequence ends at the last span's end.
 *
 * @param spans - Non-overlapping spans, in any order
 * @param length - Number of tokens in the output
 * @param scheme - Scheme to write the tags in
 * @returns `length` raw tags; tokens outside every span are `O`
 * @throws InvalidSpanError if a span record is malformed
 * @throws OutOfRangeError if a span starts before 0 or ends after `length`
 * @throws OverlapError if two spans share a token
 */
export function encode(spans: readonly Span[], scheme: SchemeLike): string[];
export function encode(spans: readonly Span[], length: number, scheme: SchemeLike): string[];
export function encode(
  spans: readonly Span[],
  lengthOrScheme: number | SchemeLike,
  scheme?: SchemeLike
): string[] {
  const target = typeof lengthOrScheme === "number" ? scheme : lengthOrScheme;
  if (target === undefined) {
    throw new TypeError("encode needs a scheme after the token count");
  }
  const resolved: EncodingScheme = getScheme(target);
  validateSpans(spans);

  const length =
    typeof lengthOrScheme === "number"
      ? lengthOrScheme
      : spans.reduce((max, span) => Math.max(max, span.end), 0);
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Token count must be a non-negative integer, got ${String(length)}`);
  }
  const sorted = checkSpans(spans, length);
  const tags: string[] = new Array<string>(length).fill(Marker.OUTSIDE);

  let previous: Span | undefined;
  for (const span of sorted) {
    if (span.start === span.end) continue;

    const adjacentSameType =
      previous !== undefined &&
      previous.end === span.start &&
      previous.type === span.type;

    for (const token of span.tokens) {
      const marker = renderMarker(resolved, positionOf(token, span), adjacentSameType);
      tags[token] = `${marker}${DELIMITER}${span.type}`;
    }
    previous = span;
  }

  return tags;
}
