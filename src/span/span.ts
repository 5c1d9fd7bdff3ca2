import { z } from "zod";

/**
 * A contiguous run of tokens sharing one entity type.
 */
export interface Span {
  /** Entity type, e.g. "PER" */
  readonly type: string;
  /** Index of the first token */
  readonly start: number;
  /** Index one past the last token */
  readonly end: number;
  /** Every covered token index, `start` to `end - 1` */
  readonly tokens: readonly number[];
}

/**
 * Schema for a span record. Checks the shape and that `tokens` is exactly
 * the range `[start, end)`.
 */
export const SpanSchema = z
  .object({
    type: z.string().min(1),
    start: z.number().int(),
    end: z.number().int(),
    tokens: z.array(z.number().int()),
  })
  .refine((span) => span.start <= span.end, {
    message: "start must not be after end",
    path: ["end"],
  })
  .refine(
    (span) =>
      span.tokens.length === span.end - span.start &&
      span.tokens.every((token, i) => token === span.start + i),
    { message: "tokens must list every index from start to end - 1", path: ["tokens"] }
  );

/**
 * Create a frozen span covering `[start, end)`.
 */
export function createSpan(type: string, start: number, end: number): Span {
  const tokens: number[] = [];
  for (let i = start; i < end; i++) {
    tokens.push(i);
  }
  return Object.freeze({ type, start, end, tokens: Object.freeze(tokens) });
}

/**
 * Number of tokens a span covers.
 */
export function spanLength(span: Span): number {
  return span.end - span.start;
}

/**
 * Spans ordered by start, then end. Returns a new array.
 */
export function sortSpans<T extends Span>(spans: readonly T[]): T[] {
  return [...spans].sort((a, b) => a.start - b.start || a.end - b.end);
}
