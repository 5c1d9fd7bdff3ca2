import { formatTag, isOutside, type Tag } from "../scheme/tag.js";
import { decodeTag, roleOf, type EncodingScheme } from "../scheme/scheme.js";
import { getScheme, type SchemeLike } from "../scheme/registry.js";
import { START, END, isLegalTransition, type Source } from "../transition/transition.js";
import { createSpan, type Span } from "../span/span.js";
import {
  DEFAULT_POLICY,
  ParseOptionsSchema,
  readOptions,
  type ParseOptions,
} from "../config/options.js";

/**
 * Error thrown under the `strict` policy when a tag may not follow the one
 * before it.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly index: number,
    public readonly previous: string | undefined,
    public readonly current: string | undefined,
    public readonly scheme: string
  ) {
    super(
      `Invalid ${scheme} transition at token ${String(index)}: ` +
        `${previous ?? START} -> ${current ?? END}`
    );
    this.name = "InvalidTransitionError";
  }
}

/**
 * How an invalid transition was repaired.
 *
 * - `continue-as-begin`: an inside marker with no open span of its type
 *   started a new span
 * - `end-as-single`: an end marker with no open span of its type became a
 *   one-token span
 * - `truncate-open-span`: an open span was closed without its end marker
 * - `unneeded-begin`: an IOB `B` with no adjacent span of its type started
 *   a span like `I` would
 */
export type RepairKind =
  | "continue-as-begin"
  | "end-as-single"
  | "truncate-open-span"
  | "unneeded-begin";

/**
 * One repair applied while parsing.
 */
export interface Repair {
  /** Token index of the offending tag (the sequence length for END) */
  index: number;
  kind: RepairKind;
  /** Raw tag before the transition; absent at the start of the sequence */
  previous?: string;
  /** Raw offending tag; absent at the end of the sequence */
  current?: string;
}

/**
 * Spans read from a tag sequence, plus the repairs it needed.
 */
export interface ParseResult {
  spans: Span[];
  /** Filled only under the `keep-going` policy */
  repairs: Repair[];
}

interface OpenSpan {
  type: string;
  start: number;
}

function repairKind(tag: Tag, scheme: EncodingScheme): RepairKind {
  switch (roleOf(tag, scheme)) {
    case "inside":
      return "continue-as-begin";
    case "end":
      return "end-as-single";
    case "begin":
      return scheme.boundaryBegin ? "unneeded-begin" : "truncate-open-span";
    default:
      return "truncate-open-span";
  }
}

/**
 * Parse a tag sequence into spans.
 *
 * @param tags - One raw tag per token
 * @param scheme - Scheme the tags are written in
 * @param options - Error policy (default `strict`)
 * @throws MalformedTagError if a tag can't be decoded, under any policy
 * @throws InvalidTransitionError under `strict` on the first invalid transition
 * @throws UnknownSchemeError if the scheme name is not recognized
 */
export function parse(
  tags: readonly string[],
  scheme: SchemeLike,
  options?: ParseOptions
): ParseResult {
  const resolved = getScheme(scheme);
  const policy = readOptions(ParseOptionsSchema, options, "parse").policy ?? DEFAULT_POLICY;

  const spans: Span[] = [];
  const repairs: Repair[] = [];
  let open: OpenSpan | undefined;
  let previous: Source = START;

  const close = (end: number): void => {
    if (open) {
      spans.push(createSpan(open.type, open.start, end));
      open = undefined;
    }
  };

  const invalid = (index: number, current: Tag | undefined, kind: RepairKind): void => {
    const prev = previous === START ? undefined : formatTag(previous);
    const curr = current === undefined ? undefined : formatTag(current);
    if (policy === "strict") {
      throw new InvalidTransitionError(index, prev, curr, resolved.name);
    }
    if (policy === "keep-going") {
      const repair: Repair = { index, kind };
      if (prev !== undefined) repair.previous = prev;
      if (curr !== undefined) repair.current = curr;
      repairs.push(repair);
    }
  };

  for (const [i, raw] of tags.entries()) {
    const tag = decodeTag(raw, resolved, i);
    if (!isLegalTransition(previous, tag, resolved)) {
      invalid(i, tag, repairKind(tag, resolved));
    }

    previous = tag;
    if (isOutside(tag)) {
      close(i);
      continue;
    }

    switch (roleOf(tag, resolved)) {
      case "begin":
        close(i);
        open = { type: tag.type, start: i };
        break;
      case "inside":
        // Continue a span of this type, or start one
        if (open?.type !== tag.type) {
          close(i);
          open = { type: tag.type, start: i };
        }
        break;
      case "end":
        if (open?.type === tag.type) {
          close(i + 1);
        } else {
          close(i);
          spans.push(createSpan(tag.type, i, i + 1));
        }
        break;
      default:
        close(i);
        spans.push(createSpan(tag.type, i, i + 1));
    }
  }

  if (!isLegalTransition(previous, END, resolved)) {
    invalid(tags.length, undefined, "truncate-open-span");
  }
  close(tags.length);

  return { spans, repairs };
}

/**
 * Parse a tag sequence and return only the spans.
 *
 * @see parse
 */
export function parseSpans(
  tags: readonly string[],
  scheme: SchemeLike,
  options?: ParseOptions
): Span[] {
  return parse(tags, scheme, options).spans;
}
