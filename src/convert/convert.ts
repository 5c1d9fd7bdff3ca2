import type { SchemeLike } from "../scheme/registry.js";
import type { ParseOptions } from "../config/options.js";
import { parse, type Repair } from "../parser/parse.js";
import { encode } from "../encode/encode.js";

/**
 * Tags rewritten in another scheme, plus the repairs the source needed.
 */
export interface ConvertResult {
  tags: string[];
  /** Filled only under the `keep-going` policy */
  repairs: Repair[];
}

/**
 * Convert a tag sequence between schemes by parsing it into spans and
 * writing the spans back out.
 *
 * A per-tag lookup can't do this: IOB's markers depend on the neighbouring
 * span's type and the explicit schemes need to know whether a span
 * continues past the current token.
 *
 * @param options - Error policy for the parse step (default `strict`)
 * @throws MalformedTagError if a tag can't be decoded
 * @throws InvalidTransitionError under `strict` on an invalid transition
 */
export function convertWithRepairs(
  tags: readonly string[],
  from: SchemeLike,
  to: SchemeLike,
  options?: ParseOptions
): ConvertResult {
  const { spans, repairs } = parse(tags, from, options);
  return { tags: encode(spans, tags.length, to), repairs };
}

/**
 * Convert a tag sequence between schemes.
 *
 * @see convertWithRepairs
 */
export function convert(
  tags: readonly string[],
  from: SchemeLike,
  to: SchemeLike,
  options?: ParseOptions
): string[] {
  return convertWithRepairs(tags, from, to, options).tags;
}
