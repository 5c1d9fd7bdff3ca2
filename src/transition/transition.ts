import { OUTSIDE, formatTag, isOutside, type Tag } from "../scheme/tag.js";
import { roleOf, type EncodingScheme, type Role } from "../scheme/scheme.js";
import { getScheme, type SchemeLike } from "../scheme/registry.js";

/** Synthetic predecessor of the first token. */
export const START = "<START>";
/** Synthetic successor of the last token. */
export const END = "<END>";

export type Start = typeof START;
export type End = typeof END;

/** Anything that can precede a token. */
export type Source = Tag | Start;
/** Anything that can follow a token. */
export type Target = Tag | End;

/**
 * One (source, target) pair of raw labels and whether the scheme allows it.
 */
export interface Transition {
  source: string;
  target: string;
  valid: boolean;
}

function sourceRole(source: Source, scheme: EncodingScheme): Role | "start" {
  return source === START ? "start" : roleOf(source, scheme);
}

function targetRole(target: Target, scheme: EncodingScheme): Role | "stop" {
  return target === END ? "stop" : roleOf(target, scheme);
}

function typeOf(value: Source | Target): string | undefined {
  if (value === START || value === END || isOutside(value)) return undefined;
  return value.type;
}

/**
 * Whether `next` may directly follow `previous` under a scheme.
 *
 * Nothing may follow END and nothing may precede START; the types make
 * both impossible to ask.
 */
export function isLegalTransition(
  previous: Source,
  next: Target,
  scheme: EncodingScheme
): boolean {
  const prev = sourceRole(previous, scheme);
  const role = targetRole(next, scheme);
  const open = prev === "begin" || prev === "inside";
  const sameType = typeOf(previous) === typeOf(next);

  if (role === "stop") {
    // Explicit schemes must close a span with its own marker
    return scheme.family === "explicit" ? !open : true;
  }

  if (scheme.family === "explicit") {
    const continues = role === "inside" || role === "end";
    // An open span must continue; a closed one must not be continued.
    return open ? continues && sameType : !continues;
  }

  if (scheme.boundaryBegin) {
    // IOB: B only separates two adjacent spans of one type
    return role === "begin" ? open && sameType : true;
  }

  return role === "inside" ? open && sameType : true;
}

/**
 * Every tag over `types` that can be written under a scheme, `O` first,
 * then each type's markers in begin, inside, end, single order.
 */
export function tagsFor(scheme: EncodingScheme, types: readonly string[]): Tag[] {
  const markers = Array.from(
    new Set([scheme.begin, scheme.inside, scheme.end, scheme.single])
  );
  const tags: Tag[] = [OUTSIDE];
  for (const type of types) {
    for (const marker of markers) {
      tags.push({ marker, type });
    }
  }
  return tags;
}

/**
 * The tags over `types` (and END) that may follow `previous`.
 */
export function legalSuccessors(
  previous: Source,
  scheme: SchemeLike,
  types: readonly string[]
): Target[] {
  const resolved = getScheme(scheme);
  const candidates: Target[] = [...tagsFor(resolved, types), END];
  return candidates.filter((next) => isLegalTransition(previous, next, resolved));
}

/**
 * The transition relation of one scheme over a fixed set of entity types,
 * materialized once for constrained decoding.
 */
export class TransitionTable {
  /** Raw labels, `O` first */
  readonly labels: readonly string[];
  private readonly successorSets: ReadonlyMap<string, ReadonlySet<string>>;

  constructor(
    public readonly scheme: EncodingScheme,
    public readonly types: readonly string[]
  ) {
    const tags = tagsFor(scheme, types);
    this.labels = Object.freeze(tags.map(formatTag));

    const sources: Array<[string, Source]> = [
      ...tags.map((tag): [string, Source] => [formatTag(tag), tag]),
      [START, START],
    ];
    const targets: Array<[string, Target]> = [
      ...tags.map((tag): [string, Target] => [formatTag(tag), tag]),
      [END, END],
    ];

    const successorSets = new Map<string, ReadonlySet<string>>();
    for (const [sourceLabel, source] of sources) {
      const allowed = new Set<string>();
      for (const [targetLabel, target] of targets) {
        if (isLegalTransition(source, target, scheme)) {
          allowed.add(targetLabel);
        }
      }
      successorSets.set(sourceLabel, allowed);
    }
    this.successorSets = successorSets;
    Object.freeze(this);
  }

  /**
   * Whether raw label `target` may follow raw label `source`. START and END
   * are written `<START>` and `<END>`; labels outside the table are never
   * allowed.
   */
  allowed(source: string, target: string): boolean {
    return this.successorSets.get(source)?.has(target) ?? false;
  }

  /**
   * Raw labels that may follow `source`, in table order, END last.
   */
  successors(source: string): string[] {
    const allowed = this.successorSets.get(source);
    if (!allowed) return [];
    return [...this.labels, END].filter((label) => allowed.has(label));
  }

  /**
   * Every pair over `[...labels, START, END]` with its validity.
   */
  transitions(): Transition[] {
    const all = [...this.labels, START, END];
    const result: Transition[] = [];
    for (const source of all) {
      for (const target of all) {
        result.push({ source, target, valid: this.allowed(source, target) });
      }
    }
    return result;
  }

  /**
   * Boolean matrix over `[...labels, START, END]`; `mask[i][j]` is true when
   * label `j` may follow label `i`.
   */
  mask(): boolean[][] {
    const all = [...this.labels, START, END];
    return all.map((source) => all.map((target) => this.allowed(source, target)));
  }
}

/**
 * Build the transition table of a scheme over the given entity types.
 *
 * @throws UnknownSchemeError if the scheme name is not recognized
 */
export function transitionTable(
  scheme: SchemeLike,
  types: readonly string[]
): TransitionTable {
  return new TransitionTable(getScheme(scheme), types);
}
