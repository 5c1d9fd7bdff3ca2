import {
  Marker,
  readTag,
  isOutside,
  type EntityMarker,
  type Tag,
} from "./tag.js";

/**
 * How a scheme lets a reader find the end of a span.
 *
 * - `lookahead`: the end is only known from the next token (IOB, BIO)
 * - `explicit`: every span ends on an end or single marker (IOBES, BILOU, BMEWO)
 */
export type SchemeFamily = "lookahead" | "explicit";

/**
 * Structural role of a token within a span.
 */
export type Role = "outside" | "begin" | "inside" | "end" | "single";

/**
 * Where a token sits within the span that covers it.
 */
export type Position = "first" | "middle" | "last" | "only";

/**
 * Descriptor table for one encoding scheme.
 *
 * In the lookahead family `end` and `single` reuse the `inside` and `begin`
 * markers, since those schemes have no dedicated letters for them.
 */
export interface EncodingScheme {
  /** Canonical name, e.g. "BIO" */
  readonly name: string;
  /** Other names this scheme is known by */
  readonly aliases: readonly string[];
  readonly family: SchemeFamily;
  readonly begin: EntityMarker;
  readonly inside: EntityMarker;
  readonly end: EntityMarker;
  readonly single: EntityMarker;
  /**
   * The begin marker only separates two adjacent spans of the same type;
   * any other span starts with the inside marker (IOB).
   */
  readonly boundaryBegin: boolean;
}

/**
 * Input shape for {@link defineScheme}.
 */
export interface SchemeConfig {
  name: string;
  aliases?: string[];
  family: SchemeFamily;
  begin: EntityMarker;
  inside: EntityMarker;
  end?: EntityMarker;
  single?: EntityMarker;
  boundaryBegin?: boolean;
}

/**
 * Build a frozen scheme descriptor.
 *
 * Lookahead schemes default `end` to `inside` and `single` to `begin`.
 */
export function defineScheme(config: SchemeConfig): EncodingScheme {
  const lookahead = config.family === "lookahead";
  const end = config.end ?? (lookahead ? config.inside : undefined);
  const single = config.single ?? (lookahead ? config.begin : undefined);

  if (end === undefined || single === undefined) {
    throw new TypeError(
      `Scheme "${config.name}" needs explicit end and single markers`
    );
  }
  if (config.begin === config.inside) {
    throw new TypeError(
      `Scheme "${config.name}" uses "${config.begin}" for both begin and inside`
    );
  }
  if (!lookahead && new Set([config.begin, config.inside, end, single]).size !== 4) {
    throw new TypeError(
      `Scheme "${config.name}" needs four distinct markers for begin, inside, end and single`
    );
  }

  return Object.freeze({
    name: config.name,
    aliases: Object.freeze([...(config.aliases ?? [])]),
    family: config.family,
    begin: config.begin,
    inside: config.inside,
    end,
    single,
    boundaryBegin: config.boundaryBegin ?? false,
  });
}

export const IOB = defineScheme({
  name: "IOB",
  aliases: ["IOB1"],
  family: "lookahead",
  begin: Marker.BEGIN,
  inside: Marker.INSIDE,
  boundaryBegin: true,
});

export const BIO = defineScheme({
  name: "BIO",
  aliases: ["IOB2"],
  family: "lookahead",
  begin: Marker.BEGIN,
  inside: Marker.INSIDE,
});

export const IOBES = defineScheme({
  name: "IOBES",
  family: "explicit",
  begin: Marker.BEGIN,
  inside: Marker.INSIDE,
  end: Marker.END,
  single: Marker.SINGLE,
});

export const BILOU = defineScheme({
  name: "BILOU",
  family: "explicit",
  begin: Marker.BEGIN,
  inside: Marker.INSIDE,
  end: Marker.LAST,
  single: Marker.UNIT,
});

export const BMEWO = defineScheme({
  name: "BMEWO",
  aliases: ["BMEOW"],
  family: "explicit",
  begin: Marker.BEGIN,
  inside: Marker.MIDDLE,
  end: Marker.END,
  single: Marker.WHOLE,
});

/**
 * The built-in schemes, in their conventional order.
 */
export const SCHEMES: readonly EncodingScheme[] = Object.freeze([
  IOB,
  BIO,
  IOBES,
  BILOU,
  BMEWO,
]);

const alphabets = new WeakMap<EncodingScheme, ReadonlySet<EntityMarker>>();

/**
 * The set of non-outside markers a scheme uses.
 */
export function alphabetOf(scheme: EncodingScheme): ReadonlySet<EntityMarker> {
  let alphabet = alphabets.get(scheme);
  if (!alphabet) {
    alphabet = new Set([scheme.begin, scheme.inside, scheme.end, scheme.single]);
    alphabets.set(scheme, alphabet);
  }
  return alphabet;
}

/**
 * Decode one raw tag under a scheme.
 *
 * @throws MalformedTagError if the marker is not in the scheme's alphabet
 *   or the type is missing
 */
export function decodeTag(raw: string, scheme: EncodingScheme, index?: number): Tag {
  return readTag(raw, alphabetOf(scheme), index);
}

/**
 * The role a decoded tag plays under a scheme.
 *
 * Begin and inside win over single and end, so BIO's `B` reads as begin
 * and its `I` as inside.
 */
export function roleOf(tag: Tag, scheme: EncodingScheme): Role {
  if (isOutside(tag)) return "outside";
  switch (tag.marker) {
    case scheme.begin:
      return "begin";
    case scheme.inside:
      return "inside";
    case scheme.end:
      return "end";
    default:
      return "single";
  }
}

/**
 * Marker for a token at `position` within a span.
 *
 * @param adjacentSameType - The span starts right where a span of the same
 *   type ends (only matters for boundary-begin schemes)
 */
export function renderMarker(
  scheme: EncodingScheme,
  position: Position,
  adjacentSameType = false
): EntityMarker {
  if (scheme.boundaryBegin && (position === "first" || position === "only")) {
    return adjacentSameType ? scheme.begin : scheme.inside;
  }

  switch (position) {
    case "first":
      return scheme.begin;
    case "middle":
      return scheme.inside;
    case "last":
      return scheme.end;
    case "only":
      return scheme.single;
  }
}
