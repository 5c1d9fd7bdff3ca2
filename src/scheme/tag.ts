/**
 * Marker letters used across all supported encoding schemes.
 */
export const Marker = {
  OUTSIDE: "O",
  BEGIN: "B",
  INSIDE: "I",
  MIDDLE: "M",
  END: "E",
  LAST: "L",
  SINGLE: "S",
  UNIT: "U",
  WHOLE: "W",
} as const;

export type Marker = (typeof Marker)[keyof typeof Marker];

/**
 * Any marker that carries an entity type.
 */
export type EntityMarker = Exclude<Marker, "O">;

const MARKERS: ReadonlySet<string> = new Set<string>(Object.values(Marker));

/**
 * A token tagged as outside of every span.
 */
export interface OutsideTag {
  readonly marker: "O";
}

/**
 * A token tagged as part of a span of `type`.
 */
export interface EntityTag {
  readonly marker: EntityMarker;
  readonly type: string;
}

export type Tag = OutsideTag | EntityTag;

export const OUTSIDE: OutsideTag = Object.freeze({ marker: Marker.OUTSIDE });

/** Separator between marker and type in a raw tag. */
export const DELIMITER = "-";

/**
 * Error thrown when a raw tag string can't be read as a tag.
 */
export class MalformedTagError extends Error {
  constructor(
    message: string,
    public readonly tag: string,
    public readonly index?: number
  ) {
    const where = index === undefined ? "" : ` at token ${String(index)}`;
    super(`Malformed tag "${tag}"${where}: ${message}`);
    this.name = "MalformedTagError";
  }
}

export function isMarker(value: string): value is Marker {
  return MARKERS.has(value);
}

export function isOutside(tag: Tag): tag is OutsideTag {
  return tag.marker === Marker.OUTSIDE;
}

/**
 * The marker part of a raw tag (everything before the first delimiter).
 */
export function extractMarker(raw: string): string {
  const at = raw.indexOf(DELIMITER);
  return at === -1 ? raw : raw.slice(0, at);
}

/**
 * The type part of a raw tag (everything after the first delimiter), or the
 * whole string when there is no delimiter.
 */
export function extractType(raw: string): string {
  const at = raw.indexOf(DELIMITER);
  return at === -1 ? raw : raw.slice(at + 1);
}

/**
 * Read a raw tag against an alphabet of allowed markers.
 *
 * @param raw - The raw tag, e.g. `"B-PER"` or `"O"`
 * @param alphabet - Markers allowed besides `O`
 * @param index - Token position, reported on failure
 * @throws MalformedTagError if the marker is unknown or the type is missing
 */
export function readTag(
  raw: string,
  alphabet: ReadonlySet<EntityMarker>,
  index?: number
): Tag {
  if (raw === Marker.OUTSIDE) {
    return OUTSIDE;
  }

  const at = raw.indexOf(DELIMITER);
  if (at === -1) {
    throw new MalformedTagError("expected <marker>-<type> or O", raw, index);
  }

  const marker = raw.slice(0, at);
  const type = raw.slice(at + 1);

  if (marker === Marker.OUTSIDE) {
    throw new MalformedTagError("the outside marker takes no type", raw, index);
  }
  if (!isEntityMarkerOf(marker, alphabet)) {
    throw new MalformedTagError(`unknown marker "${marker}"`, raw, index);
  }
  if (type.length === 0) {
    throw new MalformedTagError("missing type", raw, index);
  }

  return { marker, type };
}

function isEntityMarkerOf(
  value: string,
  alphabet: ReadonlySet<EntityMarker>
): value is EntityMarker {
  return isMarker(value) && value !== Marker.OUTSIDE && alphabet.has(value);
}

/**
 * Render a tag back to its raw string form.
 */
export function formatTag(tag: Tag): string {
  return isOutside(tag) ? tag.marker : `${tag.marker}${DELIMITER}${tag.type}`;
}

/**
 * Whether two tags are the same marker and type.
 */
export function sameTag(a: Tag, b: Tag): boolean {
  if (isOutside(a) || isOutside(b)) {
    return a.marker === b.marker;
  }
  return a.marker === b.marker && a.type === b.type;
}
