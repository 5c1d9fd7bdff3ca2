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
} from "./tag.js";
export type { EntityMarker, EntityTag, OutsideTag, Tag } from "./tag.js";
export {
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
} from "./scheme.js";
export type {
  EncodingScheme,
  SchemeConfig,
  SchemeFamily,
  Role,
  Position,
} from "./scheme.js";
export { SchemeRegistry, UnknownSchemeError, getScheme } from "./registry.js";
export type { SchemeLike } from "./registry.js";
