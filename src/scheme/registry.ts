import { SCHEMES, type EncodingScheme } from "./scheme.js";

/**
 * Error thrown when a scheme name matches no registered scheme.
 */
export class UnknownSchemeError extends Error {
  constructor(public readonly scheme: string) {
    super(`Unknown encoding scheme "${scheme}"`);
    this.name = "UnknownSchemeError";
  }
}

/**
 * A scheme given by descriptor or by name.
 */
export type SchemeLike = EncodingScheme | string;

function normalize(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * A registry of encoding schemes indexed by name and alias.
 */
export class SchemeRegistry {
  private schemes = new Map<string, EncodingScheme>();

  /**
   * Create a new scheme registry.
   *
   * @param schemes - Schemes to register (defaults to the built-in five)
   */
  constructor(schemes: readonly EncodingScheme[] = SCHEMES) {
    for (const scheme of schemes) {
      this.register(scheme);
    }
  }

  /**
   * Register a scheme under its name and every alias.
   *
   * Later registrations replace earlier ones with the same name.
   */
  register(scheme: EncodingScheme): void {
    this.schemes.set(normalize(scheme.name), scheme);
    for (const alias of scheme.aliases) {
      this.schemes.set(normalize(alias), scheme);
    }
  }

  /**
   * Look up a scheme by name or alias, ignoring case and surrounding space.
   *
   * @returns The scheme, or undefined if not registered
   */
  get(name: string): EncodingScheme | undefined {
    return this.schemes.get(normalize(name));
  }

  has(name: string): boolean {
    return this.schemes.has(normalize(name));
  }

  /**
   * Resolve a name or pass a descriptor through.
   *
   * @throws UnknownSchemeError if the name is not registered
   */
  resolve(scheme: SchemeLike): EncodingScheme {
    if (typeof scheme !== "string") {
      return scheme;
    }
    const found = this.get(scheme);
    if (!found) {
      throw new UnknownSchemeError(scheme);
    }
    return found;
  }

  /**
   * Canonical names of all registered schemes.
   */
  names(): string[] {
    return Array.from(new Set(Array.from(this.schemes.values(), (s) => s.name)));
  }
}

const builtins = new SchemeRegistry();

/**
 * Resolve a scheme name against the built-in schemes.
 *
 * @throws UnknownSchemeError if the name is not one of them
 */
export function getScheme(scheme: SchemeLike): EncodingScheme {
  return builtins.resolve(scheme);
}
