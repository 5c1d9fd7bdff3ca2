import { z, type ZodError, type ZodType, type ZodTypeDef } from "zod";

/**
 * How the parser treats an invalid transition.
 *
 * - `strict`: throw on the first one
 * - `coerce`: repair it silently
 * - `keep-going`: repair it and record the repair
 */
export const ErrorPolicySchema = z.enum(["strict", "coerce", "keep-going"]);

export type ErrorPolicy = z.infer<typeof ErrorPolicySchema>;

export const DEFAULT_POLICY: ErrorPolicy = "strict";

/**
 * Schema for parse and convert options.
 */
export const ParseOptionsSchema = z
  .object({
    policy: ErrorPolicySchema.optional(),
  })
  .strict();

export type ParseOptions = z.infer<typeof ParseOptionsSchema>;

/**
 * Schema for lint options.
 */
export const LintOptionsSchema = z
  .object({
    /** Name reported for the sequence in results */
    source: z.string().optional(),
    /** Known entity types; any other type is reported as a warning */
    types: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type LintOptions = z.infer<typeof LintOptionsSchema>;

/**
 * Error thrown when an options object fails validation.
 */
export class OptionsError extends Error {
  constructor(
    message: string,
    public readonly zodError: ZodError
  ) {
    super(message);
    this.name = "OptionsError";
  }
}

/**
 * Validate an options object, or return an empty one when none was given.
 *
 * @throws OptionsError if the object does not match the schema
 */
export function readOptions<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  options: unknown,
  what: string
): T {
  const result = schema.safeParse(options ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new OptionsError(`Invalid ${what} options: ${details}`, result.error);
  }
  return result.data;
}
