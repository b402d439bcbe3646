import { z } from "zod"
import { InvalidOptionsError } from "./errors"
import { DEFAULT_DESCRIPTION } from "./format/default-description"
import { KEEL_NAME, KEEL_VERSION } from "./version"

export const configManagerOptionsSchema = z.object({
  /** File extension, without the dot. */
  extension: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, "extension must be letters, digits, '-' or '_'")
    .default("ini"),
  /** First comment line of written files. `null` leaves it out. */
  header: z
    .object({ name: z.string().min(1), version: z.string().min(1) })
    .nullable()
    .default({ name: KEEL_NAME, version: KEEL_VERSION }),
  description: z.string().default(DEFAULT_DESCRIPTION),
  unknownEntries: z.enum(["ignore", "warn"]).default("ignore"),
  /** Rewrite an existing file in canonical form right after loading it. */
  normalizeOnLoad: z.boolean().default(true),
})

export type ConfigManagerOptions = z.input<typeof configManagerOptionsSchema>
export type ResolvedConfigManagerOptions = z.output<typeof configManagerOptionsSchema>

export const initializeOptionsSchema = z.object({
  /** File name without extension, e.g. "dev". */
  profile: z
    .string()
    .min(1, "profile must not be empty")
    .refine((p) => !/[/\\]/.test(p), "profile must not contain path separators"),
  directory: z.string().min(1, "directory must not be empty"),
  encoding: z
    .string()
    .refine((e) => Buffer.isEncoding(e), "encoding must be a Node buffer encoding")
    .default("utf8"),
})

export type InitializeOptions = z.input<typeof initializeOptionsSchema>
export type ResolvedInitializeOptions = z.output<typeof initializeOptionsSchema>

/**
 * Parse `input` with `schema`, raising InvalidOptionsError with the
 * prettified zod report on failure.
 */
export function parseOptions<S extends z.ZodType>(
  schema: S,
  input: unknown,
  subject: string,
): z.output<S> {
  const result = schema.safeParse(input)

  if (!result.success) {
    throw InvalidOptionsError.of(subject, z.prettifyError(result.error))
  }

  return result.data
}
