import type { z } from "zod"

/**
 * The declared sections of a configuration document: a zod object whose keys
 * are section names and whose values are the section schemas, each optional.
 * Build one with `defineSections`.
 */
export type SectionRegistry = z.ZodObject

export type SectionValues<R extends SectionRegistry> = z.output<R>

/**
 * What to do with a document section that has no declared schema.
 *
 * - `"ignore"`: drop it, log a warning and report it from `unknownSections()`
 * - `"reject"`: fail validation with an `unrecognized_section` issue
 */
export type UnknownSectionPolicy = "ignore" | "reject"
