import { type ZodType, z } from "zod"
import { cameraSection } from "./camera"

/**
 * Declare the sections a document may contain. Every section is optional in
 * the document; a section that is present must satisfy its schema.
 *
 * @example
 * ```ts
 * const sections = defineSections({
 *   camera: cameraSection,
 *   storage: z.object({ root: z.string() }),
 * })
 * ```
 */
export function defineSections<S extends Record<string, ZodType>>(sections: S) {
  return z.object(sections).partial()
}

export const defaultSections = defineSections({ camera: cameraSection })

export type DefaultSections = typeof defaultSections
