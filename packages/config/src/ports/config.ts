/**
 * Validated, read-only configuration assembled from one or more sources.
 *
 * @typeParam T - The record of sections, inferred from a section registry.
 *
 * @example
 * ```typescript
 * const config = await loadConfigs("config.json", { sections: defaultSections })
 *
 * config.get("camera").index      // 0
 * config.value.camera?.image.size // "1920x1080"
 * config.explain("camera")        // "json:/srv/app/config.json"
 * ```
 */
export interface ICompositeConfig<T> {
  /** Every validated section, frozen. */
  readonly value: Readonly<T>

  /**
   * Returns a validated section.
   *
   * @throws NotFoundError when the loaded document had no such section.
   */
  get<K extends keyof T & string>(section: K): NonNullable<T[K]>

  has(section: string): boolean

  /** Sections present in the loaded document and declared in the registry. */
  sections(): (keyof T & string)[]

  /**
   * Name of the source that supplied a section, or `undefined` when the
   * section was not loaded.
   */
  explain(section: string): string | undefined

  /** Names of the sources that supplied at least one section, in order. */
  sourcesUsed(): string[]

  /**
   * Sections found in the sources without a declared schema. Empty when
   * unknown sections are rejected.
   */
  unknownSections(): string[]
}
