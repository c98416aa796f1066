/**
 * A source of configuration sections.
 *
 * A ConfigSource only *loads* a raw document: a record of section name to
 * section value. It does not validate or merge.
 *
 * Sources are applied in order; a later source replaces a whole section
 * supplied by an earlier one.
 */
export interface ConfigSource {
  /**
   * Human-readable name used for provenance.
   * Example: "json:/etc/app/config.json", "dir:configs", "object:overrides"
   */
  readonly name: string

  /**
   * Load the document. Resolves to a plain object; `undefined` for a section
   * means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
