import {
  isAppError,
  toValidationIssue,
  ValidationError,
  type ValidationIssue,
} from "@fieldkit/errors"
import { createNullLogger, type Logger } from "@fieldkit/logger"
import { DirectorySource } from "../adapters/directory/directory-source"
import { JsonSource } from "../adapters/json/json-source"
import type { SectionRegistry, SectionValues, UnknownSectionPolicy } from "../ports/section"
import type { ConfigSource } from "../ports/source"
import { CompositeConfig } from "./composite-config"
import { DEFAULT_CONFIG_PATH } from "./default-path"
import { setOwn } from "./utils/set-own"

export type ConfigManagerOptions<R extends SectionRegistry> = {
  /** Declared sections, see `defineSections`. */
  sections: R

  /** @default "ignore" */
  unknownSections?: UnknownSectionPolicy

  /**
   * Document read by `loadConfigs()` when no path is given.
   *
   * @default DEFAULT_CONFIG_PATH
   */
  defaultPath?: string

  /**
   * Base directory for relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string

  logger?: Logger
}

/**
 * Loads configuration documents and validates each section against the
 * registry. Every load reads its sources again and returns a new
 * CompositeConfig; nothing is cached.
 *
 * @example
 * ```ts
 * const manager = new ConfigManager({ sections: defaultSections, logger })
 *
 * const config = await manager.loadConfigs("config.json")
 * config.get("camera").timestamp.format // "%Y-%m-%d %H:%M:%S"
 *
 * const perSection = await manager.loadDirectory("json_configs")
 * ```
 */
export class ConfigManager<R extends SectionRegistry> {
  private readonly sections: R
  private readonly unknownPolicy: UnknownSectionPolicy
  private readonly defaultPath: string
  private readonly cwd: string | undefined
  private readonly logger: Logger

  constructor(options: ConfigManagerOptions<R>) {
    this.sections = options.sections
    this.unknownPolicy = options.unknownSections ?? "ignore"
    this.defaultPath = options.defaultPath ?? DEFAULT_CONFIG_PATH
    this.cwd = options.cwd
    this.logger = (options.logger ?? createNullLogger()).child({ module: "config" })
  }

  /** Load one JSON document holding every section. */
  loadConfigs(path?: string): Promise<CompositeConfig<SectionValues<R>>> {
    return this.loadFrom(
      new JsonSource({
        file: path ?? this.defaultPath,
        ...(this.cwd !== undefined && { cwd: this.cwd }),
      }),
    )
  }

  /** Load a directory holding one `<section>.json` file per section. */
  loadDirectory(dir: string): Promise<CompositeConfig<SectionValues<R>>> {
    return this.loadFrom(
      new DirectorySource({
        dir,
        logger: this.logger,
        ...(this.cwd !== undefined && { cwd: this.cwd }),
      }),
    )
  }

  /**
   * Load `sources` in order and validate the merged document. A section from a
   * later source replaces the same section from an earlier one.
   *
   * @throws ValidationError listing the issues of every section
   */
  async loadFrom(...sources: ConfigSource[]): Promise<CompositeConfig<SectionValues<R>>> {
    const merged: Record<string, unknown> = {}
    const provenance: Record<string, string> = {}

    this.logger.debug("Loading configuration", { sources: sources.map((s) => s.name) })

    for (const source of sources) {
      const values = await this.loadSource(source)

      for (const [section, value] of Object.entries(values)) {
        if (value !== undefined) {
          setOwn(merged, section, value)
          setOwn(provenance, section, source.name)
        }
      }
    }

    const declared = new Set(Object.keys(this.sections.shape))
    const present = Object.keys(merged)
    const unknown = present.filter((section) => !declared.has(section))

    const result = this.sections.safeParse(merged)
    const issues: ValidationIssue[] = result.success
      ? []
      : result.error.issues.map((issue) => toValidationIssue(issue))

    if (this.unknownPolicy === "reject") {
      issues.push(...unknown.map(unrecognizedSection))
    }

    if (!result.success || issues.length > 0) {
      const err = new ValidationError(issues, { ...(result.error && { cause: result.error }) })

      this.logger.error("Configuration validation failed", {
        issues: err.issues.length,
        err,
      })

      throw err
    }

    for (const section of unknown) {
      this.logger.warn("Ignoring section without a declared schema", {
        section,
        source: provenance[section],
      })
    }

    for (const section of present.filter((name) => declared.has(name))) {
      this.logger.info("Section validated", { section, source: provenance[section] })
    }

    return new CompositeConfig(
      result.data,
      pick(provenance, (section) => declared.has(section)),
      this.unknownPolicy === "ignore" ? unknown : [],
    )
  }

  private async loadSource(source: ConfigSource): Promise<Record<string, unknown>> {
    try {
      return await source.load()
    } catch (err) {
      this.logger.error("Configuration source failed", {
        source: source.name,
        ...(isAppError(err) && { code: err.code }),
        err,
      })
      throw err
    }
  }
}

function unrecognizedSection(section: string): ValidationIssue {
  return {
    path: section,
    code: "unrecognized_section",
    message: "No schema is declared for this section",
  }
}

function pick(
  record: Record<string, string>,
  keep: (key: string) => boolean,
): Record<string, string> {
  return Object.fromEntries(Object.entries(record).filter(([key]) => keep(key)))
}
