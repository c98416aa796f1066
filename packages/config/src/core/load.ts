import type { SectionRegistry, SectionValues } from "../ports/section"
import type { CompositeConfig } from "./composite-config"
import { ConfigManager, type ConfigManagerOptions } from "./config-manager"

/**
 * Load and validate one configuration document.
 *
 * Shorthand for `new ConfigManager(options).loadConfigs(path)`; a missing
 * `path` reads `options.defaultPath`, or the bundled document.
 */
export function loadConfigs<R extends SectionRegistry>(
  path: string | undefined,
  options: ConfigManagerOptions<R>,
): Promise<CompositeConfig<SectionValues<R>>> {
  return new ConfigManager(options).loadConfigs(path)
}
