import { fileURLToPath } from "node:url"

/** The configuration document shipped with this package. */
export const DEFAULT_CONFIG_PATH = fileURLToPath(
  new URL("../../configs/config.json", import.meta.url),
)
