export {
  DirectorySource,
  type DirectorySourceOptions,
} from "./adapters/directory/directory-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { readJsonFile } from "./adapters/json/read-json"
export { ObjectSource } from "./adapters/object/object-source"
export { CompositeConfig } from "./core/composite-config"
export { ConfigManager, type ConfigManagerOptions } from "./core/config-manager"
export { DEFAULT_CONFIG_PATH } from "./core/default-path"
export { loadConfigs } from "./core/load"
export type { ICompositeConfig } from "./ports/config"
export type { SectionRegistry, SectionValues, UnknownSectionPolicy } from "./ports/section"
export type { ConfigSource } from "./ports/source"
export { type CameraConfig, cameraDocument, cameraSection } from "./schemas/camera"
export { type DefaultSections, defaultSections, defineSections } from "./schemas/define-sections"
export {
  flag,
  integer,
  integerBetween,
  nonNegativeInteger,
  number,
  text,
  toBoolean,
  toNumber,
  toText,
} from "./schemas/safe-coerce"
