export { loadConfig, loadProfileConfig, readToml, ConfigError } from "./loader.js";
export {
  addRegistryToConfig,
  removeRegistryFromConfig,
  generateDefaultConfig,
  generateDefaultProfile,
} from "./writer.js";
export {
  projectConfigSchema,
  profileConfigSchema,
  toRegistries,
  NAME_PATTERN,
  DEFAULT_MAX_FILES,
} from "./schema.js";
export type { ProjectConfig, ProfileConfig, Registry, RegistryEntry } from "./schema.js";
