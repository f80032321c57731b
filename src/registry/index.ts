export { createRegistryClient, DEFAULT_TIMEOUT_MS } from "./client.js";
export type { FetchLike, RegistryClient, RegistryClientOptions } from "./client.js";
export { RegistryUnavailableError, FileNotFoundError } from "./errors.js";
export { manifestFor } from "./schema.js";
export type {
  BundleManifest,
  ComponentFile,
  ComponentManifest,
  ComponentSummary,
  Discovery,
  FileComponentManifest,
  Packument,
} from "./schema.js";
export { selectVersion, isValidRange } from "./versions.js";
