export { loadConfig, loadProfileConfig, ConfigError, projectConfigSchema, profileConfigSchema, toRegistries } from "./config/index.js";
export type { ProjectConfig, ProfileConfig, Registry, RegistryEntry } from "./config/index.js";
export { resolveScope, resolveDefaultScope, stowawayHome, ScopeError } from "./scope.js";
export type { Scope, ScopeRoot } from "./scope.js";
export { createRegistryClient, RegistryUnavailableError, FileNotFoundError, manifestFor, selectVersion } from "./registry/index.js";
export type { FetchLike, RegistryClient, ComponentManifest, ComponentSummary, Packument, Discovery } from "./registry/index.js";
export {
  resolve,
  parseIdentifier,
  CyclicDependencyError,
  UnsatisfiableVersionError,
  InvalidIdentifierError,
} from "./resolver/index.js";
export type { PlanEntry, ComponentRequest, Constraint } from "./resolver/index.js";
export { lockfileSchema, loadLockfile, LockfileError, writeLockfile, openIntegrityStore, PathConflictError } from "./lockfile/index.js";
export type { Lockfile, LockEntry, ComponentType, IntegrityStore } from "./lockfile/index.js";
export { install, InstallError, mergeFragment, SettingsError } from "./installer/index.js";
export type { InstallContext, InstallOptions, InstallResult, InstallStatus } from "./installer/index.js";
export { diff, HashMismatchError, UnknownComponentError } from "./diff/index.js";
export type { Drift, DriftKind } from "./diff/index.js";
export { openProfileStore, ProfileError, CannotRemoveActiveProfileError } from "./profiles/index.js";
export type { Profile, ProfileStore, CurrentProfileOptions } from "./profiles/index.js";
export {
  buildOverlayMapping,
  beginGhostSession,
  endGhostSession,
  runInGhostSession,
  OverlayTooLargeError,
  GhostError,
} from "./ghost/index.js";
export type { OverlayMapping, GhostSession, SessionSummary } from "./ghost/index.js";
export { materializeLinks, collectLinkChanges, SymlinkError } from "./symlinks/index.js";
export { execInteractive, ExecError, sha256, ConcurrentOperationError } from "./utils/index.js";
