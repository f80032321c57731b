export { lockfileSchema, emptyLockfile, componentTypeSchema, COMPONENT_TYPES } from "./schema.js";
export type { Lockfile, LockedComponent, LockEntry, ComponentType } from "./schema.js";
export { loadLockfile, LockfileError } from "./loader.js";
export { writeLockfile } from "./writer.js";
export { openIntegrityStore, PathConflictError } from "./store.js";
export type { IntegrityStore } from "./store.js";
