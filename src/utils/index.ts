export { execInteractive, ExecError } from "./exec.js";
export { atomicWrite, pathExists, isNotFound, toPosix, walkFiles } from "./fs.js";
export type { WalkOptions } from "./fs.js";
export { hashContents, hashInstalledFiles, integrityOf, sha256 } from "./hash.js";
export type { HashedFile, ContentDigest } from "./hash.js";
export { acquireExclusiveLock, withExclusiveLock, ConcurrentOperationError } from "./lock.js";
export type { ExclusiveLock } from "./lock.js";
