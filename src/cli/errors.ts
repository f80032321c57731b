import chalk from "chalk";
import { ConfigError } from "../config/loader.js";
import { HashMismatchError, UnknownComponentError } from "../diff/diff.js";
import { GhostError, OverlayTooLargeError } from "../ghost/errors.js";
import { InstallError } from "../installer/errors.js";
import { SettingsError } from "../installer/settings.js";
import { LockfileError } from "../lockfile/loader.js";
import { PathConflictError } from "../lockfile/store.js";
import { CannotRemoveActiveProfileError, ProfileError } from "../profiles/errors.js";
import { FileNotFoundError, RegistryUnavailableError } from "../registry/errors.js";
import { CyclicDependencyError, InvalidIdentifierError, UnsatisfiableVersionError } from "../resolver/errors.js";
import { ScopeError } from "../scope.js";
import { SymlinkError } from "../symlinks/manager.js";
import { ExecError } from "../utils/exec.js";
import { ConcurrentOperationError } from "../utils/lock.js";

/** Usage mistakes caught by a command before it does any work. */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandError";
  }
}

const KNOWN_ERRORS = [
  RegistryUnavailableError,
  FileNotFoundError,
  CyclicDependencyError,
  UnsatisfiableVersionError,
  InvalidIdentifierError,
  PathConflictError,
  HashMismatchError,
  UnknownComponentError,
  ConcurrentOperationError,
  OverlayTooLargeError,
  CannotRemoveActiveProfileError,
  ConfigError,
  ScopeError,
  InstallError,
  SettingsError,
  LockfileError,
  ProfileError,
  GhostError,
  SymlinkError,
  ExecError,
  CommandError,
];

/** "PathConflictError" -> "PathConflict" */
export function errorKind(err: Error): string {
  return err.name.replace(/Error$/, "") || "Error";
}

/**
 * Print a known error as `<Kind>: <message>` and flag the process as failed.
 * Returns false for anything else so the caller can rethrow it.
 */
export function reportError(err: unknown): boolean {
  if (!KNOWN_ERRORS.some((known) => err instanceof known) || !(err instanceof Error)) {
    return false;
  }
  console.error(chalk.red(`${errorKind(err)}: ${err.message}`));
  process.exitCode = 1;
  return true;
}
