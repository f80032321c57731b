import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { homedir } from "node:os";

export type Scope = "project" | "profile";

export const CONFIG_FILE = "stowaway.toml";
export const PROFILE_FILE = "profile.toml";
export const LOCK_FILE = "stowaway.lock";

export interface ScopeRoot {
  scope: Scope;
  /** Project root, or the profile directory */
  root: string;
  /** stowaway.toml or profile.toml */
  configPath: string;
  /** stowaway.lock path */
  lockPath: string;
  /** Profile name (profile scope only) */
  profile?: string;
}

/**
 * Stowaway's home directory: profiles, the current-profile pointer and
 * ghost session markers. STOWAWAY_HOME overrides it (used by tests).
 */
export function stowawayHome(env: NodeJS.ProcessEnv = process.env): string {
  return env["STOWAWAY_HOME"] ?? join(homedir(), ".config", "stowaway");
}

/**
 * Resolve paths for the given scope.
 *
 * Project scope: paths relative to process.cwd() (or provided projectRoot).
 * Profile scope: paths inside `<home>/profiles/<name>/`.
 */
export function resolveScope(scope: "project", projectRoot?: string): ScopeRoot;
export function resolveScope(scope: "profile", profile: string, home?: string): ScopeRoot;
export function resolveScope(scope: Scope, target?: string, home: string = stowawayHome()): ScopeRoot {
  if (scope === "profile") {
    const profile = target ?? "default";
    const root = join(home, "profiles", profile);
    return {
      scope: "profile",
      root,
      configPath: join(root, PROFILE_FILE),
      lockPath: join(root, LOCK_FILE),
      profile,
    };
  }

  const root = target ?? process.cwd();
  return {
    scope: "project",
    root,
    configPath: join(root, CONFIG_FILE),
    lockPath: join(root, LOCK_FILE),
  };
}

/** Walk up from `dir` looking for a `.git` entry. */
export function isInsideGitRepo(dir: string): boolean {
  let current = resolve(dir);

  for (;;) {
    if (existsSync(join(current, ".git"))) return true;
    const parent = dirname(current);
    if (parent === current) return false;
    current = parent;
  }
}

export class ScopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScopeError";
  }
}

/**
 * Resolve the project for commands that need one.
 *
 * - If `stowaway.toml` exists at `projectRoot` → project scope.
 * - Otherwise throw, pointing git checkouts at ghost mode as well.
 */
export function resolveDefaultScope(projectRoot: string): ScopeRoot {
  if (existsSync(join(projectRoot, CONFIG_FILE))) {
    return resolveScope("project", projectRoot);
  }

  if (isInsideGitRepo(projectRoot)) {
    throw new ScopeError(
      `No ${CONFIG_FILE} found. Run 'stowaway init' to set up this project, or 'stowaway ghost run' to leave it untouched.`,
    );
  }
  throw new ScopeError(`No ${CONFIG_FILE} found in ${projectRoot}. Run 'stowaway init' first.`);
}
