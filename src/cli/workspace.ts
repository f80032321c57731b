import { loadConfig } from "../config/loader.js";
import { toRegistries } from "../config/schema.js";
import type { Registry } from "../config/schema.js";
import { UnknownComponentError } from "../diff/diff.js";
import type { InstallContext } from "../installer/installer.js";
import type { LockEntry } from "../lockfile/schema.js";
import { openIntegrityStore } from "../lockfile/store.js";
import type { IntegrityStore } from "../lockfile/store.js";
import type { Profile } from "../profiles/store.js";
import type { RegistryClient } from "../registry/client.js";
import type { ScopeRoot } from "../scope.js";
import { CommandError } from "./errors.js";

/**
 * Everything an operation needs about where components live: a project, or
 * a ghost-mode profile with its own lockfile and component tree.
 */
export interface Workspace {
  /** For messages: "project" or `profile "work"` */
  label: string;
  root: string;
  configPath: string;
  lockPath: string;
  componentPath: string;
  registries: Registry[];
  settings: Record<string, unknown>;
  /** Registry add/remove is disabled */
  lockRegistries: boolean;
  store: IntegrityStore;
}

export async function projectWorkspace(scope: ScopeRoot): Promise<Workspace> {
  const config = await loadConfig(scope.configPath);
  return {
    label: "project",
    root: scope.root,
    configPath: scope.configPath,
    lockPath: scope.lockPath,
    componentPath: config.component_path,
    registries: toRegistries(config.registries),
    settings: config.settings,
    lockRegistries: config.lock_registries,
    store: openIntegrityStore(scope.lockPath),
  };
}

export function profileWorkspace(profile: Profile): Workspace {
  return {
    label: `profile "${profile.name}"`,
    root: profile.dir,
    configPath: profile.configPath,
    lockPath: profile.lockPath,
    componentPath: profile.componentPath,
    registries: profile.registries,
    settings: profile.settings,
    lockRegistries: false,
    store: openIntegrityStore(profile.lockPath),
  };
}

export function installContextFor(ws: Workspace, client: RegistryClient): InstallContext {
  return {
    root: ws.root,
    componentPath: ws.componentPath,
    baseSettings: ws.settings,
    store: ws.store,
    client,
  };
}

/**
 * Find an installed entry by `registry/name`, or by bare name when only one
 * registry provided a component of that name.
 */
export function findInstalled(entries: LockEntry[], ref: string): LockEntry {
  const exact = entries.find((e) => e.id === ref);
  if (exact) return exact;

  const byName = entries.filter((e) => e.name === ref);
  if (byName.length > 1) {
    throw new CommandError(`"${ref}" is ambiguous: ${byName.map((e) => e.id).join(", ")}`);
  }
  const [only] = byName;
  if (!only) throw new UnknownComponentError(ref);
  return only;
}
