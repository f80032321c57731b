import { join } from "node:path";
import type { Registry } from "../config/schema.js";
import { openIntegrityStore } from "../lockfile/store.js";
import type { Workspace } from "../cli/workspace.js";

/** A project workspace rooted at `root` without reading any stowaway.toml. */
export function testWorkspace(root: string, registries: Registry[], overrides: Partial<Workspace> = {}): Workspace {
  const lockPath = join(root, "stowaway.lock");
  return {
    label: "project",
    root,
    configPath: join(root, "stowaway.toml"),
    lockPath,
    componentPath: ".agents",
    registries,
    settings: {},
    lockRegistries: false,
    store: openIntegrityStore(lockPath),
    ...overrides,
  };
}
