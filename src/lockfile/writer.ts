import { stringify } from "smol-toml";
import { atomicWrite } from "../utils/fs.js";
import type { Lockfile } from "./schema.js";

/**
 * Write stowaway.lock with entries sorted by id.
 * The write is atomic: a crash leaves the previous document in place.
 */
export async function writeLockfile(filePath: string, lockfile: Lockfile): Promise<void> {
  const installed: Lockfile["installed"] = {};
  for (const id of Object.keys(lockfile.installed).sort()) {
    const entry = lockfile.installed[id];
    if (entry) {
      installed[id] = { ...entry, installed_files: [...entry.installed_files].sort() };
    }
  }

  const header = "# This file is generated by stowaway. Do not edit it by hand.\n\n";
  await atomicWrite(filePath, header + stringify({ lock_version: lockfile.lock_version, installed }) + "\n");
}
