import { readFile } from "node:fs/promises";
import { join, posix } from "node:path";
import { homeDirFor } from "../installer/placement.js";
import type { IntegrityStore } from "../lockfile/store.js";
import type { LockEntry } from "../lockfile/schema.js";
import { hashContents, integrityOf } from "../utils/hash.js";
import type { HashedFile } from "../utils/hash.js";
import { isNotFound, walkFiles } from "../utils/fs.js";

export type DriftKind = "added" | "missing" | "modified";

export interface Drift {
  componentId: string;
  /** Path relative to the project root */
  path: string;
  kind: DriftKind;
}

export interface DiffContext {
  root: string;
  componentPath: string;
  store: IntegrityStore;
}

export class HashMismatchError extends Error {
  constructor(
    public readonly component: string,
    public readonly drift: Drift[],
  ) {
    const summary = drift.map((d) => `${d.kind} ${d.path}`).join(", ");
    super(`"${component}" has local changes (${summary}). Pass --force to discard them.`);
    this.name = "HashMismatchError";
  }
}

export class UnknownComponentError extends Error {
  constructor(public readonly component: string) {
    super(`"${component}" is not installed`);
    this.name = "UnknownComponentError";
  }
}

/**
 * Compare installed files against the lockfile.
 * Checks every entry, or only `componentId`. An empty result means no drift.
 */
export async function diff(ctx: DiffContext, componentId?: string): Promise<Drift[]> {
  const entries = await ctx.store.allEntries();
  const selected = componentId === undefined ? entries : entries.filter((e) => e.id === componentId);
  if (componentId !== undefined && selected.length === 0) {
    throw new UnknownComponentError(componentId);
  }

  const owned = new Set(entries.flatMap((e) => e.installed_files));
  const drift: Drift[] = [];
  for (const entry of selected) {
    drift.push(...(await checkEntry(ctx, entry, owned)));
  }

  return drift.sort((a, b) =>
    a.componentId !== b.componentId
      ? (a.componentId < b.componentId ? -1 : 1)
      : a.path < b.path ? -1 : a.path > b.path ? 1 : 0,
  );
}

async function checkEntry(ctx: DiffContext, entry: LockEntry, owned: Set<string>): Promise<Drift[]> {
  const drift: Drift[] = [];
  const present: HashedFile[] = [];
  const unhashed: string[] = [];

  for (const path of entry.installed_files) {
    let content: Uint8Array;
    try {
      content = await readFile(join(ctx.root, path));
    } catch (err) {
      if (!isNotFound(err)) throw err;
      drift.push({ componentId: entry.id, path, kind: "missing" });
      continue;
    }

    present.push({ path, content });
    const expected = entry.file_hashes[path];
    if (expected === undefined) {
      unhashed.push(path);
    } else if (integrityOf(content) !== expected) {
      drift.push({ componentId: entry.id, path, kind: "modified" });
    }
  }

  // Entries without per-file hashes can only be checked as a whole.
  if (unhashed.length > 0 && drift.length === 0 && hashContents(present).contentHash !== entry.content_hash) {
    drift.push(...unhashed.map((path) => ({ componentId: entry.id, path, kind: "modified" as const })));
  }

  const home = homeDirFor(entry.type, entry.name);
  if (home !== null) {
    const homePath = posix.join(ctx.componentPath, home);
    for (const file of await walkFiles(join(ctx.root, homePath))) {
      const path = posix.join(homePath, file);
      if (!owned.has(path)) {
        drift.push({ componentId: entry.id, path, kind: "added" });
      }
    }
  }

  return drift;
}
