import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { IntegrityStore } from "../lockfile/store.js";
import { PathConflictError } from "../lockfile/store.js";
import type { LockEntry } from "../lockfile/schema.js";
import type { RegistryClient } from "../registry/client.js";
import type { PlanEntry } from "../resolver/resolver.js";
import { hashInstalledFiles } from "../utils/hash.js";
import type { ContentDigest } from "../utils/hash.js";
import { isNotFound } from "../utils/fs.js";
import { InstallError } from "./errors.js";
import { installPathFor } from "./placement.js";
import { isRecord, mergeFragment, SettingsError, writeSettings } from "./settings.js";
import type { SettingsDocument } from "./settings.js";

export interface InstallContext {
  /** Project root, or the profile directory in ghost mode */
  root: string;
  /** Component directory relative to `root`, forward slashes */
  componentPath: string;
  /** `[settings]` from configuration, the seed of settings.json */
  baseSettings: SettingsDocument;
  store: IntegrityStore;
  client: RegistryClient;
}

export interface InstallOptions {
  /** Take over paths owned by other components instead of failing */
  overwrite?: boolean;
  /** Untracked files to delete, by component id, as part of that component's install */
  discard?: ReadonlyMap<string, string[]>;
  signal?: AbortSignal;
}

export type InstallStatus = "installed" | "updated" | "unchanged";

export interface InstallResult {
  entry: LockEntry;
  status: InstallStatus;
}

export function settingsPathFor(ctx: Pick<InstallContext, "root" | "componentPath">): string {
  return join(ctx.root, ctx.componentPath, "settings.json");
}

/**
 * Install every entry of a plan, in order.
 *
 * Each component is its own unit of atomicity: when one fails, its files and
 * settings are restored and no lock entry is recorded for it, while the
 * components before it stay installed. The error is rethrown.
 */
export async function install(
  plan: PlanEntry[],
  ctx: InstallContext,
  opts: InstallOptions = {},
): Promise<InstallResult[]> {
  const results: InstallResult[] = [];
  for (const entry of plan) {
    opts.signal?.throwIfAborted();
    results.push(await installComponent(entry, ctx, opts));
  }
  return results;
}

interface StagedFile {
  path: string;
  content: Uint8Array;
}

async function installComponent(
  planned: PlanEntry,
  ctx: InstallContext,
  opts: InstallOptions,
): Promise<InstallResult> {
  const { id, manifest } = planned;
  const previous = await ctx.store.get(id);
  const discard = opts.discard?.get(id) ?? [];

  if (
    previous && previous.version === planned.version && discard.length === 0 && await isIntact(ctx.root, previous)
  ) {
    return { entry: previous, status: "unchanged" };
  }

  const staged = await fetchFiles(planned, ctx);
  opts.signal?.throwIfAborted();

  const losers = await claimPaths(id, staged, ctx, opts);
  const keep = new Set(staged.map((f) => f.path));
  const stale = (previous?.installed_files ?? []).filter((p) => !keep.has(p));
  const fragment = Object.keys(manifest.config).length > 0 ? JSON.stringify(manifest.config) : undefined;

  const backup = new Backup(ctx.root);
  try {
    for (const path of discard) {
      await backup.save(path);
      await rm(join(ctx.root, path), { force: true });
    }

    for (const file of staged) {
      opts.signal?.throwIfAborted();
      await backup.save(file.path);
      const abs = join(ctx.root, file.path);
      await mkdir(dirname(abs), { recursive: true });
      await writeFile(abs, file.content);
    }

    for (const path of stale) {
      await backup.save(path);
      await rm(join(ctx.root, path), { force: true });
    }

    // Recorded hashes come from what is on disk, not from what was fetched.
    const paths = [...keep].sort();
    const digest = await hashInstalledFiles(ctx.root, paths);

    const now = new Date().toISOString();
    const entry: LockEntry = {
      id,
      registry: planned.registry.name,
      name: planned.name,
      type: manifest.type,
      version: planned.version,
      content_hash: digest.contentHash,
      installed_files: paths,
      file_hashes: digest.fileHashes,
      ...(fragment !== undefined ? { config: fragment } : {}),
      installed_at: previous?.installed_at ?? now,
      updated_at: now,
    };

    const others = (await ctx.store.allEntries()).filter((e) => e.id !== id);
    const next = others.map((e) => losers.find((l) => l.id === e.id) ?? e).concat(entry);
    if (fragment !== undefined || previous?.config !== undefined) {
      const settingsPath = settingsPathFor(ctx);
      await backup.saveAbsolute(settingsPath);
      await writeSettings(settingsPath, aggregateSettings(ctx.baseSettings, next));
    }

    opts.signal?.throwIfAborted();

    await ctx.store.recordAll([...losers, entry]);
    return { entry, status: previous ? "updated" : "installed" };
  } catch (err) {
    await backup.restore();
    throw err;
  }
}

async function fetchFiles(planned: PlanEntry, ctx: InstallContext): Promise<StagedFile[]> {
  const { manifest } = planned;
  if (manifest.type === "bundle") return [];

  const files = manifest.files.map((file) => ({
    source: file.source,
    path: installPathFor(ctx.componentPath, manifest, file),
  }));

  const seen = new Set<string>();
  for (const { path } of files) {
    if (seen.has(path)) {
      throw new InstallError(planned.id, `"${planned.id}" installs ${path} more than once`);
    }
    seen.add(path);
  }

  return Promise.all(
    files.map(async ({ source, path }) => ({
      path,
      content: await ctx.client.fetchFile(planned.registry, planned.name, source),
    })),
  );
}

/**
 * Fail on paths owned by other components, or with `overwrite`, return those
 * components' entries with the taken paths dropped.
 */
async function claimPaths(
  id: string,
  staged: StagedFile[],
  ctx: InstallContext,
  opts: InstallOptions,
): Promise<LockEntry[]> {
  const owners = new Map<string, LockEntry>();
  for (const other of await ctx.store.allEntries()) {
    if (other.id === id) continue;
    for (const path of other.installed_files) owners.set(path, other);
  }

  const taken = new Map<string, { entry: LockEntry; paths: Set<string> }>();
  for (const { path } of staged) {
    const owner = owners.get(path);
    if (!owner) continue;
    if (!opts.overwrite) {
      throw new PathConflictError(path, owner.id, id);
    }
    const claim = taken.get(owner.id) ?? { entry: owner, paths: new Set<string>() };
    claim.paths.add(path);
    taken.set(owner.id, claim);
  }

  const losers: LockEntry[] = [];
  for (const { entry, paths } of taken.values()) {
    const remaining = entry.installed_files.filter((p) => !paths.has(p));
    const fileHashes: Record<string, string> = {};
    for (const path of remaining) {
      const hash = entry.file_hashes[path];
      if (hash !== undefined) fileHashes[path] = hash;
    }
    losers.push({
      ...entry,
      installed_files: remaining,
      file_hashes: fileHashes,
      content_hash: (await intactDigest(ctx.root, remaining, fileHashes)) ?? entry.content_hash,
    });
  }
  return losers;
}

/**
 * Content hash of `paths` as they are on disk, or null when any of them is
 * missing or no longer matches its recorded digest. A drifted loser keeps
 * its old content hash so the drift stays visible.
 */
async function intactDigest(
  root: string,
  paths: string[],
  recorded: Record<string, string>,
): Promise<string | null> {
  let digest: ContentDigest;
  try {
    digest = await hashInstalledFiles(root, paths);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
  return paths.every((p) => recorded[p] !== undefined && recorded[p] === digest.fileHashes[p])
    ? digest.contentHash
    : null;
}

/**
 * settings.json as `[settings]` folded with every installed component's
 * fragment, in install order.
 */
export function aggregateSettings(base: SettingsDocument, entries: LockEntry[]): SettingsDocument {
  const ordered = [...entries].sort((a, b) =>
    a.installed_at !== b.installed_at
      ? (a.installed_at < b.installed_at ? -1 : 1)
      : a.id < b.id ? -1 : a.id > b.id ? 1 : 0,
  );
  return ordered.reduce((doc, entry) => mergeFragment(doc, fragmentOf(entry)), base);
}

function fragmentOf(entry: LockEntry): SettingsDocument {
  if (entry.config === undefined) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(entry.config);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SettingsError(`Configuration recorded for "${entry.id}" is not valid JSON: ${message}`);
  }
  if (!isRecord(parsed)) {
    throw new SettingsError(`Configuration recorded for "${entry.id}" must be a JSON object`);
  }
  return parsed;
}

async function isIntact(root: string, entry: LockEntry): Promise<boolean> {
  try {
    const digest = await hashInstalledFiles(root, entry.installed_files);
    return digest.contentHash === entry.content_hash;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

/** Previous contents of every path touched, so a failed install can be undone. */
class Backup {
  private readonly saved = new Map<string, Uint8Array | null>();

  constructor(private readonly root: string) {}

  save(path: string): Promise<void> {
    return this.saveAbsolute(join(this.root, path));
  }

  async saveAbsolute(abs: string): Promise<void> {
    if (this.saved.has(abs)) return;
    try {
      this.saved.set(abs, await readFile(abs));
    } catch (err) {
      if (!isNotFound(err)) throw err;
      this.saved.set(abs, null);
    }
  }

  async restore(): Promise<void> {
    for (const [abs, content] of [...this.saved.entries()].reverse()) {
      if (content === null) {
        await rm(abs, { force: true });
      } else {
        await mkdir(dirname(abs), { recursive: true });
        await writeFile(abs, content);
      }
    }
  }
}
