import { randomBytes } from "node:crypto";
import type { Dirent } from "node:fs";
import { lstat, mkdir, open, readdir, rename, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join, relative, sep } from "node:path";

/**
 * Write a file atomically: write a sibling temp file, fsync it, then rename
 * over the target. Readers see either the old or the new document, never a
 * partial one.
 */
export async function atomicWrite(filePath: string, content: string | Uint8Array): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = join(dir, `.${basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`);

  try {
    await writeFile(tmpPath, content);
    const fd = await open(tmpPath, "r");
    try {
      await fd.sync();
    } finally {
      await fd.close();
    }
    await rename(tmpPath, filePath);
  } catch (err) {
    await unlink(tmpPath).catch(() => undefined);
    throw err;
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/** Convert an OS path to the forward-slash form stored in lockfiles and mappings. */
export function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}

export interface WalkOptions {
  /** Directory names skipped at any depth */
  skipDirs?: string[];
  /** Report symlinks as entries instead of skipping them */
  includeSymlinks?: boolean;
}

/**
 * List regular files under `dir`, as sorted forward-slash paths relative to `dir`.
 * Returns an empty list when `dir` does not exist.
 */
export async function walkFiles(dir: string, opts: WalkOptions = {}): Promise<string[]> {
  const results: string[] = [];
  const skip = new Set(opts.skipDirs ?? []);

  async function walk(current: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(current, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }

    for (const entry of entries) {
      const fullPath = join(current, entry.name);
      if (entry.isDirectory()) {
        if (skip.has(entry.name)) continue;
        await walk(fullPath);
      } else if (entry.isFile() || (opts.includeSymlinks && entry.isSymbolicLink())) {
        results.push(toPosix(relative(dir, fullPath)));
      }
      // Skip sockets, fifos, etc.
    }
  }

  await walk(dir);
  return results.sort();
}
