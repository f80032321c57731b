import type { Stats } from "node:fs";
import { symlink, readlink, mkdir, lstat } from "node:fs/promises";
import { dirname, join } from "node:path";
import { isNotFound, walkFiles } from "../utils/fs.js";

export class SymlinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SymlinkError";
  }
}

export interface LinkTarget {
  /** Path inside the overlay directory, forward slashes */
  virtualPath: string;
  /** Absolute path the link points to */
  source: string;
}

/**
 * Create one symlink per target under `overlayDir`, creating parent
 * directories as needed. A link that already points at its source is left
 * alone; anything else in the way is an error.
 */
export async function materializeLinks(overlayDir: string, targets: Iterable<LinkTarget>): Promise<number> {
  let created = 0;
  for (const { virtualPath, source } of targets) {
    const link = join(overlayDir, virtualPath);
    await mkdir(dirname(link), { recursive: true });

    let stat: Stats;
    try {
      stat = await lstat(link);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      await symlink(source, link);
      created++;
      continue;
    }

    if (stat.isSymbolicLink() && (await readlink(link)) === source) continue;
    throw new SymlinkError(`${link} already exists and does not point to ${source}`);
  }
  return created;
}

export interface LinkChanges {
  /** Regular files at paths that were never linked */
  created: string[];
  /** Linked paths whose symlink was replaced by a regular file */
  replaced: string[];
}

/**
 * Find regular files that appeared in `overlayDir` since it was materialized.
 * Editors that save by writing a new file replace the symlink, so a regular
 * file at a linked path carries an edit to the link's source.
 */
export async function collectLinkChanges(
  overlayDir: string,
  linked: ReadonlyMap<string, LinkTarget>,
): Promise<LinkChanges> {
  const created: string[] = [];
  const replaced: string[] = [];
  for (const path of await walkFiles(overlayDir)) {
    (linked.has(path) ? replaced : created).push(path);
  }
  return { created, replaced };
}
