import type { Stats } from "node:fs";
import { copyFile, mkdir, mkdtemp, readFile, realpath, rm, stat } from "node:fs/promises";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { tmpdir } from "node:os";
import type { Profile } from "../profiles/store.js";
import { collectLinkChanges, materializeLinks } from "../symlinks/manager.js";
import { atomicWrite, isNotFound, pathExists, walkFiles } from "../utils/fs.js";
import { sha256 } from "../utils/hash.js";
import { acquireExclusiveLock } from "../utils/lock.js";
import type { ExclusiveLock } from "../utils/lock.js";
import { GhostError } from "./errors.js";
import { buildOverlayMapping, isUnderComponentPath } from "./mapping.js";
import type { OverlayMapping } from "./mapping.js";

export interface GhostSession {
  profile: string;
  /** Real path of the target repository */
  target: string;
  /** Directory holding the materialized view */
  overlayDir: string;
  mapping: OverlayMapping;
  /** Environment that points version control at the real repository */
  env: Record<string, string>;
  marker: ExclusiveLock;
}

export interface BeginOptions {
  /** Stowaway home, where session markers live */
  home: string;
  /** Parent of the overlay directory; defaults to the OS temp dir */
  tmpDir?: string;
}

export interface SessionSummary {
  /** Virtual paths written back to the repository or profile */
  synced: string[];
  /** New files not copied because the real path already exists */
  skipped: string[];
  /** New files outside the component path, dropped with the overlay */
  discarded: string[];
}

/**
 * Project `profile` onto the repository at `targetRepoPath`.
 *
 * The mapping is computed (and checked against the profile's max_files)
 * before anything is written. A marker lock per profile and repository
 * rejects a second session on the same pair.
 */
export async function beginGhostSession(
  profile: Profile,
  targetRepoPath: string,
  opts: BeginOptions,
): Promise<GhostSession> {
  let target: string;
  try {
    target = await realpath(targetRepoPath);
  } catch (err) {
    if (isNotFound(err)) throw new GhostError(`Target repository ${targetRepoPath} does not exist.`);
    throw err;
  }
  if (!(await stat(target)).isDirectory()) {
    throw new GhostError(`Target ${targetRepoPath} is not a directory.`);
  }

  const mapping = buildOverlayMapping({
    repoRoot: target,
    repoFiles: await walkFiles(target, { skipDirs: [".git"] }),
    profileRoot: profile.dir,
    profileFiles: await walkFiles(join(profile.dir, profile.componentPath)),
    componentPath: profile.componentPath,
    include: profile.include,
    exclude: profile.exclude,
    maxFiles: profile.maxFiles,
  });

  const markerPath = join(opts.home, "sessions", `${profile.name}-${sha256(target).slice(0, 12)}`);
  const marker = await acquireExclusiveLock(markerPath, `ghost session for ${target} under profile "${profile.name}"`);

  let overlayDir: string | null = null;
  try {
    overlayDir = await mkdtemp(join(opts.tmpDir ?? tmpdir(), "stowaway-ghost-"));
    await materializeLinks(overlayDir, mapping.entries.values());
    return { profile: profile.name, target, overlayDir, mapping, env: await gitEnv(target), marker };
  } catch (err) {
    if (overlayDir) await rm(overlayDir, { recursive: true, force: true });
    await marker.release();
    throw err;
  }
}

/**
 * Tear the view down.
 *
 * New regular files under the profile's component path are copied to the
 * same path in the repository unless something already lives there. New
 * files anywhere else are dropped with the overlay. Links an editor replaced with a regular
 * file have their content written back to the linked source. The overlay
 * directory and the session marker are removed even when syncing fails.
 */
export async function endGhostSession(session: GhostSession): Promise<SessionSummary> {
  const synced: string[] = [];
  const skipped: string[] = [];
  const discarded: string[] = [];

  try {
    const changes = await collectLinkChanges(session.overlayDir, session.mapping.entries);

    for (const path of changes.replaced) {
      const entry = session.mapping.entries.get(path);
      if (!entry) continue;
      await atomicWrite(entry.source, await readFile(join(session.overlayDir, path)));
      synced.push(path);
    }

    for (const path of changes.created) {
      if (!isUnderComponentPath(path, session.mapping.componentPath)) {
        discarded.push(path);
        continue;
      }
      const real = join(session.target, path);
      if (await pathExists(real)) {
        skipped.push(path);
        continue;
      }
      await mkdir(dirname(real), { recursive: true });
      await copyFile(join(session.overlayDir, path), real);
      synced.push(path);
    }
  } finally {
    await rm(session.overlayDir, { recursive: true, force: true });
    await session.marker.release();
  }

  return { synced: synced.sort(), skipped: skipped.sort(), discarded: discarded.sort() };
}

/**
 * GIT_DIR and GIT_WORK_TREE for the real repository, so git run inside the
 * overlay sees the real history and working tree. Worktrees and submodules
 * keep a `.git` file with a `gitdir:` line instead of a directory.
 */
export async function gitEnv(target: string): Promise<Record<string, string>> {
  const dotGit = join(target, ".git");
  let info: Stats;
  try {
    info = await stat(dotGit);
  } catch (err) {
    if (isNotFound(err)) return {};
    throw err;
  }

  if (info.isDirectory()) {
    return { GIT_DIR: dotGit, GIT_WORK_TREE: target };
  }

  const match = /^gitdir:\s*(.+)$/m.exec(await readFile(dotGit, "utf-8"));
  const gitDir = match?.[1]?.trim();
  if (!gitDir) {
    throw new GhostError(`${dotGit} is neither a directory nor a gitdir pointer.`);
  }
  return { GIT_DIR: isAbsolute(gitDir) ? gitDir : resolve(target, gitDir), GIT_WORK_TREE: target };
}
