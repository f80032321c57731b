import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { join } from "node:path";

export interface HashedFile {
  /** Path relative to the install root, forward slashes */
  path: string;
  content: Uint8Array;
}

export interface ContentDigest {
  contentHash: string;
  fileHashes: Record<string, string>;
}

/**
 * Compute the integrity of a component's file set.
 *
 * Algorithm:
 * 1. Sort files by path
 * 2. SHA-256 the concatenation of their raw contents
 * 3. Base64-encode with "sha256-" prefix
 *
 * Each file also gets its own "sha256-" digest so drift can be pinned to a path.
 */
export function hashContents(files: HashedFile[]): ContentDigest {
  const sorted = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const combined = createHash("sha256");
  const fileHashes: Record<string, string> = {};

  for (const file of sorted) {
    combined.update(file.content);
    fileHashes[file.path] = integrityOf(file.content);
  }

  return { contentHash: `sha256-${combined.digest("base64")}`, fileHashes };
}

/**
 * Read the given root-relative paths from disk and hash them.
 * Throws if any file is unreadable.
 */
export async function hashInstalledFiles(root: string, paths: string[]): Promise<ContentDigest> {
  const files: HashedFile[] = [];
  for (const path of paths) {
    files.push({ path, content: await readFile(join(root, path)) });
  }
  return hashContents(files);
}

/** "sha256-<base64>" digest of a single buffer. */
export function integrityOf(content: Uint8Array): string {
  return `sha256-${createHash("sha256").update(content).digest("base64")}`;
}

/**
 * SHA-256 hex hash of a string.
 */
export function sha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}
