import { join, posix } from "node:path";
import { minimatch } from "minimatch";
import { OverlayTooLargeError } from "./errors.js";

export type OverlayOrigin = "repository" | "profile";

export interface OverlayEntry {
  /** Path inside the overlay, forward slashes */
  virtualPath: string;
  /** Absolute path of the file the entry projects */
  source: string;
  origin: OverlayOrigin;
}

export interface OverlayMapping {
  entries: Map<string, OverlayEntry>;
  /** Normalized component path the profile is layered at */
  componentPath: string;
  /** Repository files left out of the view */
  hiddenPaths: Set<string>;
}

export interface MappingInput {
  repoRoot: string;
  /** Repository files, relative to repoRoot */
  repoFiles: string[];
  profileRoot: string;
  /** Profile component files, relative to `<profileRoot>/<componentPath>` */
  profileFiles: string[];
  componentPath: string;
  include: string[];
  exclude: string[];
  /** 0 = unlimited */
  maxFiles: number;
}

/**
 * A path is visible when include is empty or one include pattern matches,
 * and no exclude pattern matches.
 */
export function isVisible(path: string, include: string[], exclude: string[]): boolean {
  const included = include.length === 0 || include.some((p) => minimatch(path, p, { dot: true }));
  return included && !exclude.some((p) => minimatch(path, p, { dot: true }));
}

/** `path` is `componentPath` itself or lies below it. */
export function isUnderComponentPath(path: string, componentPath: string): boolean {
  return path === componentPath || path.startsWith(`${componentPath}/`);
}

/**
 * Compute the virtual view of a repository under a profile.
 *
 * Visible repository files are projected as-is. The profile's component
 * tree is layered at `componentPath` and takes precedence there: the
 * repository's own files under that path are hidden. Nothing is touched on
 * disk. Fails with OverlayTooLargeError as soon as the entry count passes
 * `maxFiles`.
 */
export function buildOverlayMapping(input: MappingInput): OverlayMapping {
  const componentPath = posix.normalize(input.componentPath).replace(/^\.\//, "").replace(/\/+$/, "");
  const entries = new Map<string, OverlayEntry>();
  const hiddenPaths = new Set<string>();

  const add = (entry: OverlayEntry) => {
    entries.set(entry.virtualPath, entry);
    if (input.maxFiles > 0 && entries.size > input.maxFiles) {
      throw new OverlayTooLargeError(entries.size, input.maxFiles);
    }
  };

  for (const file of input.profileFiles) {
    const virtualPath = posix.join(componentPath, file);
    add({ virtualPath, source: join(input.profileRoot, componentPath, file), origin: "profile" });
  }

  for (const path of input.repoFiles) {
    if (isUnderComponentPath(path, componentPath) || !isVisible(path, input.include, input.exclude)) {
      hiddenPaths.add(path);
      continue;
    }
    add({ virtualPath: path, source: join(input.repoRoot, path), origin: "repository" });
  }

  return { entries, componentPath, hiddenPaths };
}
