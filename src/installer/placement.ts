import { posix } from "node:path";
import type { ComponentType } from "../lockfile/schema.js";
import type { ComponentFile, FileComponentManifest } from "../registry/schema.js";
import { InstallError } from "./errors.js";

const TYPE_DIRS = {
  skill: "skills",
  plugin: "plugins",
  agent: "agents",
  command: "commands",
  tool: "tools",
} satisfies Record<Exclude<ComponentType, "bundle">, string>;

/**
 * Directory a component owns outright, relative to the component path.
 * Skills and plugins get one each; other types share a flat directory.
 */
export function homeDirFor(type: ComponentType, name: string): string | null {
  if (type === "skill" || type === "plugin") {
    return `${TYPE_DIRS[type]}/${name}`;
  }
  return null;
}

/**
 * Install path of one file, relative to the project (or profile) root.
 *
 * Defaults follow the per-type layout; `file.target` overrides it relative to
 * the component path. Paths that would land outside the component path are
 * rejected.
 */
export function installPathFor(
  componentPath: string,
  manifest: FileComponentManifest,
  file: ComponentFile,
): string {
  const id = manifest.name;
  const source = contained(id, file.source, "source");
  const relative = file.target !== undefined
    ? contained(id, file.target, "target")
    : `${homeDirFor(manifest.type, manifest.name) ?? TYPE_DIRS[manifest.type]}/${source}`;
  return posix.join(componentPath, relative);
}

function contained(component: string, path: string, what: string): string {
  const normalized = posix.normalize(path.replaceAll("\\", "/"));
  if (
    posix.isAbsolute(normalized) ||
    /^[a-zA-Z]:/.test(normalized) ||
    normalized === ".." ||
    normalized.startsWith("../") ||
    normalized === "."
  ) {
    throw new InstallError(component, `File ${what} "${path}" of "${component}" escapes the component directory`);
  }
  return normalized;
}
