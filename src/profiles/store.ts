import { mkdir, readFile, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { loadProfileConfig } from "../config/loader.js";
import { NAME_PATTERN, toRegistries } from "../config/schema.js";
import type { Registry } from "../config/schema.js";
import { generateDefaultProfile } from "../config/writer.js";
import { resolveScope } from "../scope.js";
import { atomicWrite, isNotFound, pathExists } from "../utils/fs.js";
import { CannotRemoveActiveProfileError, ProfileError } from "./errors.js";

export const DEFAULT_PROFILE = "default";
export const PROFILE_ENV = "STOWAWAY_PROFILE";

export interface Profile {
  name: string;
  /** `<home>/profiles/<name>` */
  dir: string;
  configPath: string;
  lockPath: string;
  registries: Registry[];
  componentPath: string;
  include: string[];
  exclude: string[];
  /** 0 = unlimited */
  maxFiles: number;
  settings: Record<string, unknown>;
}

/** Inputs to current-profile resolution, highest precedence first. */
export interface CurrentProfileOptions {
  /** e.g. `--profile` */
  override?: string;
  /** Environment consulted for STOWAWAY_PROFILE; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export interface ProfileStore {
  readonly home: string;
  list(): Promise<string[]>;
  create(name: string, opts?: { cloneFrom?: string }): Promise<Profile>;
  load(name: string): Promise<Profile>;
  use(name: string): Promise<Profile>;
  /** Name of the current profile, without creating it. */
  currentName(opts?: CurrentProfileOptions): Promise<string>;
  current(opts?: CurrentProfileOptions): Promise<Profile>;
  remove(name: string, opts?: CurrentProfileOptions): Promise<void>;
}

/**
 * Named ghost-mode profiles under `<home>/profiles/`.
 *
 * Profiles never share mutable state: each has its own profile.toml,
 * lockfile and component tree. The current profile is computed on every
 * call (override, then STOWAWAY_PROFILE, then the `current` pointer file,
 * then "default", which is created on first use).
 */
export function openProfileStore(home: string): ProfileStore {
  const profilesDir = join(home, "profiles");
  const pointerPath = join(home, "current");

  function validateName(name: string): void {
    if (!NAME_PATTERN.test(name)) {
      throw new ProfileError(`Invalid profile name "${name}": must start with a letter and contain only [a-zA-Z0-9._-]`);
    }
  }

  async function exists(name: string): Promise<boolean> {
    return pathExists(resolveScope("profile", name, home).configPath);
  }

  async function readPointer(): Promise<string | null> {
    try {
      const name = (await readFile(pointerPath, "utf-8")).trim();
      return name.length > 0 ? name : null;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async function create(name: string, opts: { cloneFrom?: string } = {}): Promise<Profile> {
    validateName(name);
    if (await exists(name)) {
      throw new ProfileError(`Profile "${name}" already exists.`);
    }

    let content = generateDefaultProfile();
    if (opts.cloneFrom !== undefined) {
      if (opts.cloneFrom === DEFAULT_PROFILE && !(await exists(DEFAULT_PROFILE))) {
        await create(DEFAULT_PROFILE);
      }
      if (!(await exists(opts.cloneFrom))) {
        throw new ProfileError(`Cannot clone "${opts.cloneFrom}": profile does not exist.`);
      }
      content = await readFile(resolveScope("profile", opts.cloneFrom, home).configPath, "utf-8");
    }

    const scope = resolveScope("profile", name, home);
    await mkdir(scope.root, { recursive: true });
    await atomicWrite(scope.configPath, content);
    return load(name);
  }

  async function load(name: string): Promise<Profile> {
    validateName(name);
    const scope = resolveScope("profile", name, home);
    if (!(await exists(name))) {
      throw new ProfileError(`Profile "${name}" does not exist. Create it with 'stowaway ghost profile create ${name}'.`);
    }

    const config = await loadProfileConfig(scope.configPath);
    return {
      name,
      dir: scope.root,
      configPath: scope.configPath,
      lockPath: scope.lockPath,
      registries: toRegistries(config.registries),
      componentPath: config.component_path,
      include: config.include,
      exclude: config.exclude,
      maxFiles: config.max_files,
      settings: config.settings,
    };
  }

  async function currentName(opts: CurrentProfileOptions = {}): Promise<string> {
    const env = opts.env ?? process.env;
    const fromEnv = env[PROFILE_ENV]?.trim();
    return opts.override ?? (fromEnv ? fromEnv : null) ?? (await readPointer()) ?? DEFAULT_PROFILE;
  }

  return {
    home,

    async list() {
      let entries: string[];
      try {
        entries = await readdir(profilesDir);
      } catch (err) {
        if (isNotFound(err)) return [];
        throw err;
      }
      const names: string[] = [];
      for (const name of entries.sort()) {
        if (NAME_PATTERN.test(name) && (await exists(name))) names.push(name);
      }
      return names;
    },

    create,
    load,

    async use(name) {
      const profile = await load(name);
      await atomicWrite(pointerPath, `${name}\n`);
      return profile;
    },

    currentName,

    async current(opts) {
      const name = await currentName(opts);
      if (name === DEFAULT_PROFILE && !(await exists(name))) {
        return create(name);
      }
      return load(name);
    },

    async remove(name, opts) {
      validateName(name);
      if (name === (await currentName(opts))) {
        throw new CannotRemoveActiveProfileError(name);
      }
      if (!(await exists(name))) {
        throw new ProfileError(`Profile "${name}" does not exist.`);
      }
      await rm(resolveScope("profile", name, home).root, { recursive: true, force: true });
    },
  };
}
