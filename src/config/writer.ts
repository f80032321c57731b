import { stringify } from "smol-toml";
import { atomicWrite } from "../utils/fs.js";
import { ConfigError, readToml } from "./loader.js";
import { DEFAULT_MAX_FILES } from "./schema.js";
import type { RegistryEntry } from "./schema.js";

export interface DefaultConfigOptions {
  registries?: Record<string, RegistryEntry>;
  componentPath?: string;
  lockRegistries?: boolean;
}

/**
 * Generate a minimal stowaway.toml scaffold.
 */
export function generateDefaultConfig(opts: DefaultConfigOptions = {}): string {
  let config = `version = 1\n`;
  config += `# Components are installed below this directory.\n`;
  config += `component_path = ${tomlValue(opts.componentPath ?? ".agents")}\n`;
  if (opts.lockRegistries) {
    config += `# Registry list is managed by hand; 'stowaway registry add/remove' is disabled.\nlock_registries = true\n`;
  }
  config += `\n# Earlier registries win when two expose the same component name.\n`;
  config += registriesTable(opts.registries ?? {});
  return config;
}

export interface DefaultProfileOptions {
  registries?: Record<string, RegistryEntry>;
  include?: string[];
  exclude?: string[];
}

/**
 * Generate a profile.toml scaffold for a fresh ghost-mode profile.
 */
export function generateDefaultProfile(opts: DefaultProfileOptions = {}): string {
  let config = `version = 1\ncomponent_path = ".agents"\n`;
  config += `# Repository files visible inside the overlay. Empty include means everything.\n`;
  config += `include = ${tomlValue(opts.include ?? [])}\n`;
  config += `exclude = ${tomlValue(opts.exclude ?? [])}\n`;
  config += `# Refuse overlays with more entries than this (0 = unlimited).\n`;
  config += `max_files = ${DEFAULT_MAX_FILES}\n\n`;
  config += registriesTable(opts.registries ?? {});
  return config;
}

/**
 * Add a registry to the `[registries]` table.
 * Appends it, so it gets the lowest priority.
 */
export async function addRegistryToConfig(
  filePath: string,
  name: string,
  entry: RegistryEntry,
): Promise<void> {
  const doc = await readToml(filePath);
  const registries = registriesOf(doc, filePath);
  if (name in registries) {
    throw new ConfigError(`Registry "${name}" already exists in ${filePath}.`);
  }
  registries[name] = entry;
  doc["registries"] = asTables(registries);
  await atomicWrite(filePath, stringify(doc) + "\n");
}

/**
 * Remove a registry from the `[registries]` table.
 */
export async function removeRegistryFromConfig(filePath: string, name: string): Promise<void> {
  const doc = await readToml(filePath);
  const registries = registriesOf(doc, filePath);
  if (!(name in registries)) {
    throw new ConfigError(`Registry "${name}" not found in ${filePath}.`);
  }
  delete registries[name];
  doc["registries"] = asTables(registries);
  await atomicWrite(filePath, stringify(doc) + "\n");
}

function registriesOf(doc: Record<string, unknown>, filePath: string): Record<string, unknown> {
  const value = doc["registries"];
  if (value === undefined) return {};
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ConfigError(`[registries] in ${filePath} must be a table.`);
  }
  return { ...value };
}

function registriesTable(registries: Record<string, RegistryEntry>): string {
  if (Object.keys(registries).length === 0) {
    return `[registries]\n`;
  }
  return stringify({ registries: asTables(registries) }).trimEnd() + "\n";
}

/**
 * smol-toml emits a table's plain values before its sub-tables, which would
 * reorder a mix of `name = "url"` and pinned entries. Writing every registry
 * as a sub-table keeps declaration order, and with it priority.
 */
function asTables(registries: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [name, entry] of Object.entries(registries)) {
    result[name] = typeof entry === "string" ? { url: entry } : entry;
  }
  return result;
}

function tomlValue(value: string | string[]): string {
  return stringify({ v: value }).replace("v = ", "").trimEnd();
}
