import { z } from "zod/v4";

/** Registry and component names must be safe for use in file paths and URLs. */
export const NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9._-]*$/;

const registryNameSchema = z.string().regex(
  NAME_PATTERN,
  "Registry names must start with a letter and contain only [a-zA-Z0-9._-]",
);

/** Registries are only ever reached over an encrypted channel. */
const registryUrlSchema = z.string().check(
  z.refine((s) => {
    try {
      return new URL(s).protocol === "https:";
    } catch {
      return false;
    }
  }, "Registry URLs must be absolute https:// URLs"),
);

/**
 * Registry declaration (inferred from value):
 *   name = "https://..."                          -- floating
 *   name = { url = "https://...", version = "x" } -- pinned to one component version
 */
const registryEntrySchema = z.union([
  registryUrlSchema,
  z.object({
    url: registryUrlSchema,
    version: z.string().optional(),
  }),
]);

export type RegistryEntry = z.infer<typeof registryEntrySchema>;

const registriesSchema = z.record(registryNameSchema, registryEntrySchema).default({});

const componentPathSchema = z.string().check(
  z.refine(
    (s) => s.length > 0 && !s.startsWith("/") && !s.split(/[\\/]/).includes(".."),
    "component_path must be a relative path inside the project",
  ),
);

export const projectConfigSchema = z.object({
  version: z.literal(1),
  lock_registries: z.boolean().default(false),
  component_path: componentPathSchema.default(".agents"),
  registries: registriesSchema,
  settings: z.record(z.string(), z.unknown()).default({}),
});

export type ProjectConfig = z.infer<typeof projectConfigSchema>;

export const DEFAULT_MAX_FILES = 10000;

export const profileConfigSchema = z.object({
  version: z.literal(1),
  component_path: componentPathSchema.default(".agents"),
  registries: registriesSchema,
  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  /** Overlay safety ceiling; 0 disables it */
  max_files: z.number().int().nonnegative().default(DEFAULT_MAX_FILES),
  settings: z.record(z.string(), z.unknown()).default({}),
});

export type ProfileConfig = z.infer<typeof profileConfigSchema>;

/** A configured registry, in priority order. */
export interface Registry {
  name: string;
  baseUrl: string;
  pinnedVersion?: string;
}

/**
 * Flatten the `[registries]` table into priority order (declaration order).
 */
export function toRegistries(entries: Record<string, RegistryEntry>): Registry[] {
  return Object.entries(entries).map(([name, entry]) => {
    const url = typeof entry === "string" ? entry : entry.url;
    const baseUrl = url.replace(/\/+$/, "");
    if (typeof entry !== "string" && entry.version) {
      return { name, baseUrl, pinnedVersion: entry.version };
    }
    return { name, baseUrl };
  });
}
