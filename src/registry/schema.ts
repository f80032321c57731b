import { z } from "zod/v4";
import { componentTypeSchema } from "../lockfile/schema.js";
import type { ComponentType } from "../lockfile/schema.js";

export const componentSummarySchema = z.object({
  name: z.string(),
  type: componentTypeSchema,
  latestVersion: z.string(),
  description: z.string().default(""),
});

export type ComponentSummary = z.infer<typeof componentSummarySchema>;

export const indexSchema = z.array(componentSummarySchema);

const fileEntrySchema = z.union([
  z.string(),
  z.object({
    source: z.string(),
    target: z.string().optional(),
  }),
]);

const versionEntrySchema = z.object({
  description: z.string().optional(),
  dependencies: z.array(z.string()).default([]),
  files: z.array(fileEntrySchema).default([]),
  config: z.record(z.string(), z.unknown()).optional(),
});

/** `GET /components/{name}.json`: a component with every published version. */
export const packumentSchema = z.object({
  name: z.string(),
  type: componentTypeSchema,
  description: z.string().default(""),
  versions: z.record(z.string(), versionEntrySchema),
});

export type Packument = z.infer<typeof packumentSchema>;

export const discoverySchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  homepage: z.string().optional(),
});

export type Discovery = z.infer<typeof discoverySchema>;

export interface ComponentFile {
  /** Path inside the registry, relative to the component */
  source: string;
  /** Install path relative to the component path, when it overrides the per-type default */
  target?: string;
}

interface ManifestBase {
  name: string;
  version: string;
  description: string;
  dependencies: string[];
  /** Fragment folded into the aggregate settings document */
  config: Record<string, unknown>;
}

/** Bundles only pull in their dependencies. */
export interface BundleManifest extends ManifestBase {
  type: "bundle";
}

export interface FileComponentManifest extends ManifestBase {
  type: Exclude<ComponentType, "bundle">;
  files: ComponentFile[];
}

export type ComponentManifest = BundleManifest | FileComponentManifest;

/**
 * Build the manifest for one published version.
 * Returns null when the packument has no such version.
 */
export function manifestFor(packument: Packument, version: string): ComponentManifest | null {
  const entry = packument.versions[version];
  if (!entry) return null;

  const base: ManifestBase = {
    name: packument.name,
    version,
    description: entry.description ?? packument.description,
    dependencies: entry.dependencies,
    config: entry.config ?? {},
  };

  if (packument.type === "bundle") {
    return { ...base, type: "bundle" };
  }
  return {
    ...base,
    type: packument.type,
    files: entry.files.map((f) => (typeof f === "string" ? { source: f } : f)),
  };
}
