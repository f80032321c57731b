import { z } from "zod/v4";

export const COMPONENT_TYPES = ["skill", "agent", "plugin", "command", "tool", "bundle"] as const;

export const componentTypeSchema = z.enum(COMPONENT_TYPES);

export type ComponentType = z.infer<typeof componentTypeSchema>;

const lockedComponentSchema = z.object({
  registry: z.string(),
  name: z.string(),
  type: componentTypeSchema,
  version: z.string(),
  /** sha256 over the path-sorted concatenation of the installed bytes */
  content_hash: z.string(),
  installed_files: z.array(z.string()).default([]),
  /** Per-path digests, so drift can be reported file by file */
  file_hashes: z.record(z.string(), z.string()).default({}),
  /** JSON text of the component's configuration fragment, when it has one */
  config: z.string().optional(),
  installed_at: z.string(),
  updated_at: z.string(),
});

export type LockedComponent = z.infer<typeof lockedComponentSchema>;

export const lockfileSchema = z.object({
  lock_version: z.literal(1),
  installed: z.record(z.string(), lockedComponentSchema).default({}),
});

export type Lockfile = z.infer<typeof lockfileSchema>;

/** A lockfile entry together with the `registry/name` id it is keyed by. */
export type LockEntry = LockedComponent & { id: string };

export function emptyLockfile(): Lockfile {
  return { lock_version: 1, installed: {} };
}
