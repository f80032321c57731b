import { isDeepStrictEqual } from "node:util";
import { atomicWrite } from "../utils/fs.js";

export type SettingsDocument = Record<string, unknown>;

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Fold a component's configuration fragment into the aggregate document.
 *
 * Objects merge key by key, arrays concatenate (skipping items already
 * present), anything else is shadowed by the fragment. Neither input is
 * modified.
 */
export function mergeFragment(base: SettingsDocument, fragment: SettingsDocument): SettingsDocument {
  const merged: SettingsDocument = { ...base };
  for (const [key, value] of Object.entries(fragment)) {
    const existing = merged[key];
    if (Array.isArray(existing) && Array.isArray(value)) {
      const items: unknown[] = [...existing];
      for (const item of value) {
        if (!items.some((e) => isDeepStrictEqual(e, item))) items.push(item);
      }
      merged[key] = items;
    } else if (isRecord(existing) && isRecord(value)) {
      merged[key] = mergeFragment(existing, value);
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

export async function writeSettings(path: string, settings: SettingsDocument): Promise<void> {
  await atomicWrite(path, JSON.stringify(settings, null, 2) + "\n");
}
