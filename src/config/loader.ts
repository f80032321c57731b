import { readFile } from "node:fs/promises";
import { parse as parseTOML } from "smol-toml";
import { projectConfigSchema, profileConfigSchema } from "./schema.js";
import type { ProjectConfig, ProfileConfig } from "./schema.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export async function loadConfig(filePath: string): Promise<ProjectConfig> {
  const result = projectConfigSchema.safeParse(await readToml(filePath));
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${filePath}:\n${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

export async function loadProfileConfig(filePath: string): Promise<ProfileConfig> {
  const result = profileConfigSchema.safeParse(await readToml(filePath));
  if (!result.success) {
    throw new ConfigError(`Invalid profile in ${filePath}:\n${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

/**
 * Read and parse a TOML document without validating it.
 * Writers use this to edit a table while keeping keys the schema doesn't know.
 */
export async function readToml(filePath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  try {
    return parseTOML(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid TOML in ${filePath}: ${message}`);
  }
}

function formatIssues(issues: { path: PropertyKey[]; message: string }[]): string {
  return issues.map((i) => `  - ${i.path.map(String).join(".")}: ${i.message}`).join("\n");
}
