import { resolve as resolvePath } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import type { ComponentType } from "../../lockfile/schema.js";
import { createRegistryClient } from "../../registry/client.js";
import type { RegistryClient } from "../../registry/client.js";
import { resolveDefaultScope } from "../../scope.js";
import { reportError } from "../errors.js";
import { projectWorkspace } from "../workspace.js";
import type { Workspace } from "../workspace.js";

export interface SearchOptions {
  workspace: Workspace;
  /** Case-insensitive substring of the name or description; everything when empty */
  query?: string;
  /** Search the lockfile instead of the registries */
  installed?: boolean;
  client?: RegistryClient;
}

export interface SearchHit {
  id: string;
  registry: string;
  name: string;
  type: ComponentType;
  /** Latest published version, or the installed one */
  version: string;
  description: string;
}

/**
 * Hits come in registry priority order, then in the order each index lists
 * them. Installed hits are sorted by id.
 */
export async function runSearch(opts: SearchOptions): Promise<SearchHit[]> {
  const { workspace } = opts;
  const needle = (opts.query ?? "").toLowerCase();
  const matches = (...fields: string[]) => fields.some((f) => f.toLowerCase().includes(needle));

  if (opts.installed) {
    return (await workspace.store.allEntries())
      .filter((e) => matches(e.id))
      .map((e) => ({
        id: e.id,
        registry: e.registry,
        name: e.name,
        type: e.type,
        version: e.version,
        description: "",
      }));
  }

  const client = opts.client ?? createRegistryClient();
  const indexes = await Promise.all(workspace.registries.map((r) => client.fetchIndex(r)));

  return workspace.registries.flatMap((registry, i) =>
    (indexes[i] ?? [])
      .filter((c) => matches(c.name, c.description))
      .map((c) => ({
        id: `${registry.name}/${c.name}`,
        registry: registry.name,
        name: c.name,
        type: c.type,
        version: c.latestVersion,
        description: c.description,
      })),
  );
}

export default async function search(args: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      installed: { type: "boolean" },
    },
    strict: true,
  });

  try {
    const workspace = await projectWorkspace(resolveDefaultScope(resolvePath(".")));
    const hits = await runSearch({ workspace, query: positionals.join(" "), installed: values["installed"] });

    if (hits.length === 0) {
      console.log(chalk.dim("No components found."));
      return;
    }
    for (const hit of hits) {
      const description = hit.description ? chalk.dim(`  ${hit.description}`) : "";
      console.log(`${chalk.bold(hit.id)}@${hit.version} ${chalk.cyan(hit.type)}${description}`);
    }
  } catch (err) {
    if (reportError(err)) return;
    throw err;
  }
}
