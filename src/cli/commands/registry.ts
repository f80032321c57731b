import { resolve as resolvePath } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { ConfigError } from "../../config/loader.js";
import { NAME_PATTERN, toRegistries } from "../../config/schema.js";
import type { Registry, RegistryEntry } from "../../config/schema.js";
import { addRegistryToConfig, removeRegistryFromConfig } from "../../config/writer.js";
import { createRegistryClient } from "../../registry/client.js";
import type { RegistryClient } from "../../registry/client.js";
import type { Discovery } from "../../registry/schema.js";
import { resolveDefaultScope } from "../../scope.js";
import { CommandError, reportError } from "../errors.js";
import { projectWorkspace } from "../workspace.js";
import type { Workspace } from "../workspace.js";

export interface RegistryAddOptions {
  workspace: Workspace;
  name: string;
  url: string;
  /** Pin every component from this registry to one version */
  version?: string;
  client?: RegistryClient;
}

export interface RegistryAddResult {
  registry: Registry;
  discovery: Discovery | null;
}

function assertUnlocked(workspace: Workspace): void {
  if (workspace.lockRegistries) {
    throw new ConfigError(
      `Registries of the ${workspace.label} are locked (lock_registries = true). Edit ${workspace.configPath} by hand.`,
    );
  }
}

/**
 * Append a registry after checking that it answers. It gets the lowest
 * priority.
 */
export async function runRegistryAdd(opts: RegistryAddOptions): Promise<RegistryAddResult> {
  const { workspace, name } = opts;
  assertUnlocked(workspace);

  if (!NAME_PATTERN.test(name)) {
    throw new CommandError(`Invalid registry name "${name}": must start with a letter and contain only [a-zA-Z0-9._-]`);
  }
  if (!opts.url.startsWith("https://")) {
    throw new CommandError(`Registry URLs must use https:// (got ${opts.url})`);
  }
  if (workspace.registries.some((r) => r.name === name)) {
    throw new ConfigError(`Registry "${name}" already exists in ${workspace.configPath}.`);
  }

  const entry: RegistryEntry = opts.version !== undefined ? { url: opts.url, version: opts.version } : opts.url;
  const [registry] = toRegistries({ [name]: entry });
  if (!registry) throw new CommandError(`Invalid registry "${name}"`);

  const client = opts.client ?? createRegistryClient();
  const discovery = await client.fetchDiscovery(registry);

  await addRegistryToConfig(workspace.configPath, name, entry);
  return { registry, discovery };
}

export async function runRegistryRemove(workspace: Workspace, name: string): Promise<void> {
  assertUnlocked(workspace);
  await removeRegistryFromConfig(workspace.configPath, name);
}

const USAGE = "Usage: stowaway registry <add <name> <https-url> [--version <v>] | remove <name> | list>";

/**
 * Shared by `stowaway registry` and `stowaway ghost registry`, which differ
 * only in the workspace they edit.
 */
export async function registryCommand(args: string[], open: () => Promise<Workspace>): Promise<void> {
  const { positionals, values } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      version: { type: "string" },
    },
    strict: true,
  });
  const [sub, name, url] = positionals;

  try {
    if (sub === "add" && name !== undefined && url !== undefined) {
      const workspace = await open();
      const { registry, discovery } = await runRegistryAdd({ workspace, name, url, version: values["version"] });
      console.log(chalk.green(`Added registry "${registry.name}" (${registry.baseUrl}) to the ${workspace.label}.`));
      if (discovery?.description) console.log(chalk.dim(`  ${discovery.description}`));
      return;
    }

    if (sub === "remove" && name !== undefined) {
      const workspace = await open();
      await runRegistryRemove(workspace, name);
      console.log(chalk.green(`Removed registry "${name}" from the ${workspace.label}.`));
      return;
    }

    if (sub === "list") {
      const workspace = await open();
      if (workspace.registries.length === 0) {
        console.log(chalk.dim(`No registries configured for the ${workspace.label}.`));
        return;
      }
      workspace.registries.forEach((r, i) => {
        const pinned = r.pinnedVersion !== undefined ? chalk.dim(` (pinned ${r.pinnedVersion})`) : "";
        console.log(`${i + 1}. ${chalk.bold(r.name)} ${r.baseUrl}${pinned}`);
      });
      return;
    }
  } catch (err) {
    if (reportError(err)) return;
    throw err;
  }

  console.error(chalk.red(USAGE));
  process.exitCode = 1;
}

export default async function registry(args: string[]): Promise<void> {
  await registryCommand(args, () => projectWorkspace(resolveDefaultScope(resolvePath("."))));
}
