import { resolve as resolvePath } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { install } from "../../installer/installer.js";
import type { InstallResult } from "../../installer/installer.js";
import { createRegistryClient } from "../../registry/client.js";
import type { RegistryClient } from "../../registry/client.js";
import { resolve } from "../../resolver/resolver.js";
import { resolveDefaultScope } from "../../scope.js";
import { withExclusiveLock } from "../../utils/lock.js";
import { CommandError, reportError } from "../errors.js";
import { abortOnInterrupt, printInstallResults } from "../output.js";
import { installContextFor, projectWorkspace } from "../workspace.js";
import type { Workspace } from "../workspace.js";

export interface AddOptions {
  workspace: Workspace;
  /** `[registry/]name[@range]` identifiers */
  ids: string[];
  overwrite?: boolean;
  client?: RegistryClient;
  signal?: AbortSignal;
}

/**
 * Resolve and install components while holding the workspace's operation lock.
 */
export async function runAdd(opts: AddOptions): Promise<InstallResult[]> {
  const { workspace, ids } = opts;
  if (ids.length === 0) {
    throw new CommandError("Nothing to add: pass at least one component identifier.");
  }
  if (workspace.registries.length === 0) {
    throw new CommandError(`No registries configured for the ${workspace.label}. Run 'stowaway registry add' first.`);
  }

  const client = opts.client ?? createRegistryClient();
  return withExclusiveLock(workspace.lockPath, "install", async () => {
    const plan = await resolve(ids, { registries: workspace.registries, client });
    return install(plan, installContextFor(workspace, client), { overwrite: opts.overwrite, signal: opts.signal });
  });
}

export default async function add(args: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      overwrite: { type: "boolean" },
    },
    strict: true,
  });

  if (positionals.length === 0) {
    console.error(chalk.red("Usage: stowaway add <[registry/]name[@range]>... [--overwrite]"));
    process.exitCode = 1;
    return;
  }

  const controller = new AbortController();
  const stopListening = abortOnInterrupt(controller);
  try {
    const workspace = await projectWorkspace(resolveDefaultScope(resolvePath(".")));
    const results = await runAdd({
      workspace,
      ids: positionals,
      overwrite: values["overwrite"],
      signal: controller.signal,
    });
    printInstallResults(results);
  } catch (err) {
    if (controller.signal.aborted) {
      console.error(chalk.yellow("Cancelled. Components installed before the interruption were kept."));
      process.exitCode = 130;
      return;
    }
    if (reportError(err)) return;
    throw err;
  } finally {
    stopListening();
  }
}
