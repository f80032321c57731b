import { rm } from "node:fs/promises";
import { join, resolve as resolvePath } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { diff } from "../../diff/diff.js";
import type { Drift } from "../../diff/diff.js";
import { install } from "../../installer/installer.js";
import type { InstallResult } from "../../installer/installer.js";
import { createRegistryClient } from "../../registry/client.js";
import type { RegistryClient } from "../../registry/client.js";
import type { PlanEntry } from "../../resolver/resolver.js";
import { resolveDefaultScope } from "../../scope.js";
import { withExclusiveLock } from "../../utils/lock.js";
import { CommandError, reportError } from "../errors.js";
import { printDrift, printInstallResults } from "../output.js";
import { findInstalled, installContextFor, projectWorkspace } from "../workspace.js";
import type { Workspace } from "../workspace.js";

export interface DiffOptions {
  workspace: Workspace;
  /** Installed component to check; every component when omitted */
  id?: string;
  /** Restore drifted components to their locked state */
  fix?: boolean;
  client?: RegistryClient;
}

export interface DiffResult {
  drift: Drift[];
  /** Components reinstalled by `fix` */
  reinstalled: InstallResult[];
  /** Untracked files deleted by `fix` */
  removed: string[];
}

export async function runDiff(opts: DiffOptions): Promise<DiffResult> {
  const { workspace } = opts;
  const check = async () => {
    const componentId = opts.id !== undefined
      ? findInstalled(await workspace.store.allEntries(), opts.id).id
      : undefined;
    return diff(workspace, componentId);
  };

  if (!opts.fix) {
    return { drift: await check(), reinstalled: [], removed: [] };
  }

  const client = opts.client ?? createRegistryClient();
  return withExclusiveLock(workspace.lockPath, "diff --fix", async () => {
    const drift = await check();

    const removed = drift.filter((d) => d.kind === "added").map((d) => d.path);
    for (const path of removed) {
      await rm(join(workspace.root, path), { force: true });
    }

    const broken = [...new Set(drift.filter((d) => d.kind !== "added").map((d) => d.componentId))];
    const plan: PlanEntry[] = [];
    for (const id of broken) {
      const entry = await workspace.store.get(id);
      if (!entry) continue;
      const registry = workspace.registries.find((r) => r.name === entry.registry);
      if (!registry) {
        throw new CommandError(`Cannot restore "${id}": registry "${entry.registry}" is no longer configured.`);
      }
      const manifest = await client.fetchManifest(registry, entry.name, entry.version);
      plan.push({ id, registry, name: entry.name, version: manifest.version, manifest, requestedBy: [] });
    }

    const reinstalled = await install(plan, installContextFor(workspace, client));
    return { drift, reinstalled, removed };
  });
}

export default async function diffCommand(args: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      fix: { type: "boolean" },
      json: { type: "boolean" },
    },
    strict: true,
  });

  if (positionals.length > 1) {
    console.error(chalk.red("Usage: stowaway diff [component] [--fix] [--json]"));
    process.exitCode = 1;
    return;
  }

  try {
    const workspace = await projectWorkspace(resolveDefaultScope(resolvePath(".")));
    const result = await runDiff({ workspace, id: positionals[0], fix: values["fix"] });

    if (values["json"]) {
      console.log(JSON.stringify(result.drift, null, 2));
      return;
    }

    printDrift(result.drift);
    if (values["fix"] && result.drift.length > 0) {
      for (const path of result.removed) {
        console.log(chalk.dim(`  removed ${path}`));
      }
      if (result.reinstalled.length > 0) printInstallResults(result.reinstalled);
    }
  } catch (err) {
    if (reportError(err)) return;
    throw err;
  }
}
