import { resolve as resolvePath } from "node:path";
import { parseArgs } from "node:util";
import * as clack from "@clack/prompts";
import chalk from "chalk";
import { diff, HashMismatchError } from "../../diff/diff.js";
import { install } from "../../installer/installer.js";
import type { InstallResult } from "../../installer/installer.js";
import type { LockEntry } from "../../lockfile/schema.js";
import { createRegistryClient } from "../../registry/client.js";
import type { RegistryClient } from "../../registry/client.js";
import { resolve } from "../../resolver/resolver.js";
import { resolveDefaultScope } from "../../scope.js";
import { withExclusiveLock } from "../../utils/lock.js";
import { CommandError, reportError } from "../errors.js";
import { abortOnInterrupt, printInstallResults } from "../output.js";
import { findInstalled, installContextFor, projectWorkspace } from "../workspace.js";
import type { Workspace } from "../workspace.js";

export class UpdateError extends CommandError {
  constructor(message: string) {
    super(message);
    this.name = "UpdateError";
  }
}

export interface UpdateOptions {
  workspace: Workspace;
  /** Installed components to update; all of them when empty */
  ids?: string[];
  /** Exact version to move a single component to */
  version?: string;
  /** Discard local changes instead of refusing */
  force?: boolean;
  client?: RegistryClient;
  signal?: AbortSignal;
}

/**
 * Re-resolve installed components against the registry they came from and
 * reinstall them. Files a new version no longer ships are removed.
 */
export async function runUpdate(opts: UpdateOptions): Promise<InstallResult[]> {
  const { workspace } = opts;
  const ids = opts.ids ?? [];
  if (opts.version !== undefined && ids.length !== 1) {
    throw new UpdateError("--version needs exactly one component.");
  }

  const client = opts.client ?? createRegistryClient();
  return withExclusiveLock(workspace.lockPath, "update", async () => {
    const entries = await workspace.store.allEntries();
    const selected = ids.length > 0 ? ids.map((ref) => findInstalled(entries, ref)) : entries;
    if (selected.length === 0) return [];

    const discard = await checkDrift(workspace, selected, opts.force === true);

    const requests = selected.map((e) => `${e.registry}/${e.name}@${opts.version ?? "*"}`);
    const plan = await resolve(requests, { registries: workspace.registries, client });
    return install(plan, installContextFor(workspace, client), { discard, signal: opts.signal });
  });
}

/**
 * Refuse drifted components unless `force`. Returns, per component, the
 * untracked files that forcing discards. The install removes them under its
 * own backup; modified and missing files are rewritten by the install.
 */
async function checkDrift(
  workspace: Workspace,
  selected: LockEntry[],
  force: boolean,
): Promise<Map<string, string[]>> {
  const discard = new Map<string, string[]>();
  for (const entry of selected) {
    const drift = await diff(workspace, entry.id);
    if (drift.length === 0) continue;
    if (!force) throw new HashMismatchError(entry.id, drift);
    const added = drift.filter((d) => d.kind === "added").map((d) => d.path);
    if (added.length > 0) discard.set(entry.id, added);
  }
  return discard;
}

async function pickComponents(workspace: Workspace): Promise<string[] | null> {
  const entries = await workspace.store.allEntries();
  if (entries.length === 0) return [];

  const selected = await clack.multiselect({
    message: "Select components to update:",
    options: entries.map((e) => ({ label: e.id, value: e.id, hint: e.version })),
    initialValues: entries.map((e) => e.id),
    required: true,
  });
  return clack.isCancel(selected) ? null : selected;
}

export default async function update(args: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      version: { type: "string" },
      force: { type: "boolean" },
    },
    strict: true,
  });

  const controller = new AbortController();
  const stopListening = abortOnInterrupt(controller);
  try {
    const workspace = await projectWorkspace(resolveDefaultScope(resolvePath(".")));

    let ids = positionals;
    if (ids.length === 0 && values["version"] === undefined && process.stdin.isTTY) {
      const picked = await pickComponents(workspace);
      if (picked === null) {
        clack.cancel("Update cancelled.");
        return;
      }
      ids = picked;
    }

    const results = await runUpdate({
      workspace,
      ids,
      version: values["version"],
      force: values["force"],
      signal: controller.signal,
    });
    if (results.length === 0) {
      console.log(chalk.dim("No components installed."));
      return;
    }
    printInstallResults(results);
  } catch (err) {
    if (controller.signal.aborted) {
      console.error(chalk.yellow("Cancelled. Components updated before the interruption were kept."));
      process.exitCode = 130;
      return;
    }
    if (reportError(err)) return;
    throw err;
  } finally {
    stopListening();
  }
}
