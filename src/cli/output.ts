import chalk from "chalk";
import type { Drift } from "../diff/diff.js";
import type { InstallResult } from "../installer/installer.js";

export function printInstallResults(results: InstallResult[]): void {
  for (const { entry, status } of results) {
    const label = `${entry.id}@${entry.version}`;
    if (status === "unchanged") {
      console.log(chalk.dim(`  ${label} (unchanged)`));
    } else {
      console.log(chalk.green(`  ${label} ${status}`) + chalk.dim(` (${entry.installed_files.length} file(s))`));
    }
  }

  const changed = results.filter((r) => r.status !== "unchanged").length;
  if (changed === 0) {
    console.log(chalk.dim("Nothing to do."));
  } else {
    console.log(chalk.green(`Applied ${changed} component(s).`));
  }
}

const DRIFT_COLOURS = {
  added: chalk.green,
  missing: chalk.red,
  modified: chalk.yellow,
} as const;

export function printDrift(drift: Drift[]): void {
  if (drift.length === 0) {
    console.log(chalk.green("No drift: installed files match stowaway.lock."));
    return;
  }

  let current: string | null = null;
  for (const d of drift) {
    if (d.componentId !== current) {
      current = d.componentId;
      console.log(chalk.bold(current));
    }
    console.log(`  ${DRIFT_COLOURS[d.kind](d.kind.padEnd(8))} ${d.path}`);
  }
}

/** Abort `controller` on Ctrl-C until the returned function is called. */
export function abortOnInterrupt(controller: AbortController): () => void {
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  return () => {
    process.off("SIGINT", onInterrupt);
  };
}
