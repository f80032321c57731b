import { mkdir } from "node:fs/promises";
import { resolve as resolvePath } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { runInGhostSession } from "../../ghost/run.js";
import type { SessionSummary } from "../../ghost/session.js";
import { openProfileStore } from "../../profiles/store.js";
import type { CurrentProfileOptions, Profile, ProfileStore } from "../../profiles/store.js";
import { stowawayHome } from "../../scope.js";
import { reportError } from "../errors.js";
import { abortOnInterrupt, printInstallResults } from "../output.js";
import { profileWorkspace } from "../workspace.js";
import { runAdd } from "./add.js";
import { registryCommand } from "./registry.js";

export interface GhostInitResult {
  home: string;
  profile: Profile;
}

/**
 * Create the stowaway home and make sure the current profile exists.
 */
export async function runGhostInit(store: ProfileStore, opts: CurrentProfileOptions = {}): Promise<GhostInitResult> {
  await mkdir(store.home, { recursive: true });
  return { home: store.home, profile: await store.current(opts) };
}

export interface ProfileListing {
  name: string;
  current: boolean;
}

export async function listProfiles(store: ProfileStore, opts: CurrentProfileOptions = {}): Promise<ProfileListing[]> {
  const current = await store.currentName(opts);
  return (await store.list()).map((name) => ({ name, current: name === current }));
}

/** Pull `--profile <name>` / `--profile=<name>` out of `args`, wherever it appears. */
export function extractProfileFlag(args: string[]): { profile?: string; rest: string[] } {
  const rest: string[] = [];
  let profile: string | undefined;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg === "--") {
      rest.push(...args.slice(i));
      break;
    }
    if (arg === "--profile") {
      profile = args[++i];
    } else if (arg.startsWith("--profile=")) {
      profile = arg.slice("--profile=".length);
    } else {
      rest.push(arg);
    }
  }
  return profile !== undefined ? { profile, rest } : { rest };
}

const USAGE = `Usage: stowaway ghost [--profile <name>] <command>

Commands:
  init                              Create the stowaway home and default profile
  profile create <name> [--from p]  Create a profile, optionally copying another's profile.toml
  profile use <name>                Make a profile current
  profile list                      List profiles
  profile show [name]               Show a profile's settings
  profile remove <name>             Delete a profile (not the current one)
  registry add|remove|list          Manage the profile's registries
  add <component>... [--overwrite]  Install components into the profile
  run <repo> [-- command ...]       Open the repository with the profile's components`;

function usage(): void {
  console.error(chalk.red(USAGE));
  process.exitCode = 1;
}

function printSummary(summary: SessionSummary): void {
  for (const path of summary.synced) {
    console.log(chalk.green(`  synced ${path}`));
  }
  for (const path of summary.skipped) {
    console.log(chalk.yellow(`  skipped ${path} (already exists in the repository)`));
  }
  for (const path of summary.discarded) {
    console.log(chalk.dim(`  discarded ${path} (outside the component path)`));
  }
}

function printProfile(profile: Profile): void {
  console.log(chalk.bold(profile.name) + chalk.dim(` (${profile.dir})`));
  console.log(`  component_path: ${profile.componentPath}`);
  console.log(`  include: ${profile.include.length > 0 ? profile.include.join(", ") : "(everything)"}`);
  console.log(`  exclude: ${profile.exclude.length > 0 ? profile.exclude.join(", ") : "(nothing)"}`);
  console.log(`  max_files: ${profile.maxFiles === 0 ? "unlimited" : profile.maxFiles}`);
  if (profile.registries.length === 0) {
    console.log("  registries: (none)");
  } else {
    console.log("  registries:");
    for (const r of profile.registries) console.log(`    ${r.name} ${r.baseUrl}`);
  }
}

async function profileSubcommand(store: ProfileStore, args: string[], current: CurrentProfileOptions): Promise<void> {
  const { positionals, values } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      from: { type: "string" },
    },
    strict: true,
  });
  const [sub, name] = positionals;

  if (sub === "create" && name !== undefined) {
    const profile = await store.create(name, { cloneFrom: values["from"] });
    console.log(chalk.green(`Created profile "${profile.name}" at ${profile.dir}`));
  } else if (sub === "use" && name !== undefined) {
    await store.use(name);
    console.log(chalk.green(`Now using profile "${name}".`));
  } else if (sub === "list") {
    const profiles = await listProfiles(store, current);
    if (profiles.length === 0) {
      console.log(chalk.dim("No profiles yet. Run 'stowaway ghost init'."));
    }
    for (const p of profiles) {
      console.log(p.current ? chalk.green(`* ${p.name}`) : `  ${p.name}`);
    }
  } else if (sub === "show") {
    printProfile(name !== undefined ? await store.load(name) : await store.current(current));
  } else if (sub === "remove" && name !== undefined) {
    await store.remove(name, current);
    console.log(chalk.green(`Removed profile "${name}".`));
  } else {
    usage();
  }
}

async function addSubcommand(profile: Profile, args: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      overwrite: { type: "boolean" },
    },
    strict: true,
  });
  if (positionals.length === 0) {
    usage();
    return;
  }

  const controller = new AbortController();
  const stopListening = abortOnInterrupt(controller);
  try {
    const results = await runAdd({
      workspace: profileWorkspace(profile),
      ids: positionals,
      overwrite: values["overwrite"],
      signal: controller.signal,
    });
    printInstallResults(results);
  } catch (err) {
    if (!controller.signal.aborted) throw err;
    console.error(chalk.yellow("Cancelled. Components installed before the interruption were kept."));
    process.exitCode = 130;
  } finally {
    stopListening();
  }
}

async function runSubcommand(profile: Profile, args: string[], home: string): Promise<void> {
  const split = args.indexOf("--");
  const own = split === -1 ? args : args.slice(0, split);
  const command = split === -1 ? undefined : args.slice(split + 1);
  const [repo, ...extra] = own;
  if (repo === undefined || extra.length > 0 || command?.length === 0) {
    usage();
    return;
  }

  const { exitCode, summary } = await runInGhostSession(profile, resolvePath(repo), {
    home,
    command,
    onBegin: (session) => {
      console.error(chalk.dim(`Ghost session for ${session.target} under profile "${profile.name}"`));
      console.error(chalk.dim(`  overlay: ${session.overlayDir}`));
    },
  });

  printSummary(summary);
  if (exitCode !== 0) process.exitCode = exitCode;
}

export default async function ghost(args: string[]): Promise<void> {
  const { profile: override, rest } = extractProfileFlag(args);
  const [sub, ...subArgs] = rest;
  const home = stowawayHome();
  const store = openProfileStore(home);
  const current: CurrentProfileOptions = override !== undefined ? { override } : {};

  try {
    switch (sub) {
      case "init": {
        const result = await runGhostInit(store, current);
        console.log(chalk.green(`Stowaway home: ${result.home}`));
        console.log(chalk.green(`Current profile: ${result.profile.name}`));
        console.log(`\n${chalk.bold("Next steps:")}\n  1. stowaway ghost registry add <name> <https-url>\n  2. stowaway ghost add <component>\n  3. stowaway ghost run <repo>`);
        return;
      }
      case "profile":
        await profileSubcommand(store, subArgs, current);
        return;
      case "registry":
        await registryCommand(subArgs, async () => profileWorkspace(await store.current(current)));
        return;
      case "add":
        await addSubcommand(await store.current(current), subArgs);
        return;
      case "run":
        await runSubcommand(await store.current(current), subArgs, home);
        return;
      default:
        usage();
    }
  } catch (err) {
    if (reportError(err)) return;
    throw err;
  }
}
