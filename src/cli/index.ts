#!/usr/bin/env node
import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };
export { version };

const COMMANDS = ["init", "add", "update", "diff", "registry", "search", "ghost"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(name: string): name is Command {
  return COMMANDS.some((c) => c === name);
}

function printUsage(): void {
  // eslint-disable-next-line no-console
  console.log(`stowaway - install versioned agent components from registries

Usage: stowaway <command> [options]

Commands:
  init        Create stowaway.toml and the component directory
  add         Resolve and install components
  update      Move installed components to newer versions
  diff        Compare installed files with stowaway.lock
  registry    Add, remove or list registries
  search      Search registries, or installed components with --installed
  ghost       Use components in a repository without changing it

Options:
  --help, -h  Show this help message
  --version   Show version`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const first = args[0];

  if (!first || first === "--help" || first === "-h") {
    printUsage();
    return;
  }
  if (first === "--version" || first === "-V") {
    // eslint-disable-next-line no-console
    console.log(version);
    return;
  }

  if (!isCommand(first)) {
    console.error(`Unknown command: ${first}`);
    printUsage();
    process.exitCode = 1;
    return;
  }

  const mod: { default: (args: string[]) => Promise<void> } = await import(`./commands/${first}.js`);
  await mod.default(args.slice(1));
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
