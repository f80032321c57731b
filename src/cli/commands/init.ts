import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { generateDefaultConfig } from "../../config/writer.js";
import { loadConfig } from "../../config/loader.js";
import { NAME_PATTERN } from "../../config/schema.js";
import { resolveScope } from "../../scope.js";
import type { ScopeRoot } from "../../scope.js";
import { atomicWrite } from "../../utils/fs.js";
import { CommandError, reportError } from "../errors.js";

export class InitError extends CommandError {
  constructor(message: string) {
    super(message);
    this.name = "InitError";
  }
}

export interface InitOptions {
  scope: ScopeRoot;
  force?: boolean;
  /** `name=url` pairs, in priority order */
  registries?: string[];
  componentPath?: string;
  lockRegistries?: boolean;
}

export interface InitResult {
  configPath: string;
  componentDir: string;
}

export async function runInit(opts: InitOptions): Promise<InitResult> {
  const { scope, force } = opts;

  if (existsSync(scope.configPath) && !force) {
    throw new InitError("stowaway.toml already exists. Use --force to overwrite.");
  }

  const registries: Record<string, string> = {};
  for (const pair of opts.registries ?? []) {
    const eq = pair.indexOf("=");
    const name = pair.slice(0, eq).trim();
    const url = pair.slice(eq + 1).trim();
    if (eq === -1 || !NAME_PATTERN.test(name) || !url.startsWith("https://")) {
      throw new InitError(`Invalid --registry "${pair}": expected name=https://...`);
    }
    registries[name] = url;
  }

  await atomicWrite(
    scope.configPath,
    generateDefaultConfig({ registries, componentPath: opts.componentPath, lockRegistries: opts.lockRegistries }),
  );

  const config = await loadConfig(scope.configPath);
  const componentDir = join(scope.root, config.component_path);
  await mkdir(componentDir, { recursive: true });

  return { configPath: scope.configPath, componentDir };
}

export default async function init(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      force: { type: "boolean" },
      registry: { type: "string", multiple: true },
      "component-path": { type: "string" },
      "lock-registries": { type: "boolean" },
    },
    strict: true,
  });

  try {
    const scope = resolveScope("project", resolve("."));
    const result = await runInit({
      scope,
      force: values["force"],
      registries: values["registry"],
      componentPath: values["component-path"],
      lockRegistries: values["lock-registries"],
    });

    console.log(chalk.green("Created stowaway.toml"));
    console.log(chalk.green(`Created ${result.componentDir}`));
    console.log(
      `\n${chalk.bold("Next steps:")}\n  1. Add a registry: stowaway registry add <name> <https-url>\n  2. Install: stowaway add <component>`,
    );
  } catch (err) {
    if (reportError(err)) return;
    throw err;
  }
}
