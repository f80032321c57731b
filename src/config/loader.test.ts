import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, loadProfileConfig, ConfigError } from "./loader.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "stowaway-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true });
  });

  it("loads a valid config", async () => {
    const configPath = join(dir, "stowaway.toml");
    await writeFile(
      configPath,
      `version = 1
lock_registries = true

[registries]
kit = "https://kit.example.com"
pinned = { url = "https://pinned.example.com", version = "1.0.0" }

[settings]
theme = "dark"
`,
    );

    const config = await loadConfig(configPath);
    expect(config.lock_registries).toBe(true);
    expect(Object.keys(config.registries)).toEqual(["kit", "pinned"]);
    expect(config.registries["pinned"]).toEqual({ url: "https://pinned.example.com", version: "1.0.0" });
    expect(config.settings).toEqual({ theme: "dark" });
  });

  it("loads a minimal config", async () => {
    const configPath = join(dir, "stowaway.toml");
    await writeFile(configPath, "version = 1\n");

    const config = await loadConfig(configPath);
    expect(config.version).toBe(1);
    expect(config.registries).toEqual({});
  });

  it("throws ConfigError for missing file", async () => {
    await expect(loadConfig(join(dir, "nope.toml"))).rejects.toThrow(ConfigError);
  });

  it("throws ConfigError for invalid TOML", async () => {
    const configPath = join(dir, "stowaway.toml");
    await writeFile(configPath, "this is not valid toml {{{}");
    await expect(loadConfig(configPath)).rejects.toThrow(ConfigError);
  });

  it("names the offending key for schema errors", async () => {
    const configPath = join(dir, "stowaway.toml");
    await writeFile(configPath, `version = 1\n\n[registries]\nkit = "http://kit.example.com"\n`);
    await expect(loadConfig(configPath)).rejects.toThrow(/registries\.kit/);
  });
});

describe("loadProfileConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "stowaway-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true });
  });

  it("loads overlay rules", async () => {
    const configPath = join(dir, "profile.toml");
    await writeFile(
      configPath,
      `version = 1\ninclude = ["**/AGENTS.md"]\nexclude = ["**/vendor/**"]\nmax_files = 50\n`,
    );

    const profile = await loadProfileConfig(configPath);
    expect(profile.include).toEqual(["**/AGENTS.md"]);
    expect(profile.exclude).toEqual(["**/vendor/**"]);
    expect(profile.max_files).toBe(50);
    expect(profile.component_path).toBe(".agents");
  });
});
