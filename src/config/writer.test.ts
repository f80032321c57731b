import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  addRegistryToConfig,
  removeRegistryFromConfig,
  generateDefaultConfig,
  generateDefaultProfile,
} from "./writer.js";
import { loadConfig, loadProfileConfig, ConfigError } from "./loader.js";

describe("config writer", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "stowaway-writer-"));
    configPath = join(dir, "stowaway.toml");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true });
  });

  describe("generateDefaultConfig", () => {
    it("produces a loadable config", async () => {
      await writeFile(configPath, generateDefaultConfig());
      const config = await loadConfig(configPath);
      expect(config.component_path).toBe(".agents");
      expect(config.registries).toEqual({});
      expect(config.lock_registries).toBe(false);
    });

    it("includes registries in order and the lock flag", async () => {
      await writeFile(
        configPath,
        generateDefaultConfig({
          registries: { kit: "https://kit.example.com", extra: "https://extra.example.com" },
          lockRegistries: true,
        }),
      );
      const config = await loadConfig(configPath);
      expect(Object.keys(config.registries)).toEqual(["kit", "extra"]);
      expect(config.lock_registries).toBe(true);
    });
  });

  describe("generateDefaultProfile", () => {
    it("produces a loadable profile", async () => {
      const profilePath = join(dir, "profile.toml");
      await writeFile(profilePath, generateDefaultProfile({ exclude: ["**/vendor/**"] }));
      const profile = await loadProfileConfig(profilePath);
      expect(profile.exclude).toEqual(["**/vendor/**"]);
      expect(profile.max_files).toBe(10000);
    });
  });

  describe("addRegistryToConfig", () => {
    it("appends a registry with lowest priority", async () => {
      await writeFile(configPath, generateDefaultConfig({ registries: { kit: "https://kit.example.com" } }));
      await addRegistryToConfig(configPath, "extra", { url: "https://extra.example.com", version: "1.0.0" });

      const config = await loadConfig(configPath);
      expect(Object.keys(config.registries)).toEqual(["kit", "extra"]);
      expect(config.registries["extra"]).toEqual({ url: "https://extra.example.com", version: "1.0.0" });
    });

    it("keeps unrelated settings", async () => {
      await writeFile(configPath, `version = 1\n\n[settings]\ntheme = "dark"\n`);
      await addRegistryToConfig(configPath, "kit", "https://kit.example.com");
      const config = await loadConfig(configPath);
      expect(config.settings).toEqual({ theme: "dark" });
      expect(config.registries).toEqual({ kit: { url: "https://kit.example.com" } });
    });

    it("keeps priority order when pinned and floating entries are mixed", async () => {
      await writeFile(
        configPath,
        generateDefaultConfig({
          registries: { pinned: { url: "https://pinned.example.com", version: "1.0.0" } },
        }),
      );
      await addRegistryToConfig(configPath, "kit", "https://kit.example.com");
      const config = await loadConfig(configPath);
      expect(Object.keys(config.registries)).toEqual(["pinned", "kit"]);
    });

    it("rejects duplicate names", async () => {
      await writeFile(configPath, generateDefaultConfig({ registries: { kit: "https://kit.example.com" } }));
      await expect(addRegistryToConfig(configPath, "kit", "https://other.example.com")).rejects.toThrow(
        ConfigError,
      );
    });
  });

  describe("removeRegistryFromConfig", () => {
    it("removes the named registry", async () => {
      await writeFile(
        configPath,
        generateDefaultConfig({
          registries: { kit: "https://kit.example.com", extra: "https://extra.example.com" },
        }),
      );
      await removeRegistryFromConfig(configPath, "kit");
      const config = await loadConfig(configPath);
      expect(config.registries).toEqual({ extra: { url: "https://extra.example.com" } });
    });

    it("throws when the registry is unknown", async () => {
      await writeFile(configPath, generateDefaultConfig());
      await expect(removeRegistryFromConfig(configPath, "nope")).rejects.toThrow(ConfigError);
    });
  });
});
