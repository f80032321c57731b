import { describe, it, expect } from "vitest";
import { projectConfigSchema, profileConfigSchema, toRegistries } from "./schema.js";

describe("projectConfigSchema", () => {
  it("parses a minimal config with defaults", () => {
    const result = projectConfigSchema.safeParse({ version: 1 });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.registries).toEqual({});
      expect(result.data.lock_registries).toBe(false);
      expect(result.data.component_path).toBe(".agents");
      expect(result.data.settings).toEqual({});
    }
  });

  it("accepts floating and pinned registries", () => {
    const result = projectConfigSchema.safeParse({
      version: 1,
      registries: {
        kit: "https://kit.example.com",
        pinned: { url: "https://pinned.example.com", version: "1.2.0" },
      },
    });
    expect(result.success).toBe(true);
  });

  it("rejects plain http registries", () => {
    const result = projectConfigSchema.safeParse({
      version: 1,
      registries: { kit: "http://kit.example.com" },
    });
    expect(result.success).toBe(false);
  });

  it("rejects registry names that are not path-safe", () => {
    const result = projectConfigSchema.safeParse({
      version: 1,
      registries: { "../evil": "https://kit.example.com" },
    });
    expect(result.success).toBe(false);
  });

  it("rejects a component_path that escapes the project", () => {
    expect(projectConfigSchema.safeParse({ version: 1, component_path: "../elsewhere" }).success).toBe(false);
    expect(projectConfigSchema.safeParse({ version: 1, component_path: "/abs" }).success).toBe(false);
  });

  it("rejects unknown versions", () => {
    expect(projectConfigSchema.safeParse({ version: 2 }).success).toBe(false);
  });
});

describe("profileConfigSchema", () => {
  it("defaults the overlay rules", () => {
    const result = profileConfigSchema.safeParse({ version: 1 });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.include).toEqual([]);
      expect(result.data.exclude).toEqual([]);
      expect(result.data.max_files).toBe(10000);
    }
  });

  it("rejects a negative max_files", () => {
    expect(profileConfigSchema.safeParse({ version: 1, max_files: -1 }).success).toBe(false);
  });
});

describe("toRegistries", () => {
  it("keeps declaration order and strips trailing slashes", () => {
    expect(
      toRegistries({
        b: "https://b.example.com/",
        a: { url: "https://a.example.com", version: "2.0.0" },
      }),
    ).toEqual([
      { name: "b", baseUrl: "https://b.example.com" },
      { name: "a", baseUrl: "https://a.example.com", pinnedVersion: "2.0.0" },
    ]);
  });
});
