import { describe, it, expect, afterEach } from "vitest";
import { join } from "node:path";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { resolveScope, isInsideGitRepo, resolveDefaultScope, stowawayHome, ScopeError } from "./scope.js";

describe("resolveScope", () => {
  it("project scope uses projectRoot", () => {
    const s = resolveScope("project", "/tmp/my-project");
    expect(s.scope).toBe("project");
    expect(s.root).toBe("/tmp/my-project");
    expect(s.configPath).toBe("/tmp/my-project/stowaway.toml");
    expect(s.lockPath).toBe("/tmp/my-project/stowaway.lock");
    expect(s.profile).toBeUndefined();
  });

  it("project scope defaults to cwd when no projectRoot given", () => {
    const s = resolveScope("project");
    expect(s.root).toBe(process.cwd());
  });

  it("profile scope lives under the home's profiles directory", () => {
    const s = resolveScope("profile", "work", "/tmp/stowaway-home");
    expect(s.scope).toBe("profile");
    expect(s.root).toBe("/tmp/stowaway-home/profiles/work");
    expect(s.configPath).toBe("/tmp/stowaway-home/profiles/work/profile.toml");
    expect(s.lockPath).toBe("/tmp/stowaway-home/profiles/work/stowaway.lock");
    expect(s.profile).toBe("work");
  });
});

describe("stowawayHome", () => {
  it("defaults to ~/.config/stowaway", () => {
    expect(stowawayHome({})).toBe(join(homedir(), ".config", "stowaway"));
  });

  it("respects STOWAWAY_HOME", () => {
    expect(stowawayHome({ STOWAWAY_HOME: "/tmp/fake-home" })).toBe("/tmp/fake-home");
  });
});

describe("isInsideGitRepo", () => {
  let tempDir: string;

  afterEach(() => {
    if (tempDir) rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns true when .git exists in dir", () => {
    tempDir = mkdtempSync(join(tmpdir(), "scope-test-"));
    mkdirSync(join(tempDir, ".git"));
    expect(isInsideGitRepo(tempDir)).toBe(true);
  });

  it("returns true when .git exists in a parent", () => {
    tempDir = mkdtempSync(join(tmpdir(), "scope-test-"));
    mkdirSync(join(tempDir, ".git"));
    const child = join(tempDir, "sub", "deep");
    mkdirSync(child, { recursive: true });
    expect(isInsideGitRepo(child)).toBe(true);
  });
});

describe("resolveDefaultScope", () => {
  let tempDir: string;

  afterEach(() => {
    if (tempDir) rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns project scope when stowaway.toml exists", () => {
    tempDir = mkdtempSync(join(tmpdir(), "scope-test-"));
    writeFileSync(join(tempDir, "stowaway.toml"), "");
    const s = resolveDefaultScope(tempDir);
    expect(s.scope).toBe("project");
    expect(s.root).toBe(tempDir);
  });

  it("throws ScopeError pointing at init and ghost mode inside a git repo", () => {
    tempDir = mkdtempSync(join(tmpdir(), "scope-test-"));
    mkdirSync(join(tempDir, ".git"));
    expect(() => resolveDefaultScope(tempDir)).toThrow(ScopeError);
    expect(() => resolveDefaultScope(tempDir)).toThrow(/stowaway ghost run/);
  });
});
