import { describe, it, expect } from "vitest";
import { resolve } from "./resolver.js";
import { CyclicDependencyError, InvalidIdentifierError, UnsatisfiableVersionError } from "./errors.js";
import { FileNotFoundError } from "../registry/errors.js";
import { createRegistryClient } from "../registry/client.js";
import { FakeRegistry, fakeFetch } from "../test-helpers/fake-registry.js";
import type { Registry } from "../config/schema.js";

const kit: Registry = { name: "kit", baseUrl: "https://kit.example.com" };
const extra: Registry = { name: "extra", baseUrl: "https://extra.example.com" };

function libraryRegistry(): FakeRegistry {
  return new FakeRegistry(kit.baseUrl)
    .publish("lib", "tool", "1.2.0", { files: { "lib.md": "1.2" } })
    .publish("lib", "tool", "1.4.0", { files: { "lib.md": "1.4" } })
    .publish("lib", "tool", "1.6.0", { files: { "lib.md": "1.6" } })
    .publish("lib", "tool", "2.0.0", { files: { "lib.md": "2.0" } });
}

function clientFor(...registries: FakeRegistry[]) {
  const fake = fakeFetch(...registries);
  return { fake, client: createRegistryClient({ fetch: fake.fetch }) };
}

describe("resolve", () => {
  it("orders dependencies before dependents", async () => {
    const registry = new FakeRegistry(kit.baseUrl)
      .publish("app", "agent", "1.0.0", { dependencies: ["zlib", "base"], files: { "app.md": "app" } })
      .publish("zlib", "tool", "1.0.0", { dependencies: ["base"], files: { "zlib.md": "z" } })
      .publish("base", "tool", "1.0.0", { files: { "base.md": "b" } });
    const { client } = clientFor(registry);

    const plan = await resolve(["app"], { registries: [kit], client });
    expect(plan.map((e) => e.id)).toEqual(["kit/base", "kit/zlib", "kit/app"]);
    expect(plan.find((e) => e.id === "kit/base")?.requestedBy).toEqual(["kit/app", "kit/zlib"]);
    expect(plan.find((e) => e.id === "kit/app")?.requestedBy).toEqual([]);
  });

  it("is deterministic regardless of request order", async () => {
    const registry = new FakeRegistry(kit.baseUrl)
      .publish("a", "skill", "1.0.0", { dependencies: ["shared"], files: { "SKILL.md": "a" } })
      .publish("b", "skill", "1.0.0", { dependencies: ["shared"], files: { "SKILL.md": "b" } })
      .publish("shared", "tool", "1.0.0", { files: { "shared.md": "s" } });
    const { client } = clientFor(registry);

    const first = await resolve(["b", "a"], { registries: [kit], client });
    const second = await resolve(["a", "b"], { registries: [kit], client });
    expect(first.map((e) => `${e.id}@${e.version}`)).toEqual(["kit/shared@1.0.0", "kit/a@1.0.0", "kit/b@1.0.0"]);
    expect(second).toEqual(first);
  });

  it("includes bundles after the components they pull in", async () => {
    const registry = libraryRegistry().publish("starter", "bundle", "1.0.0", { dependencies: ["lib@^1"] });
    const { client } = clientFor(registry);

    const plan = await resolve(["starter"], { registries: [kit], client });
    expect(plan.map((e) => `${e.id}@${e.version}`)).toEqual(["kit/lib@1.6.0", "kit/starter@1.0.0"]);
    expect(plan[1]?.manifest.type).toBe("bundle");
  });

  it("rejects a cycle before fetching any file", async () => {
    const registry = new FakeRegistry(kit.baseUrl)
      .publish("a", "skill", "1.0.0", { dependencies: ["b"], files: { "SKILL.md": "a" } })
      .publish("b", "skill", "1.0.0", { dependencies: ["a"], files: { "SKILL.md": "b" } });
    const { client, fake } = clientFor(registry);

    const err = await resolve(["a"], { registries: [kit], client }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CyclicDependencyError);
    if (err instanceof CyclicDependencyError) {
      expect(err.cycle).toEqual(["kit/a", "kit/b", "kit/a"]);
      expect(err.message).toBe("Dependency cycle: kit/a -> kit/b -> kit/a");
    }
    expect(fake.requests.every((url) => url.endsWith(".json"))).toBe(true);
  });

  it("prefers the earlier registry for an unqualified name", async () => {
    const { client } = clientFor(
      libraryRegistry(),
      new FakeRegistry(extra.baseUrl).publish("lib", "tool", "9.0.0", { files: { "lib.md": "9" } }),
    );

    const [byKit] = await resolve(["lib"], { registries: [kit, extra], client });
    expect(byKit?.id).toBe("kit/lib");

    const [byExtra] = await resolve(["lib"], { registries: [extra, kit], client });
    expect(byExtra?.id).toBe("extra/lib");
    expect(byExtra?.version).toBe("9.0.0");
  });

  it("honours an explicit registry qualifier over priority", async () => {
    const { client } = clientFor(
      libraryRegistry(),
      new FakeRegistry(extra.baseUrl).publish("lib", "tool", "9.0.0", { files: { "lib.md": "9" } }),
    );

    const [entry] = await resolve(["extra/lib"], { registries: [kit, extra], client });
    expect(entry?.id).toBe("extra/lib");
  });

  it("intersects constraints from different dependents", async () => {
    const registry = libraryRegistry()
      .publish("app1", "agent", "1.0.0", { dependencies: ["lib@^1.0.0"], files: { "app1.md": "1" } })
      .publish("app2", "agent", "1.0.0", { dependencies: ["lib@<1.5.0"], files: { "app2.md": "2" } });
    const { client } = clientFor(registry);

    const plan = await resolve(["app1", "app2"], { registries: [kit], client });
    const lib = plan.find((e) => e.id === "kit/lib");
    expect(lib?.version).toBe("1.4.0");
    expect(lib?.requestedBy).toEqual(["kit/app1", "kit/app2"]);
    expect(plan.map((e) => e.id)).toEqual(["kit/lib", "kit/app1", "kit/app2"]);
  });

  it("fails with the constraint chain when the intersection is empty", async () => {
    const registry = libraryRegistry()
      .publish("app1", "agent", "1.0.0", { dependencies: ["lib@^1.0.0"], files: { "app1.md": "1" } })
      .publish("app2", "agent", "1.0.0", { dependencies: ["lib@^2.0.0"], files: { "app2.md": "2" } });
    const { client } = clientFor(registry);

    const err = await resolve(["app1", "app2"], { registries: [kit], client }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UnsatisfiableVersionError);
    if (err instanceof UnsatisfiableVersionError) {
      expect(err.component).toBe("kit/lib");
      expect(err.constraints).toEqual([
        { range: "^1.0.0", requestedBy: "kit/app1" },
        { range: "^2.0.0", requestedBy: "kit/app2" },
      ]);
    }
  });

  it("fails when a direct range matches nothing", async () => {
    const { client } = clientFor(libraryRegistry());
    await expect(resolve(["lib@^5"], { registries: [kit], client })).rejects.toThrow(UnsatisfiableVersionError);
  });

  it("only offers the pinned version of a pinned registry", async () => {
    const { client } = clientFor(libraryRegistry());
    const [entry] = await resolve(["lib"], { registries: [{ ...kit, pinnedVersion: "1.2.0" }], client });
    expect(entry?.version).toBe("1.2.0");
  });

  it("reports names no registry knows", async () => {
    const { client } = clientFor(libraryRegistry());
    await expect(resolve(["nope"], { registries: [kit], client })).rejects.toThrow(FileNotFoundError);
  });

  it("rejects unknown registry qualifiers", async () => {
    const { client } = clientFor(libraryRegistry());
    await expect(resolve(["other/lib"], { registries: [kit], client })).rejects.toThrow(InvalidIdentifierError);
  });
});
