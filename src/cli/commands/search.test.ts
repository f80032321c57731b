import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { runSearch } from "./search.js";
import { runAdd } from "./add.js";
import { createRegistryClient } from "../../registry/client.js";
import type { RegistryClient } from "../../registry/client.js";
import { RegistryUnavailableError } from "../../registry/errors.js";
import { FakeRegistry, fakeFetch } from "../../test-helpers/fake-registry.js";
import { testWorkspace } from "../../test-helpers/workspace.js";
import type { Workspace } from "../workspace.js";

describe("runSearch", () => {
  let root: string;
  let kit: FakeRegistry;
  let extra: FakeRegistry;
  let workspace: Workspace;
  let client: RegistryClient;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "stowaway-search-"));
    kit = new FakeRegistry("https://kit.example.com")
      .publish("pdf", "skill", "1.0.0", { description: "Read PDF files", files: { "SKILL.md": "pdf" } })
      .publish("pdf", "skill", "1.2.0", { files: { "SKILL.md": "pdf" } })
      .publish("lint", "command", "0.3.0", { description: "Run the linter" });
    extra = new FakeRegistry("https://extra.example.com")
      .publish("docx", "skill", "2.0.0", { description: "Edit Word documents" });
    workspace = testWorkspace(root, [
      { name: "kit", baseUrl: kit.baseUrl },
      { name: "extra", baseUrl: extra.baseUrl },
    ]);
    client = createRegistryClient({ fetch: fakeFetch(kit, extra).fetch });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("matches names and descriptions without regard to case", async () => {
    const hits = await runSearch({ workspace, query: "PDF", client });
    expect(hits).toEqual([
      { id: "kit/pdf", registry: "kit", name: "pdf", type: "skill", version: "1.2.0", description: "Read PDF files" },
    ]);

    const byDescription = await runSearch({ workspace, query: "word", client });
    expect(byDescription.map((h) => h.id)).toEqual(["extra/docx"]);
  });

  it("lists every component in registry priority order without a query", async () => {
    const hits = await runSearch({ workspace, client });
    expect(hits.map((h) => h.id)).toEqual(["kit/pdf", "kit/lint", "extra/docx"]);
  });

  it("searches installed components with --installed", async () => {
    await runAdd({ workspace, ids: ["pdf@1.0.0"], client });

    const hits = await runSearch({ workspace, query: "pd", installed: true, client });
    expect(hits).toEqual([
      { id: "kit/pdf", registry: "kit", name: "pdf", type: "skill", version: "1.0.0", description: "" },
    ]);
    expect(await runSearch({ workspace, query: "lint", installed: true, client })).toEqual([]);
  });

  it("surfaces an unreachable registry", async () => {
    extra.respond("/index.json", 500);
    await expect(runSearch({ workspace, query: "pdf", client })).rejects.toThrow(RegistryUnavailableError);
  });
});
