import type { Registry } from "../config/schema.js";
import { FileNotFoundError } from "../registry/errors.js";
import type { RegistryClient } from "../registry/client.js";
import { manifestFor } from "../registry/schema.js";
import type { ComponentManifest, ComponentSummary, Packument } from "../registry/schema.js";
import { selectVersion } from "../registry/versions.js";
import { CyclicDependencyError, InvalidIdentifierError, UnsatisfiableVersionError } from "./errors.js";
import type { Constraint } from "./errors.js";
import { componentId, formatRequest, parseIdentifier } from "./identifier.js";
import type { ComponentRequest } from "./identifier.js";

/** Re-selection passes before giving up on constraints that keep shifting. */
const MAX_PASSES = 10;

export interface PlanEntry {
  /** `registry/name` */
  id: string;
  registry: Registry;
  name: string;
  version: string;
  manifest: ComponentManifest;
  /** Dependents that pulled this entry in; empty for direct requests */
  requestedBy: string[];
}

export interface ResolveOptions {
  /** Configured registries in priority order */
  registries: Registry[];
  client: RegistryClient;
}

interface Target {
  id: string;
  registry: Registry;
  name: string;
}

interface Selection extends Target {
  version: string;
  manifest: ComponentManifest;
}

/**
 * Compute an install plan for the requested components.
 *
 * Manifests are fetched depth-first from the requested set, visiting roots
 * and dependencies in identifier order. The plan is the post-order of that
 * walk, so dependencies come before their dependents and identical inputs
 * give identical plans. Only metadata is fetched: nothing is downloaded
 * until the plan is installed.
 *
 * Every component gets the highest version satisfying all ranges imposed on
 * it. When a later dependent narrows a component that was already selected,
 * the walk runs again with the narrower constraints until the selection is
 * stable.
 */
export async function resolve(
  requests: (string | ComponentRequest)[],
  opts: ResolveOptions,
): Promise<PlanEntry[]> {
  const registries = new Map(opts.registries.map((r) => [r.name, r]));
  const indexes = new Map<string, Promise<ComponentSummary[]>>();
  const packuments = new Map<string, Promise<Packument>>();

  function indexOf(registry: Registry): Promise<ComponentSummary[]> {
    let index = indexes.get(registry.name);
    if (!index) {
      index = opts.client.fetchIndex(registry);
      indexes.set(registry.name, index);
    }
    return index;
  }

  function packumentOf(target: Target): Promise<Packument> {
    let packument = packuments.get(target.id);
    if (!packument) {
      packument = opts.client.fetchPackument(target.registry, target.name);
      packuments.set(target.id, packument);
    }
    return packument;
  }

  async function locate(request: ComponentRequest, raw: string): Promise<Target> {
    if (request.registry !== undefined) {
      const registry = registries.get(request.registry);
      if (!registry) {
        throw new InvalidIdentifierError(raw, `Unknown registry "${request.registry}" in "${raw}"`);
      }
      return { id: componentId(registry.name, request.name), registry, name: request.name };
    }

    // Priority order: the first registry that lists the name wins.
    for (const registry of opts.registries) {
      const index = await indexOf(registry);
      if (index.some((c) => c.name === request.name)) {
        return { id: componentId(registry.name, request.name), registry, name: request.name };
      }
    }
    throw new FileNotFoundError(
      opts.registries.map((r) => r.name).join(", "),
      request.name,
      `Component "${request.name}" was not found in any configured registry`,
    );
  }

  async function locateAll(raws: (string | ComponentRequest)[]): Promise<{ target: Target; range: string }[]> {
    const located: { target: Target; range: string }[] = [];
    for (const raw of raws) {
      const request = typeof raw === "string" ? parseIdentifier(raw) : raw;
      const label = typeof raw === "string" ? raw : formatRequest(request);
      located.push({ target: await locate(request, label), range: request.range });
    }
    return located.sort((a, b) => compareIds(a.target.id, b.target.id));
  }

  const roots = await locateAll(requests);
  let seeded = new Map<string, Constraint[]>();

  for (let pass = 0; pass < MAX_PASSES; pass++) {
    const imposed = new Map<string, Constraint[]>();
    const selections = new Map<string, Selection>();
    const dependents = new Map<string, string[]>();
    const order: string[] = [];
    const visiting: string[] = [];

    const impose = (id: string, constraint: Constraint) => {
      const list = imposed.get(id) ?? [];
      if (!list.some((c) => c.range === constraint.range && c.requestedBy === constraint.requestedBy)) {
        list.push(constraint);
      }
      imposed.set(id, list);
    };

    const visit = async (target: Target): Promise<void> => {
      const onStack = visiting.indexOf(target.id);
      if (onStack !== -1) {
        throw new CyclicDependencyError([...visiting.slice(onStack), target.id]);
      }
      if (selections.has(target.id)) return;

      visiting.push(target.id);
      const packument = await packumentOf(target);
      const current = imposed.get(target.id) ?? [];
      const version = pickVersion(target, packument, [...(seeded.get(target.id) ?? []), ...current])
        ?? pickVersion(target, packument, current);
      const manifest = version !== null ? manifestFor(packument, version) : null;
      if (!manifest) {
        throw new UnsatisfiableVersionError(target.id, current);
      }

      const deps = await locateAll(manifest.dependencies);
      await Promise.all(deps.map(({ target: dep }) => packumentOf(dep)));

      for (const dep of deps) {
        impose(dep.target.id, { range: dep.range, requestedBy: target.id });
        dependents.set(dep.target.id, [...(dependents.get(dep.target.id) ?? []), target.id]);
        await visit(dep.target);
      }

      visiting.pop();
      selections.set(target.id, { ...target, version: manifest.version, manifest });
      order.push(target.id);
    };

    for (const { target, range } of roots) {
      impose(target.id, { range, requestedBy: null });
    }
    await Promise.all(roots.map(({ target }) => packumentOf(target)));
    for (const { target } of roots) {
      await visit(target);
    }

    // Stable once every selection already satisfies everything imposed on it.
    let stable = true;
    for (const selection of selections.values()) {
      const constraints = imposed.get(selection.id) ?? [];
      const packument = await packumentOf(selection);
      const best = pickVersion(selection, packument, constraints);
      if (best === null) {
        throw new UnsatisfiableVersionError(selection.id, constraints);
      }
      if (best !== selection.version) stable = false;
    }

    if (stable) {
      return order.flatMap((id) => {
        const selection = selections.get(id);
        if (!selection) return [];
        const requestedBy = [...new Set(dependents.get(id) ?? [])].sort(compareIds);
        return [{
          id,
          registry: selection.registry,
          name: selection.name,
          version: selection.version,
          manifest: selection.manifest,
          requestedBy,
        }];
      });
    }
    seeded = imposed;
  }

  const unstable = [...seeded.keys()].sort(compareIds)[0] ?? "";
  throw new UnsatisfiableVersionError(unstable, seeded.get(unstable) ?? []);
}

function pickVersion(target: Target, packument: Packument, constraints: Constraint[]): string | null {
  const ranges = constraints.length > 0 ? constraints.map((c) => c.range) : ["*"];
  return selectVersion(Object.keys(packument.versions), ranges, target.registry.pinnedVersion);
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
