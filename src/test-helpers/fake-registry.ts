import semver from "semver";
import type { ComponentType } from "../lockfile/schema.js";
import type { FetchLike } from "../registry/client.js";

export interface PublishOptions {
  description?: string;
  dependencies?: string[];
  /** source path -> file content; also replaces what the file endpoint serves */
  files?: Record<string, string>;
  /** source path -> install target override */
  targets?: Record<string, string>;
  config?: Record<string, unknown>;
}

interface PublishedVersion {
  description?: string;
  dependencies: string[];
  files: (string | { source: string; target: string })[];
  config?: Record<string, unknown>;
}

interface PublishedComponent {
  type: ComponentType;
  description: string;
  versions: Record<string, PublishedVersion>;
  contents: Map<string, string>;
}

/**
 * In-process stand-in for one registry. Serves the same routes as a real
 * registry through the fetch function returned by `fakeFetch`.
 */
export class FakeRegistry {
  readonly components = new Map<string, PublishedComponent>();
  readonly overrides = new Map<string, { status: number; body: string }>();
  discovery: Record<string, unknown> | null = null;

  constructor(readonly baseUrl: string) {}

  publish(name: string, type: ComponentType, version: string, opts: PublishOptions = {}): this {
    const component = this.components.get(name) ?? {
      type,
      description: opts.description ?? `${name} component`,
      versions: {},
      contents: new Map<string, string>(),
    };

    const files = opts.files ?? {};
    for (const [source, content] of Object.entries(files)) {
      component.contents.set(source, content);
    }

    component.versions[version] = {
      description: opts.description,
      dependencies: opts.dependencies ?? [],
      files: Object.keys(files).map((source) => {
        const target = opts.targets?.[source];
        return target !== undefined ? { source, target } : source;
      }),
      config: opts.config,
    };
    this.components.set(name, component);
    return this;
  }

  /** Answer `path` with a fixed status and body instead of the normal route. */
  respond(path: string, status: number, body = ""): this {
    this.overrides.set(path, { status, body });
    return this;
  }

  handle(path: string): Response {
    const override = this.overrides.get(path);
    if (override) return new Response(override.body, { status: override.status });

    if (path === "/index.json") {
      return json(
        [...this.components.entries()].map(([name, c]) => ({
          name,
          type: c.type,
          latestVersion: semver.rsort(Object.keys(c.versions))[0] ?? "0.0.0",
          description: c.description,
        })),
      );
    }

    if (path === "/.well-known/ocx.json") {
      return this.discovery ? json(this.discovery) : notFound();
    }

    const packument = /^\/components\/([^/]+)\.json$/.exec(path);
    if (packument?.[1] !== undefined) {
      const name = decodeURIComponent(packument[1]);
      const c = this.components.get(name);
      if (!c) return notFound();
      return json({ name, type: c.type, description: c.description, versions: c.versions });
    }

    const file = /^\/components\/([^/]+)\/(.+)$/.exec(path);
    if (file?.[1] !== undefined && file[2] !== undefined) {
      const content = this.components
        .get(decodeURIComponent(file[1]))
        ?.contents.get(file[2].split("/").map(decodeURIComponent).join("/"));
      return content !== undefined ? new Response(content) : notFound();
    }

    return notFound();
  }
}

export interface FakeFetch {
  fetch: FetchLike;
  /** Every URL requested, in order */
  requests: string[];
  /** Park every request until the returned function is called. */
  hold(): () => void;
}

export function fakeFetch(...registries: FakeRegistry[]): FakeFetch {
  const requests: string[] = [];
  let gate: Promise<void> | null = null;

  const fetch: FetchLike = async (url, init) => {
    requests.push(url);
    if (gate) await gate;
    init?.signal?.throwIfAborted();

    const registry = registries.find((r) => url.startsWith(`${r.baseUrl}/`));
    if (!registry) throw new TypeError(`fetch failed: no route to ${url}`);
    return registry.handle(url.slice(registry.baseUrl.length));
  };

  return {
    fetch,
    requests,
    hold() {
      let release: () => void = () => undefined;
      gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      return () => {
        gate = null;
        release();
      };
    },
  };
}

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

function notFound(): Response {
  return new Response("not found", { status: 404 });
}
