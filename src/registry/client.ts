import type { ZodSafeParseResult } from "zod/v4";
import type { Registry } from "../config/schema.js";
import { FileNotFoundError, RegistryUnavailableError } from "./errors.js";
import { discoverySchema, indexSchema, manifestFor, packumentSchema } from "./schema.js";
import type { ComponentManifest, ComponentSummary, Discovery, Packument } from "./schema.js";
import { selectVersion } from "./versions.js";

export const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface RegistryClientOptions {
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  timeoutMs?: number;
}

export interface RegistryClient {
  fetchIndex(registry: Registry): Promise<ComponentSummary[]>;
  fetchPackument(registry: Registry, name: string): Promise<Packument>;
  /** Highest version of `name` satisfying `constraint` ("*" for latest). */
  fetchManifest(registry: Registry, name: string, constraint: string): Promise<ComponentManifest>;
  fetchFile(registry: Registry, name: string, path: string): Promise<Uint8Array>;
  /** The optional `/.well-known/ocx.json` document, or null when the registry has none. */
  fetchDiscovery(registry: Registry): Promise<Discovery | null>;
}

/**
 * Read-only client for the registry HTTP protocol.
 *
 * Every request has a bounded timeout and nothing is retried: a failed
 * request surfaces as RegistryUnavailableError (or FileNotFoundError for
 * file fetches) and the caller decides what to do.
 */
export function createRegistryClient(options: RegistryClientOptions = {}): RegistryClient {
  const doFetch: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  async function request(registry: Registry, path: string): Promise<Response> {
    const url = `${registry.baseUrl}${path}`;
    if (!url.startsWith("https://")) {
      throw new RegistryUnavailableError(registry.name, `refusing to fetch ${url} over an unencrypted connection`);
    }

    try {
      return await doFetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      const reason = err instanceof Error && err.name === "TimeoutError"
        ? `timed out after ${timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      throw new RegistryUnavailableError(registry.name, `GET ${url} failed: ${reason}`);
    }
  }

  async function getJson(registry: Registry, path: string): Promise<unknown> {
    const response = await request(registry, path);
    if (!response.ok) {
      throw new RegistryUnavailableError(registry.name, `GET ${path} returned ${response.status}`);
    }
    return readJson(registry, path, response);
  }

  const client: RegistryClient = {
    async fetchIndex(registry) {
      const path = "/index.json";
      return validated(registry, path, indexSchema.safeParse(await getJson(registry, path)));
    },

    async fetchPackument(registry, name) {
      const path = `/components/${encodeURIComponent(name)}.json`;
      return validated(registry, path, packumentSchema.safeParse(await getJson(registry, path)));
    },

    async fetchManifest(registry, name, constraint) {
      const packument = await client.fetchPackument(registry, name);
      const version = selectVersion(Object.keys(packument.versions), [constraint], registry.pinnedVersion);
      const manifest = version !== null ? manifestFor(packument, version) : null;
      if (!manifest) {
        const pinned = registry.pinnedVersion !== undefined ? ` (registry pinned to ${registry.pinnedVersion})` : "";
        throw new FileNotFoundError(registry.name, name, `No version of "${registry.name}/${name}" matches ${constraint}${pinned}`);
      }
      return manifest;
    },

    async fetchFile(registry, name, path) {
      const encoded = path.split("/").map(encodeURIComponent).join("/");
      const response = await request(registry, `/components/${encodeURIComponent(name)}/${encoded}`);
      if (!response.ok) {
        throw new FileNotFoundError(
          registry.name,
          name,
          `File "${path}" of "${registry.name}/${name}" not found (HTTP ${response.status})`,
          path,
        );
      }
      return new Uint8Array(await response.arrayBuffer());
    },

    async fetchDiscovery(registry) {
      const path = "/.well-known/ocx.json";
      const response = await request(registry, path);
      if (response.status === 404) return null;
      if (!response.ok) {
        throw new RegistryUnavailableError(registry.name, `GET ${path} returned ${response.status}`);
      }
      return validated(registry, path, discoverySchema.safeParse(await readJson(registry, path, response)));
    },
  };

  return client;
}

async function readJson(registry: Registry, path: string, response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    throw new RegistryUnavailableError(registry.name, `GET ${path} returned malformed JSON`);
  }
}

function validated<T>(registry: Registry, path: string, result: ZodSafeParseResult<T>): T {
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new RegistryUnavailableError(registry.name, `GET ${path} returned an unexpected document: ${issues}`);
  }
  return result.data;
}
