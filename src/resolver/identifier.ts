import { NAME_PATTERN } from "../config/schema.js";
import { isValidRange } from "../registry/versions.js";
import { InvalidIdentifierError } from "./errors.js";

/** A parsed `[registry/]name[@range]` identifier. */
export interface ComponentRequest {
  registry?: string;
  name: string;
  /** semver range, "*" when none was given */
  range: string;
}

export function parseIdentifier(raw: string): ComponentRequest {
  const input = raw.trim();
  const at = input.indexOf("@", 1);
  const path = at === -1 ? input : input.slice(0, at);
  const range = at === -1 ? "*" : input.slice(at + 1).trim();

  const segments = path.split("/");
  if (segments.length > 2) {
    throw new InvalidIdentifierError(raw, `Invalid component identifier "${raw}": expected [registry/]name[@range]`);
  }
  const [first = "", second] = segments;
  const registry = second === undefined ? undefined : first;
  const name = second ?? first;

  for (const part of registry === undefined ? [name] : [registry, name]) {
    if (!NAME_PATTERN.test(part)) {
      throw new InvalidIdentifierError(raw, `Invalid component identifier "${raw}": "${part}" is not a valid name`);
    }
  }
  if (range === "" || !isValidRange(range)) {
    throw new InvalidIdentifierError(raw, `Invalid version range "${range}" in "${raw}"`);
  }

  return registry === undefined ? { name, range } : { registry, name, range };
}

export function componentId(registry: string, name: string): string {
  return `${registry}/${name}`;
}

export function formatRequest(request: ComponentRequest): string {
  const path = request.registry ? componentId(request.registry, request.name) : request.name;
  return request.range === "*" ? path : `${path}@${request.range}`;
}
