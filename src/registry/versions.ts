import semver from "semver";

/**
 * Pick the highest version satisfying every range.
 * A pinned registry only ever offers its pinned version.
 * Returns null when nothing qualifies.
 */
export function selectVersion(available: string[], ranges: string[], pinnedVersion?: string): string | null {
  const candidates = pinnedVersion !== undefined
    ? available.filter((v) => v === pinnedVersion)
    : available;

  const matching = candidates.filter(
    (v) => semver.valid(v) !== null && ranges.every((range) => semver.satisfies(v, range)),
  );
  return matching.length > 0 ? semver.rsort(matching)[0] ?? null : null;
}

export function isValidRange(range: string): boolean {
  return semver.validRange(range) !== null;
}
