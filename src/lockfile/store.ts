import { loadLockfile } from "./loader.js";
import { writeLockfile } from "./writer.js";
import { emptyLockfile } from "./schema.js";
import type { Lockfile, LockEntry } from "./schema.js";

export class PathConflictError extends Error {
  constructor(
    public readonly path: string,
    public readonly owner: string,
    public readonly claimant: string,
  ) {
    super(
      `${path} is already installed by "${owner}", so "${claimant}" cannot install it. ` +
        `Pass --overwrite to let "${claimant}" take it over.`,
    );
    this.name = "PathConflictError";
  }
}

/**
 * The persisted record of installed components.
 *
 * Every mutation reads the current document, applies the change and replaces
 * the file atomically, so an interrupted operation leaves the previous
 * consistent lockfile behind. Callers serialize mutations with the operation
 * lock (see utils/lock.ts).
 */
export interface IntegrityStore {
  readonly lockPath: string;
  get(id: string): Promise<LockEntry | null>;
  allEntries(): Promise<LockEntry[]>;
  record(entry: LockEntry): Promise<void>;
  /** Record several entries in one atomic write. */
  recordAll(entries: LockEntry[]): Promise<void>;
  remove(id: string): Promise<void>;
}

export function openIntegrityStore(lockPath: string): IntegrityStore {
  async function read(): Promise<Lockfile> {
    return (await loadLockfile(lockPath)) ?? emptyLockfile();
  }

  async function recordAll(entries: LockEntry[]): Promise<void> {
    const lockfile = await read();
    for (const { id, ...locked } of entries) {
      lockfile.installed[id] = locked;
    }
    assertUniquePaths(lockfile, entries);
    await writeLockfile(lockPath, lockfile);
  }

  return {
    lockPath,

    async get(id) {
      const locked = (await read()).installed[id];
      return locked ? { id, ...locked } : null;
    },

    async allEntries() {
      const { installed } = await read();
      return Object.keys(installed)
        .sort()
        .flatMap((id) => {
          const locked = installed[id];
          return locked ? [{ id, ...locked }] : [];
        });
    },

    record: (entry) => recordAll([entry]),

    recordAll,

    async remove(id) {
      const lockfile = await read();
      if (!(id in lockfile.installed)) return;
      delete lockfile.installed[id];
      await writeLockfile(lockPath, lockfile);
    },
  };
}

/**
 * No two components may claim the same installed path.
 * Checked before anything is written, blaming the entry being recorded.
 */
function assertUniquePaths(lockfile: Lockfile, recorded: LockEntry[]): void {
  const owners = new Map<string, string>();
  const claimants = new Set(recorded.map((e) => e.id));
  // Visit untouched entries first so the conflict names the existing owner.
  const ids = Object.keys(lockfile.installed).sort((a, b) => Number(claimants.has(a)) - Number(claimants.has(b)));

  for (const id of ids) {
    for (const path of lockfile.installed[id]?.installed_files ?? []) {
      const owner = owners.get(path);
      if (owner !== undefined && owner !== id) {
        throw new PathConflictError(path, owner, id);
      }
      owners.set(path, id);
    }
  }
}
