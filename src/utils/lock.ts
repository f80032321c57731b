import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import lockfile from "proper-lockfile";

/** A lock older than this is considered abandoned by a crashed process. */
const STALE_MS = 30_000;

export class ConcurrentOperationError extends Error {
  constructor(
    message: string,
    public readonly lockPath: string,
  ) {
    super(message);
    this.name = "ConcurrentOperationError";
  }
}

export interface ExclusiveLock {
  /** Path the lock guards; the lock itself is a `<path>.lock` directory */
  path: string;
  release: () => Promise<void>;
}

/**
 * Take an exclusive, cross-process lock on `target`.
 * Never waits: contention fails immediately with ConcurrentOperationError.
 * `target` itself need not exist.
 */
export async function acquireExclusiveLock(target: string, operation: string): Promise<ExclusiveLock> {
  await mkdir(dirname(target), { recursive: true });

  let compromised: Error | null = null;
  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(target, {
      realpath: false,
      retries: 0,
      stale: STALE_MS,
      onCompromised: (err) => {
        compromised = err;
      },
    });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ELOCKED") {
      throw new ConcurrentOperationError(
        `Another ${operation} is already in progress (${target}.lock is held).`,
        target,
      );
    }
    throw err;
  }

  return {
    path: target,
    release: async () => {
      if (compromised) {
        throw new ConcurrentOperationError(
          `Lock on ${target} was lost during ${operation}: ${compromised.message}`,
          target,
        );
      }
      await release();
    },
  };
}

/**
 * Run `fn` while holding the exclusive lock on `target`.
 */
export async function withExclusiveLock<T>(
  target: string,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  const lock = await acquireExclusiveLock(target, operation);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
