import type { Profile } from "../profiles/store.js";
import { execInteractive } from "../utils/exec.js";
import { beginGhostSession, endGhostSession } from "./session.js";
import type { BeginOptions, GhostSession, SessionSummary } from "./session.js";

export interface RunOptions extends BeginOptions {
  /** Command and arguments; defaults to $SHELL */
  command?: string[];
  /** Called once the overlay exists, before the command starts */
  onBegin?: (session: GhostSession) => void;
}

export interface RunResult {
  exitCode: number;
  summary: SessionSummary;
}

/**
 * Run a command inside a ghost session and always end the session.
 * Ctrl-C goes to the child; this process keeps running to clean up.
 */
export async function runInGhostSession(profile: Profile, target: string, opts: RunOptions): Promise<RunResult> {
  const session = await beginGhostSession(profile, target, opts);
  opts.onBegin?.(session);

  const [cmd = process.env["SHELL"] ?? "sh", ...args] = opts.command ?? [];
  const ignoreInterrupt = () => undefined;
  process.on("SIGINT", ignoreInterrupt);

  let exitCode: number;
  try {
    exitCode = await execInteractive(cmd, args, { cwd: session.overlayDir, env: session.env });
  } catch (err) {
    await endGhostSession(session);
    throw err;
  } finally {
    process.off("SIGINT", ignoreInterrupt);
  }

  return { exitCode, summary: await endGhostSession(session) };
}
