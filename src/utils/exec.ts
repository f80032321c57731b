import { spawn } from "node:child_process";

export class ExecError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
  ) {
    super(message);
    this.name = "ExecError";
  }
}

interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Run an interactive command attached to this terminal.
 * Resolves with the child's exit code, or 1 when it was killed by a signal.
 */
export function execInteractive(cmd: string, args: string[], opts?: ExecOptions): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      cwd: opts?.cwd,
      env: { ...process.env, ...opts?.env },
      stdio: "inherit",
    });
    child.on("error", (err) => {
      reject(new ExecError(`${cmd} failed to start: ${err.message}`, null));
    });
    child.on("close", (code) => {
      resolve(code ?? 1);
    });
  });
}
