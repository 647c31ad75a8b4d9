import { spawn } from "node:child_process";

export type CommandSpec = {
  command: string;
  args: string[];
  timeoutMs?: number;
};

export type CommandResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  /** Last few kilobytes of stderr, for log lines. */
  stderr: string;
};

export type CommandRunner = (spec: CommandSpec) => Promise<CommandResult>;

const STDERR_TAIL_BYTES = 4096;

/**
 * Spawns `command` with a structured argument list (no shell) and resolves
 * once it exits. Rejects only when the process cannot be started.
 */
export const runCommand: CommandRunner = (spec) =>
  new Promise((resolvePromise, rejectPromise) => {
    const child = spawn(spec.command, spec.args, {
      stdio: ["ignore", "ignore", "pipe"]
    });

    let stderr = "";
    let timedOut = false;
    const timer = spec.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          child.kill("SIGKILL");
        }, spec.timeoutMs)
      : undefined;

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL_BYTES);
    });

    child.once("error", (error) => {
      clearTimeout(timer);
      rejectPromise(new Error(`Failed to start ${spec.command}: ${error.message}`));
    });

    child.once("close", (exitCode, signal) => {
      clearTimeout(timer);
      resolvePromise({ exitCode, signal, timedOut, stderr: stderr.trim() });
    });
  });

export function succeeded(result: CommandResult) {
  return !result.timedOut && result.exitCode === 0;
}

export function describeCommand(spec: CommandSpec) {
  return [spec.command, ...spec.args]
    .map((part) => (/[\s'"]/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}
