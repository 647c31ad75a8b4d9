import type { AppConfig } from "./config.js";
import { describeError } from "./logger.js";
import { runCommand, type CommandRunner } from "./process.js";

export type ToolCheck = {
  role: "capture" | "encoder" | "publish";
  command: string;
  available: boolean;
  error?: string;
};

const versionFlags: Record<ToolCheck["role"], string> = {
  capture: "--version",
  encoder: "-version",
  publish: "--version"
};

/**
 * Spawns each external tool once with its version flag. Only a failure to
 * start counts as missing; the exit status is not inspected.
 */
export async function checkTools(
  config: Pick<AppConfig, "capture" | "encoder" | "publish">,
  runner: CommandRunner = runCommand
): Promise<ToolCheck[]> {
  const tools: { role: ToolCheck["role"]; command: string }[] = [
    { role: "capture", command: config.capture.command },
    { role: "encoder", command: config.encoder.command }
  ];
  if (config.publish.playlist) {
    tools.push({ role: "publish", command: config.publish.command });
  }

  const results: ToolCheck[] = [];
  for (const tool of tools) {
    try {
      await runner({ command: tool.command, args: [versionFlags[tool.role]], timeoutMs: 10_000 });
      results.push({ ...tool, available: true });
    } catch (error) {
      results.push({ ...tool, available: false, error: describeError(error) });
    }
  }
  return results;
}
