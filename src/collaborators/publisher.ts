import type { AppConfig } from "../config.js";
import { describeError } from "../logger.js";
import { runCommand, type CommandRunner } from "../process.js";
import type { Publisher } from "./types.js";

type PublishSettings = Pick<AppConfig["publish"], "command" | "privacy" | "timeoutMs">;

export function createCommandPublisher(
  settings: PublishSettings,
  runner: CommandRunner = runCommand
): Publisher {
  return {
    async publish({ videoPath, title, playlist }) {
      try {
        const result = await runner({
          command: settings.command,
          args: [
            `--title=${title}`,
            `--playlist=${playlist}`,
            `--privacy=${settings.privacy}`,
            videoPath
          ],
          timeoutMs: settings.timeoutMs
        });
        if (result.timedOut) return { status: "timed_out" };
        if (result.exitCode === 0) return { status: "published" };
        return {
          status: "failed",
          reason: result.stderr || `exit ${result.exitCode ?? result.signal}`
        };
      } catch (error) {
        return { status: "failed", reason: describeError(error) };
      }
    }
  };
}
