import type { AppConfig } from "../config.js";
import { runCommand, succeeded, type CommandRunner } from "../process.js";
import type { FrameCapturer } from "./types.js";

type CameraSettings = Pick<AppConfig["capture"], "command" | "shutterMicros" | "timeoutMs">;

/**
 * Still capture through the libcamera CLI. `--timeout 1` skips the
 * preview warm-up; the fixed shutter keeps exposure steady across frames.
 */
export function createCommandCapturer(
  settings: CameraSettings,
  runner: CommandRunner = runCommand
): FrameCapturer {
  return {
    async capture(path) {
      const result = await runner({
        command: settings.command,
        args: [
          "-n",
          "-o",
          path,
          "--shutter",
          String(settings.shutterMicros),
          "--timeout",
          "1"
        ],
        timeoutMs: settings.timeoutMs
      });
      if (succeeded(result)) return;
      if (result.timedOut) {
        throw new Error(`${settings.command} timed out after ${settings.timeoutMs}ms`);
      }
      const detail = result.stderr ? `: ${result.stderr}` : "";
      throw new Error(`${settings.command} exited with ${result.exitCode ?? result.signal}${detail}`);
    }
  };
}
