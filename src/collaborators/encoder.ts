import type { AppConfig } from "../config.js";
import { runCommand, type CommandRunner } from "../process.js";
import type { VideoEncoder } from "./types.js";

export function createCommandEncoder(
  settings: Pick<AppConfig["encoder"], "command">,
  runner: CommandRunner = runCommand
): VideoEncoder {
  return {
    encode(profile) {
      return runner({ command: settings.command, args: [...profile.args] });
    }
  };
}
