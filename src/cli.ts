#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import dedent from "dedent";
import {
  loadConfig,
  resolveOutputDirectory,
  type AppConfig,
  type ConfigOverrides
} from "./config.js";
import { atLocalTime, formatLocalTime, parseDayKey, toDayKey } from "./dates.js";
import { describeError, logger, setLoggerConfig } from "./logger.js";
import { createCollaborators, createPipeline, runDaemon } from "./runner/daemon.js";
import type { PipelineResult } from "./runner/types.js";
import { checkTools } from "./tools.js";
import { createWindowOracle } from "./window.js";

type WindowOptions = {
  lat?: number;
  lon?: number;
  margin?: number;
  start?: string;
  end?: string;
};

type RunOptions = WindowOptions & {
  outputDirectory?: string;
  interval?: number;
  playlist?: string;
};

type AssembleOptions = {
  outputDirectory?: string;
  date: string;
  playlist?: string;
  json?: boolean;
};

const program: Command = new Command();
program
  .name("timelapse")
  .description(
    "Capture daylight timelapse frames on a fixed camera and assemble one 30 FPS video per day."
  )
  .version("0.1.0");

withWindowOptions(
  program
    .command("run")
    .description("Capture frames during the daylight window and build each day's videos")
    .option("-o, --output-directory <dir>", "Directory to save captured photos and videos (default: OUTPUT_DIRECTORY)")
    .option("-t, --interval <seconds>", "Time interval between photo captures in seconds", parsePositiveInt)
    .option("--playlist <name>", "Publish the timestamped video to this playlist")
).action(async (options: RunOptions) => {
  const config = loadBase({
    ...windowOverrides(options),
    intervalSeconds: options.interval,
    outputDirectory: options.outputDirectory,
    playlist: options.playlist
  });
  const directory = await requireDirectory(config, options.outputDirectory);
  await runDaemon(config, directory);
});

program
  .command("assemble")
  .description("Build the videos for one day from frames already on disk")
  .option("-o, --output-directory <dir>", "Directory holding the day's frames (default: OUTPUT_DIRECTORY)")
  .requiredOption("--date <YYYY-MM-DD>", "Day to assemble", parseDate)
  .option("--playlist <name>", "Publish the timestamped video to this playlist")
  .option("--json", "JSON output")
  .action(async (options: AssembleOptions) => {
    const config = loadBase({
      outputDirectory: options.outputDirectory,
      playlist: options.playlist
    });
    const directory = await requireDirectory(config, options.outputDirectory);
    const pipeline = createPipeline(config, createCollaborators(config), logger.withContext({ directory }));
    const result = await pipeline.run(options.date, directory);
    printPipelineResult(result, Boolean(options.json));
    if (!result.success) {
      process.exitCode = 2;
    }
  });

withWindowOptions(
  program
    .command("window")
    .description("Print the capture window for a day")
    .option("--date <YYYY-MM-DD>", "Day to resolve (default: today)", parseDate)
).action((options: WindowOptions & { date?: string }) => {
  const config = loadBase(windowOverrides(options));
  const day = options.date ?? toDayKey(new Date());
  const window = createWindowOracle(config.window).windowFor(atLocalTime(day, 12, 0));
  console.log(dedent`
    date:   ${window.day}
    source: ${window.source}
    start:  ${formatLocalTime(window.start)}
    end:    ${formatLocalTime(window.end)}
  `);
});

program
  .command("check")
  .description("Verify the capture, encoder and upload tools can be started")
  .option("--playlist <name>", "Also check the upload tool")
  .action(async (options: { playlist?: string }) => {
    const config = loadBase({ playlist: options.playlist });
    const results = await checkTools(config);
    for (const result of results) {
      const status = result.available ? "ok" : `missing (${result.error ?? "unknown error"})`;
      console.log(`${result.role.padEnd(8)} ${result.command}: ${status}`);
    }
    if (results.some((result) => !result.available)) {
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error) => {
  logger.error("cli.failed", { error: describeError(error) });
  process.exitCode = 1;
});

function loadBase(overrides: ConfigOverrides): AppConfig {
  let config: AppConfig;
  try {
    config = loadConfig(overrides);
  } catch (error) {
    program.error(describeError(error));
  }
  setLoggerConfig({
    level: config.logging.level,
    includeTimings: config.logging.includeTimings,
    format: config.logging.format,
    color: config.logging.color,
    timeZone: config.logging.timeZone
  });
  return config;
}

async function requireDirectory(config: AppConfig, fromCli?: string) {
  try {
    return await resolveOutputDirectory(config, fromCli);
  } catch (error) {
    program.error(describeError(error));
  }
}

function withWindowOptions(command: Command) {
  return command
    .option("--lat <degrees>", "Latitude; switches to sunrise/sunset window", parseNumber)
    .option("--lon <degrees>", "Longitude; switches to sunrise/sunset window", parseNumber)
    .option("--margin <minutes>", "Minutes before sunrise and after sunset", parseNonNegativeInt)
    .option("--start <HH:MM>", "Fixed window start")
    .option("--end <HH:MM>", "Fixed window end");
}

function windowOverrides(options: WindowOptions): ConfigOverrides {
  const astronomical = options.lat !== undefined || options.lon !== undefined;
  const fixed = options.start !== undefined || options.end !== undefined;
  if (astronomical && fixed) {
    program.error("Use either --lat/--lon or --start/--end, not both.");
  }
  return {
    windowMode: astronomical ? "astronomical" : fixed ? "fixed" : undefined,
    latitude: options.lat,
    longitude: options.lon,
    marginMinutes: options.margin,
    windowStart: options.start,
    windowEnd: options.end
  };
}

function printPipelineResult(result: PipelineResult, json: boolean) {
  if (json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }
  const lines = [
    `day: ${result.day}`,
    `status: ${result.status}`,
    `frames: ${result.frameCount}`
  ];
  for (const profile of result.profiles) {
    lines.push(`${profile.id}: ${profile.outcome} (publish: ${profile.publish}) ${profile.outputPath}`);
  }
  lines.push(`success: ${result.success}`);
  lines.push(`framesDeleted: ${result.framesDeleted}`);
  console.log(lines.join("\n"));
}

function parseDate(value: string) {
  try {
    return parseDayKey(value);
  } catch (error) {
    throw new InvalidArgumentError(describeError(error));
  }
}

function parseNumber(value: string) {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

function parsePositiveInt(value: string) {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer: ${value}`);
  }
  return parsed;
}

function parseNonNegativeInt(value: string) {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer: ${value}`);
  }
  return parsed;
}
