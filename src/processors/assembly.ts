import { setTimeout as delay } from "node:timers/promises";
import type { Publisher, VideoEncoder } from "../collaborators/types.js";
import type { DayKey } from "../dates.js";
import { deleteFrames, fileExists, listDayFrames } from "../frames.js";
import { describeError, silentLogger, withDuration, type ContextLogger } from "../logger.js";
import { describeCommand, succeeded } from "../process.js";
import type { EncodeProfile } from "../profiles.js";
import type { PipelineResult, ProfileOutcome, ProfileResult, PublishOutcome } from "../runner/types.js";

export type AssemblyDeps = {
  encoder: VideoEncoder;
  encoderCommand: string;
  profiles: (directory: string, day: DayKey) => EncodeProfile[];
  /** Both must be set for any upload to happen. */
  publisher?: Publisher;
  playlist?: string;
  settleMs: number;
  sleep?: (ms: number) => Promise<unknown>;
  logger?: ContextLogger;
};

export type AssemblyPipeline = {
  run: (day: DayKey, directory: string) => Promise<PipelineResult>;
};

export function createAssemblyPipeline(deps: AssemblyDeps): AssemblyPipeline {
  const sleep = deps.sleep ?? delay;
  const log = deps.logger ?? silentLogger;

  async function runProfile(profile: EncodeProfile): Promise<ProfileResult> {
    if (await fileExists(profile.outputPath)) {
      log.warn("pipeline.profile.skipped", {
        profile: profile.id,
        reason: "Output video already exists, will not overwrite",
        outputPath: profile.outputPath
      });
      return { id: profile.id, outputPath: profile.outputPath, outcome: "skipped", publish: "not_requested" };
    }

    const encodeStart = Date.now();
    log.info("pipeline.profile.encode.start", {
      profile: profile.id,
      outputPath: profile.outputPath,
      command: describeCommand({ command: deps.encoderCommand, args: [...profile.args] })
    });

    let outcome: ProfileOutcome;
    let exitCode: number | null = null;
    try {
      const result = await deps.encoder.encode(profile);
      exitCode = result.exitCode;
      outcome = succeeded(result) ? "succeeded" : "failed";
      if (outcome === "failed") {
        log.error("pipeline.profile.encode.failed", {
          profile: profile.id,
          exitCode: result.exitCode,
          signal: result.signal,
          stderr: result.stderr || undefined
        });
      }
    } catch (error) {
      outcome = "failed";
      log.error("pipeline.profile.encode.failed", {
        profile: profile.id,
        error: describeError(error)
      });
    }

    if (outcome === "succeeded") {
      log.info("pipeline.profile.encode.done", {
        profile: profile.id,
        outputPath: profile.outputPath,
        ...withDuration(encodeStart)
      });
    }

    const publish =
      outcome === "succeeded" ? await publishProfile(profile) : "not_requested";
    return { id: profile.id, outputPath: profile.outputPath, outcome, exitCode, publish };
  }

  async function publishProfile(profile: EncodeProfile): Promise<PublishOutcome> {
    if (!profile.uploadTitle || !deps.publisher || !deps.playlist) {
      return "not_requested";
    }
    const publishStart = Date.now();
    log.info("publish.start", {
      profile: profile.id,
      title: profile.uploadTitle,
      playlist: deps.playlist,
      videoPath: profile.outputPath
    });
    try {
      const result = await deps.publisher.publish({
        videoPath: profile.outputPath,
        title: profile.uploadTitle,
        playlist: deps.playlist
      });
      if (result.status === "published") {
        log.info("publish.done", { profile: profile.id, ...withDuration(publishStart) });
      } else {
        log.warn("publish.failed", {
          profile: profile.id,
          status: result.status,
          reason: result.status === "failed" ? result.reason : undefined,
          ...withDuration(publishStart)
        });
      }
      return result.status;
    } catch (error) {
      log.warn("publish.failed", { profile: profile.id, error: describeError(error) });
      return "failed";
    }
  }

  return {
    async run(day, directory) {
      const runStart = Date.now();
      const frames = await listDayFrames(directory, day);
      if (frames.length === 0) {
        log.info("pipeline.no_frames", { day, directory });
        return { day, status: "no_frames", frameCount: 0, profiles: [], success: false, framesDeleted: 0 };
      }

      log.info("pipeline.start", { day, frameCount: frames.length });

      // One profile at a time, in declared order.
      const profiles: ProfileResult[] = [];
      let aggregate: boolean | undefined;
      for (const profile of deps.profiles(directory, day)) {
        const result = await runProfile(profile);
        profiles.push(result);
        const ok = result.outcome === "succeeded";
        aggregate = aggregate === undefined ? ok : aggregate && ok;
      }

      const success = aggregate === true;
      let framesDeleted = 0;
      if (success && (await allExist(profiles.map((profile) => profile.outputPath)))) {
        await sleep(deps.settleMs);
        const toDelete = await listDayFrames(directory, day);
        log.info("pipeline.frames.delete.start", { day, count: toDelete.length });
        framesDeleted = await deleteFrames(toDelete);
        log.info("pipeline.frames.delete.done", { day, deleted: framesDeleted });
      } else {
        log.info("pipeline.frames.kept", {
          day,
          count: frames.length,
          outcomes: Object.fromEntries(profiles.map((profile) => [profile.id, profile.outcome]))
        });
      }

      log.info("pipeline.complete", { day, success, framesDeleted, ...withDuration(runStart) });
      return { day, status: "completed", frameCount: frames.length, profiles, success, framesDeleted };
    }
  };
}

async function allExist(paths: string[]) {
  for (const path of paths) {
    if (!(await fileExists(path))) return false;
  }
  return true;
}
