import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import type { FrameCapturer } from "./collaborators/types.js";
import { formatLocalTime, type DayKey } from "./dates.js";
import { frameFileName, listDayFrames } from "./frames.js";
import { describeError, silentLogger, withDuration, type ContextLogger } from "./logger.js";
import type { AssemblyPipeline } from "./processors/assembly.js";
import { withRetry } from "./retry.js";
import type { CarryOverResult, DayState, PipelineResult, TickResult } from "./runner/types.js";
import type { CaptureWindow, WindowOracle } from "./window.js";

export type SchedulerDeps = {
  directory: string;
  intervalSeconds: number;
  /** Pause between the window closing and assembly starting. */
  settleMs: number;
  oracle: WindowOracle;
  pipeline: AssemblyPipeline;
  capturer: FrameCapturer;
  captureRetry?: { retries: number; backoffMs: number };
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<unknown>;
  logger?: ContextLogger;
};

/**
 * In-memory only. A restart loses it, so a restart after the window closed
 * runs assembly again; existing videos are then skipped and frames kept.
 */
export type DaySession = {
  lastClosedDay?: DayKey;
  /** Day of the most recent capture attempt that has not been closed yet. */
  openDay?: DayKey;
};

export type CaptureScheduler = {
  readonly session: Readonly<DaySession>;
  tick: (signal?: AbortSignal) => Promise<TickResult>;
  run: (signal: AbortSignal) => Promise<void>;
};

/** Closed days win over everything; otherwise the clock decides. */
export function resolveDayState(
  now: Date,
  window: CaptureWindow,
  lastClosedDay?: DayKey
): DayState {
  if (window.day === lastClosedDay) return "already_closed";
  if (now.getTime() < window.start.getTime()) return "before_window";
  if (now.getTime() < window.end.getTime()) return "in_window";
  return "just_closed";
}

export function createCaptureScheduler(deps: SchedulerDeps): CaptureScheduler {
  const clock = deps.now ?? (() => new Date());
  const sleep =
    deps.sleep ?? ((ms: number, signal?: AbortSignal) => delay(ms, undefined, { signal }));
  const log = deps.logger ?? silentLogger;
  const session: DaySession = {};

  async function capture(now: Date) {
    const framePath = join(deps.directory, frameFileName(now));
    const captureStart = Date.now();
    try {
      await withRetry(() => deps.capturer.capture(framePath), {
        retries: deps.captureRetry?.retries ?? 0,
        backoffMs: deps.captureRetry?.backoffMs ?? 1000,
        sleep: (ms) => sleep(ms),
        onRetry: (attempt, error) =>
          log.warn("capture.retry", { attempt, framePath, error: describeError(error) })
      });
      log.info("capture.done", {
        at: formatLocalTime(now),
        framePath,
        ...withDuration(captureStart)
      });
      return { framePath, ok: true };
    } catch (error) {
      const message = describeError(error);
      log.error("capture.failed", { framePath, error: message });
      return { framePath, ok: false, error: message };
    }
  }

  /** Runs assembly for `day` if it has frames, then marks it closed no matter what. */
  async function closeDay(day: DayKey): Promise<{ pipeline?: PipelineResult; error?: string }> {
    try {
      const frames = await listDayFrames(deps.directory, day);
      if (frames.length === 0) {
        log.info("day.closed", { day, frameCount: 0 });
        return {};
      }
      log.info("day.close.start", { day, frameCount: frames.length });
      await sleep(deps.settleMs);
      const pipeline = await deps.pipeline.run(day, deps.directory);
      log.info("day.closed", { day, success: pipeline.success, framesDeleted: pipeline.framesDeleted });
      return { pipeline };
    } catch (error) {
      const message = describeError(error);
      log.error("day.close.failed", { day, error: message });
      return { error: message };
    } finally {
      session.lastClosedDay = day;
      if (session.openDay === day) session.openDay = undefined;
    }
  }

  async function closeCarriedOverDay(today: DayKey): Promise<CarryOverResult | undefined> {
    const pending = session.openDay;
    if (!pending || pending === today || pending === session.lastClosedDay) {
      return undefined;
    }
    log.warn("day.carry_over", { day: pending, today });
    return { day: pending, ...(await closeDay(pending)) };
  }

  async function tick(signal?: AbortSignal): Promise<TickResult> {
    const now = clock();
    const window = deps.oracle.windowFor(now);
    const day = window.day;
    // Stopping: start no capture or assembly, including a carried-over day.
    if (signal?.aborted) {
      return { day, state: resolveDayState(now, window, session.lastClosedDay), action: "aborted" };
    }
    const carriedOver = await closeCarriedOverDay(day);
    const state = resolveDayState(now, window, session.lastClosedDay);

    if (state === "before_window" || state === "already_closed") {
      return { day, state, action: "idle", carriedOver };
    }
    if (state === "in_window") {
      session.openDay = day;
      return { day, state, action: "capture", ...(await capture(now)), carriedOver };
    }
    return { day, state, action: "close", ...(await closeDay(day)), carriedOver };
  }

  async function run(signal: AbortSignal) {
    const intervalMs = deps.intervalSeconds * 1000;
    log.info("scheduler.start", {
      directory: deps.directory,
      intervalSeconds: deps.intervalSeconds
    });
    while (!signal.aborted) {
      await tick(signal);
      try {
        await sleep(intervalMs, signal);
      } catch (error) {
        if (signal.aborted) break;
        throw error;
      }
    }
    log.info("scheduler.stop", { lastClosedDay: session.lastClosedDay ?? null });
  }

  return { session, tick, run };
}
