import type { DayKey } from "../dates.js";

export type ProfileOutcome = "skipped" | "failed" | "succeeded";

export type PublishOutcome = "not_requested" | "published" | "failed" | "timed_out";

export type ProfileResult = {
  id: string;
  outputPath: string;
  outcome: ProfileOutcome;
  exitCode?: number | null;
  publish: PublishOutcome;
};

export type PipelineResult = {
  day: DayKey;
  status: "no_frames" | "completed";
  frameCount: number;
  profiles: ProfileResult[];
  /** True only when every profile encoded fresh output. */
  success: boolean;
  framesDeleted: number;
};

export type DayState = "before_window" | "in_window" | "just_closed" | "already_closed";

export type CarryOverResult = {
  day: DayKey;
  pipeline?: PipelineResult;
  error?: string;
};

type TickAction =
  | { state: "before_window" | "already_closed"; action: "idle" }
  | { state: "in_window"; action: "capture"; framePath: string; ok: boolean; error?: string }
  | { state: "just_closed"; action: "close"; pipeline?: PipelineResult; error?: string }
  | { state: DayState; action: "aborted" };

export type TickResult = TickAction & {
  day: DayKey;
  /** Set when an earlier, never-closed day was assembled first. */
  carriedOver?: CarryOverResult;
};
