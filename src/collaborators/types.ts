import type { EncodeProfile } from "../profiles.js";
import type { CommandResult } from "../process.js";

/** Writes one JPEG frame to `path`; rejects when no frame was written. */
export type FrameCapturer = {
  capture: (path: string) => Promise<void>;
};

export type VideoEncoder = {
  encode: (profile: EncodeProfile) => Promise<CommandResult>;
};

export type PublishRequest = {
  videoPath: string;
  title: string;
  playlist: string;
};

export type PublishResult =
  | { status: "published" }
  | { status: "failed"; reason: string }
  | { status: "timed_out" };

export type Publisher = {
  publish: (request: PublishRequest) => Promise<PublishResult>;
};
