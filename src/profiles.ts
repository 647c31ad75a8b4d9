import { join } from "node:path";
import type { AppConfig } from "./config.js";
import type { DayKey } from "./dates.js";
import {
  framePattern,
  plainVideoName,
  timestampVideoName,
  uploadTitle
} from "./frames.js";

export type EncodeProfile = {
  id: string;
  outputPath: string;
  /** Encoder arguments, output path last. */
  args: readonly string[];
  uploadTitle?: string;
};

type EncoderSettings = Pick<AppConfig["encoder"], "frameRate" | "preset" | "fontSize"> &
  Partial<Pick<AppConfig["encoder"], "fontFile">>;

/**
 * Profiles for one day, in the order they are encoded: the plain video
 * first, then the copy with the capture time burned in, which is the one
 * that gets published.
 */
export function buildProfiles(
  encoder: EncoderSettings,
  directory: string,
  day: DayKey
): EncodeProfile[] {
  const input = framePattern(directory, day);
  const plainPath = join(directory, plainVideoName(day));
  const timestampPath = join(directory, timestampVideoName(day));

  return [
    {
      id: "plain",
      outputPath: plainPath,
      args: [...baseArgs(encoder, input), plainPath]
    },
    {
      id: "timestamp",
      outputPath: timestampPath,
      args: [...baseArgs(encoder, input), "-vf", timestampFilter(encoder), timestampPath],
      uploadTitle: uploadTitle(day)
    }
  ];
}

function baseArgs(encoder: EncoderSettings, input: string) {
  return [
    "-n",
    "-framerate",
    String(encoder.frameRate),
    "-pattern_type",
    "glob",
    "-i",
    input,
    "-c:v",
    "libx264",
    "-preset",
    encoder.preset,
    "-pix_fmt",
    "yuv420p"
  ];
}

/** drawtext reading each frame's EXIF DateTime, centered near the bottom edge. */
export function timestampFilter(encoder: Pick<EncoderSettings, "fontFile" | "fontSize">) {
  const options = [
    encoder.fontFile ? `fontfile='${encoder.fontFile.replaceAll("'", "'\\''")}'` : undefined,
    `fontsize=${encoder.fontSize}`,
    "fontcolor=white",
    "text='%{metadata\\:DateTime\\:def_value}'",
    "x=(w-tw)/2",
    "y=h-(2*lh)"
  ].filter((option): option is string => option !== undefined);
  return `drawtext=${options.join(": ")}`;
}
