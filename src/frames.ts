import { access, readdir, unlink } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import { join } from "node:path";
import { compactDay, compactTimestamp, weekdayName, type DayKey } from "./dates.js";

// File names are shared with existing archives and uploaded playlists;
// they must not change shape.

export function frameFileName(capturedAt: Date) {
  return `IMG_${compactTimestamp(capturedAt)}.jpg`;
}

export function dayFramePrefix(day: DayKey) {
  return `IMG_${compactDay(day)}`;
}

/** Glob handed to the encoder; matches exactly what `listDayFrames` returns. */
export function framePattern(directory: string, day: DayKey) {
  return `${directory}/${dayFramePrefix(day)}*.jpg`;
}

export function plainVideoName(day: DayKey) {
  return `VID_${compactDay(day)}.mp4`;
}

export function timestampVideoName(day: DayKey) {
  return `VID_${compactDay(day)}_TS.mp4`;
}

export function uploadTitle(day: DayKey) {
  return `${day} ${weekdayName(day)}`;
}

export async function listDayFrames(directory: string, day: DayKey) {
  const prefix = dayFramePrefix(day);
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter(
      (entry) =>
        entry.isFile() && entry.name.startsWith(prefix) && entry.name.endsWith(".jpg")
    )
    .map((entry) => join(directory, entry.name))
    .sort();
}

export async function deleteFrames(paths: string[]) {
  let deleted = 0;
  for (const path of paths) {
    try {
      await unlink(path);
      deleted += 1;
    } catch (error) {
      if (isMissingFile(error)) continue;
      throw error;
    }
  }
  return deleted;
}

export async function fileExists(path: string) {
  try {
    await access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

function isMissingFile(error: unknown) {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
