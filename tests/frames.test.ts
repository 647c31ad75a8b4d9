import { readdir, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  atLocalTime,
  compactTimestamp,
  parseDayKey,
  toDayKey,
  weekdayName
} from "../src/dates.js";
import {
  deleteFrames,
  fileExists,
  frameFileName,
  framePattern,
  listDayFrames,
  plainVideoName,
  timestampVideoName,
  uploadTitle
} from "../src/frames.js";
import { createTempDir, removeTempDir, writeFrames } from "./helpers/fixtures.js";

describe("dates", () => {
  it("formats local days and timestamps", () => {
    const date = new Date(2024, 0, 2, 3, 4, 5);

    expect(toDayKey(date)).toBe("2024-01-02");
    expect(compactTimestamp(date)).toBe("20240102030405");
    expect(atLocalTime("2024-01-02", 3, 4, 5)).toEqual(date);
  });

  it("accepts real calendar days only", () => {
    expect(parseDayKey("2024-02-29")).toBe("2024-02-29");
    expect(() => parseDayKey("2023-02-29")).toThrow("Invalid date: 2023-02-29 (no such calendar day).");
    expect(() => parseDayKey("11/05/2024")).toThrow("Invalid date: 11/05/2024 (expected YYYY-MM-DD).");
  });

  it("names the weekday", () => {
    expect(weekdayName("2024-05-11")).toBe("Saturday");
    expect(weekdayName("2024-05-13")).toBe("Monday");
  });
});

describe("file names", () => {
  it("derives frame and video names from the local date", () => {
    expect(frameFileName(new Date(2024, 4, 11, 6, 5, 9))).toBe("IMG_20240511060509.jpg");
    expect(framePattern("/data/frames", "2024-05-11")).toBe("/data/frames/IMG_20240511*.jpg");
    expect(plainVideoName("2024-05-11")).toBe("VID_20240511.mp4");
    expect(timestampVideoName("2024-05-11")).toBe("VID_20240511_TS.mp4");
    expect(uploadTitle("2024-05-11")).toBe("2024-05-11 Saturday");
  });
});

describe("listDayFrames", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(directory);
  });

  it("returns the day's frames only, sorted", async () => {
    await writeFrames(directory, "20240511", 3);
    await writeFrames(directory, "20240512", 2);
    await writeFile(join(directory, "VID_20240511.mp4"), "mp4");
    await writeFile(join(directory, "IMG_20240511999999.png"), "png");
    await mkdir(join(directory, "IMG_20240511_dir.jpg"));

    const frames = await listDayFrames(directory, "2024-05-11");

    expect(frames).toEqual([
      join(directory, "IMG_20240511060000.jpg"),
      join(directory, "IMG_20240511060100.jpg"),
      join(directory, "IMG_20240511060200.jpg")
    ]);
  });
});

describe("deleteFrames", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(directory);
  });

  it("counts the files it removed and skips ones already gone", async () => {
    const names = await writeFrames(directory, "20240511", 2);
    const paths = [...names.map((name) => join(directory, name)), join(directory, "IMG_20240511235900.jpg")];

    const deleted = await deleteFrames(paths);

    expect(deleted).toBe(2);
    expect(await readdir(directory)).toEqual([]);
    expect(await fileExists(paths[0])).toBe(false);
  });
});
