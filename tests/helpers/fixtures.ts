import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CommandResult } from "../../src/process.js";

export async function createTempDir() {
  return mkdtemp(join(tmpdir(), "timelapse-test-"));
}

export async function removeTempDir(path: string) {
  await rm(path, { recursive: true, force: true });
}

/** Writes `count` frames for `compactDay` (YYYYMMDD), one minute apart from 06:00:00. */
export async function writeFrames(directory: string, compactDay: string, count: number) {
  const names: string[] = [];
  for (let i = 0; i < count; i += 1) {
    const name = `IMG_${compactDay}06${String(i).padStart(2, "0")}00.jpg`;
    await writeFile(join(directory, name), "jpeg");
    names.push(name);
  }
  return names;
}

export function commandResult(exitCode: number | null, extra: Partial<CommandResult> = {}): CommandResult {
  return { exitCode, signal: null, timedOut: false, stderr: "", ...extra };
}
