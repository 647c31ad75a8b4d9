import { describe, expect, it, vi } from "vitest";
import { createCommandCapturer } from "../src/collaborators/camera.js";
import { createCommandEncoder } from "../src/collaborators/encoder.js";
import { createCommandPublisher } from "../src/collaborators/publisher.js";
import { describeCommand, type CommandResult, type CommandSpec } from "../src/process.js";
import { checkTools } from "../src/tools.js";
import { loadConfig } from "../src/config.js";
import { commandResult } from "./helpers/fixtures.js";

function fakeRunner(result: CommandResult | Error = commandResult(0)) {
  return vi.fn(async (_spec: CommandSpec): Promise<CommandResult> => {
    if (result instanceof Error) throw result;
    return result;
  });
}

const cameraSettings = { command: "rpicam-still", shutterMicros: 1500, timeoutMs: 20000 };
const publishSettings = { command: "youtube-upload", privacy: "unlisted" as const, timeoutMs: 600000 };

describe("createCommandCapturer", () => {
  it("runs the still-capture command with a fixed shutter", async () => {
    const runner = fakeRunner();

    await createCommandCapturer(cameraSettings, runner).capture("/data/IMG_20240511060000.jpg");

    expect(runner).toHaveBeenCalledWith({
      command: "rpicam-still",
      args: ["-n", "-o", "/data/IMG_20240511060000.jpg", "--shutter", "1500", "--timeout", "1"],
      timeoutMs: 20000
    });
  });

  it("rejects with the exit status and stderr", async () => {
    const runner = fakeRunner(commandResult(1, { stderr: "no cameras available" }));

    await expect(createCommandCapturer(cameraSettings, runner).capture("/data/a.jpg")).rejects.toThrow(
      "rpicam-still exited with 1: no cameras available"
    );
  });

  it("rejects when the capture times out", async () => {
    const runner = fakeRunner(commandResult(null, { signal: "SIGKILL", timedOut: true }));

    await expect(createCommandCapturer(cameraSettings, runner).capture("/data/a.jpg")).rejects.toThrow(
      "rpicam-still timed out after 20000ms"
    );
  });

  it("passes through a failure to start", async () => {
    const runner = fakeRunner(new Error("Failed to start rpicam-still: spawn rpicam-still ENOENT"));

    await expect(createCommandCapturer(cameraSettings, runner).capture("/data/a.jpg")).rejects.toThrow(
      "Failed to start rpicam-still: spawn rpicam-still ENOENT"
    );
  });
});

describe("createCommandEncoder", () => {
  it("runs the encoder with the profile's arguments and returns its result", async () => {
    const runner = fakeRunner(commandResult(1));
    const encoder = createCommandEncoder({ command: "ffmpeg" }, runner);

    const result = await encoder.encode({
      id: "plain",
      outputPath: "/data/VID_20240511.mp4",
      args: ["-n", "-i", "/data/IMG_20240511*.jpg", "/data/VID_20240511.mp4"]
    });

    expect(result.exitCode).toBe(1);
    expect(runner).toHaveBeenCalledWith({
      command: "ffmpeg",
      args: ["-n", "-i", "/data/IMG_20240511*.jpg", "/data/VID_20240511.mp4"]
    });
  });
});

describe("createCommandPublisher", () => {
  const request = {
    videoPath: "/data/VID_20240511_TS.mp4",
    title: "2024-05-11 Saturday",
    playlist: "Test Playlist"
  };

  it("uploads with title, playlist and privacy flags", async () => {
    const runner = fakeRunner();

    const result = await createCommandPublisher(publishSettings, runner).publish(request);

    expect(result).toEqual({ status: "published" });
    expect(runner).toHaveBeenCalledWith({
      command: "youtube-upload",
      args: [
        "--title=2024-05-11 Saturday",
        "--playlist=Test Playlist",
        "--privacy=unlisted",
        "/data/VID_20240511_TS.mp4"
      ],
      timeoutMs: 600000
    });
  });

  it("reports a timeout", async () => {
    const runner = fakeRunner(commandResult(null, { signal: "SIGKILL", timedOut: true }));

    await expect(createCommandPublisher(publishSettings, runner).publish(request)).resolves.toEqual({
      status: "timed_out"
    });
  });

  it("reports a nonzero exit with stderr or the exit code", async () => {
    const withStderr = fakeRunner(commandResult(3, { stderr: "quota exceeded" }));
    const withoutStderr = fakeRunner(commandResult(3));

    await expect(createCommandPublisher(publishSettings, withStderr).publish(request)).resolves.toEqual({
      status: "failed",
      reason: "quota exceeded"
    });
    await expect(createCommandPublisher(publishSettings, withoutStderr).publish(request)).resolves.toEqual({
      status: "failed",
      reason: "exit 3"
    });
  });

  it("turns a failure to start into a failed result", async () => {
    const runner = fakeRunner(new Error("Failed to start youtube-upload: spawn youtube-upload ENOENT"));

    await expect(createCommandPublisher(publishSettings, runner).publish(request)).resolves.toEqual({
      status: "failed",
      reason: "Failed to start youtube-upload: spawn youtube-upload ENOENT"
    });
  });
});

describe("describeCommand", () => {
  it("quotes arguments containing spaces", () => {
    expect(
      describeCommand({ command: "youtube-upload", args: ["--title=2024-05-11 Saturday", "/data/v.mp4"] })
    ).toBe('youtube-upload "--title=2024-05-11 Saturday" /data/v.mp4');
  });
});

describe("checkTools", () => {
  it("checks capture and encoder, and the uploader only with a playlist", async () => {
    const runner = vi.fn(async (spec: CommandSpec): Promise<CommandResult> => {
      if (spec.command === "ffmpeg") throw new Error("Failed to start ffmpeg: spawn ffmpeg ENOENT");
      return commandResult(0);
    });

    const without = await checkTools(loadConfig({}, {}), runner);
    const withPlaylist = await checkTools(loadConfig({ playlist: "Test Playlist" }, {}), runner);

    expect(without).toEqual([
      { role: "capture", command: "rpicam-still", available: true },
      {
        role: "encoder",
        command: "ffmpeg",
        available: false,
        error: "Failed to start ffmpeg: spawn ffmpeg ENOENT"
      }
    ]);
    expect(withPlaylist.map((check) => check.role)).toEqual(["capture", "encoder", "publish"]);
    expect(runner).toHaveBeenCalledWith({ command: "ffmpeg", args: ["-version"], timeoutMs: 10000 });
    expect(runner).toHaveBeenCalledWith({ command: "youtube-upload", args: ["--version"], timeoutMs: 10000 });
  });
});
