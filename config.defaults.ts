import type { ConfigFile } from "./src/config.js";

export const defaultConfig: ConfigFile = {
  capture: {
    intervalSeconds: 30, // Seconds between frame captures
    command: "rpicam-still", // Still-capture binary (libcamera stack on Raspberry Pi OS)
    shutterMicros: 1500, // Fixed shutter speed in microseconds
    timeoutMs: 20000, // Upper bound for a single capture
    retries: 0, // Extra capture attempts within one tick
    retryBackoffMs: 1000, // Initial wait between capture attempts (doubles each retry)
  },
  window: {
    mode: "fixed", // "fixed" (start/end clock times) or "astronomical" (sunrise/sunset)
    start: "05:45", // Fixed window start, local time
    end: "19:00", // Fixed window end (exclusive), local time
    marginMinutes: 40, // Astronomical mode: minutes before sunrise and after sunset
  },
  encoder: {
    command: "ffmpeg", // Encoder binary
    frameRate: 30, // Output frames per second
    preset: "ultrafast", // libx264 preset
    fontSize: 30, // Timestamp overlay font size
  },
  publish: {
    command: "youtube-upload", // Upload CLI; only used when a playlist is configured
    privacy: "unlisted", // Visibility of uploaded videos
    timeoutMs: 600000, // Hard limit for one upload
  },
  pipeline: {
    settleMs: 2000, // Pause before assembling and before deleting frames
  },
  logging: {
    level: "info", // Log level: "debug", "info", "warn", "error"
    includeTimings: true, // Include execution time in log entries
    format: "pretty", // Log format: "pretty" (human-readable) or "json"
    color: true, // Enable colored output in terminal logs
  },
};
