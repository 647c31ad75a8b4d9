import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  formatTimestamp,
  getLoggerConfig,
  logger,
  setLogSink,
  setLoggerConfig,
  withDuration,
  type LoggerConfig,
  type LogLevel
} from "../src/logger.js";

describe("logger", () => {
  let lines: [LogLevel, string][];
  let saved: LoggerConfig;

  beforeEach(() => {
    saved = getLoggerConfig();
    lines = [];
    setLogSink((level, line) => lines.push([level, line]));
  });

  afterEach(() => {
    setLoggerConfig(saved);
    setLogSink();
  });

  it("writes one JSON object per entry", () => {
    setLoggerConfig({ format: "json", level: "info" });

    logger.info("capture.done", { framePath: "/data/a.jpg" });
    logger.info("scheduler.start");

    expect(lines).toHaveLength(2);
    const [level, line] = lines[0];
    expect(level).toBe("info");
    expect(JSON.parse(line)).toMatchObject({
      level: "info",
      msg: "capture.done",
      data: { framePath: "/data/a.jpg" }
    });
    expect(Object.keys(JSON.parse(lines[1][1]))).toEqual(["level", "msg", "ts"]);
  });

  it("drops entries below the configured level", () => {
    setLoggerConfig({ format: "json", level: "warn" });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(lines.map(([level]) => level)).toEqual(["warn", "error"]);
  });

  it("merges context into every entry", () => {
    setLoggerConfig({ format: "json", level: "info" });

    logger.withContext({ directory: "/data" }).warn("day.carry_over", { day: "2024-05-11" });

    expect(JSON.parse(lines[0][1]).data).toEqual({ directory: "/data", day: "2024-05-11" });
  });

  it("prints key=value pairs in pretty mode", () => {
    setLoggerConfig({ format: "pretty", color: false, level: "info", timeZone: undefined });

    logger.error("capture.failed", { error: "exited with 1", attempt: 2 });

    expect(lines[0][1]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] error capture\.failed error="exited with 1" attempt=2$/);
  });
});

describe("withDuration", () => {
  it("adds a duration only when timings are on", () => {
    expect(withDuration(Date.now(), false)).toEqual({});
    expect(withDuration(Date.now() - 5, true)).toHaveProperty("durationMs");
  });
});

describe("formatTimestamp", () => {
  it("renders ISO time without a zone and wall time with one", () => {
    const date = new Date(Date.UTC(2024, 4, 11, 6, 7, 8, 9));

    expect(formatTimestamp(date)).toBe("2024-05-11T06:07:08.009Z");
    expect(formatTimestamp(date, "UTC")).toBe("2024-05-11T06:07:08.009 UTC");
  });
});
