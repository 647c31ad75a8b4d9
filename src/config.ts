import "dotenv/config";
import { stat } from "node:fs/promises";
import { homedir } from "node:os";
import { resolve } from "node:path";
import { z } from "zod";
import { defaultConfig } from "../config.defaults.js";

const truthy = new Set(["true", "1", "yes"]);

const clockTimeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM (24-hour clock)");

// An empty `LATITUDE=` in .env means unset, not 0.
const optionalEnvNumber = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.coerce.number().optional()
);

const envSchema = z.object({
  CAPTURE_INTERVAL_SECONDS: z.coerce.number().int().positive().optional(),
  OUTPUT_DIRECTORY: z.string().optional(),
  CAPTURE_COMMAND: z.string().optional(),
  CAPTURE_SHUTTER_MICROS: z.coerce.number().int().positive().optional(),
  CAPTURE_RETRIES: z.coerce.number().int().nonnegative().optional(),

  WINDOW_MODE: z.enum(["fixed", "astronomical"]).optional(),
  WINDOW_START: clockTimeSchema.optional(),
  WINDOW_END: clockTimeSchema.optional(),
  LATITUDE: optionalEnvNumber,
  LONGITUDE: optionalEnvNumber,
  MARGIN_MINUTES: z.coerce.number().int().nonnegative().optional(),

  ENCODER_COMMAND: z.string().optional(),
  ENCODER_FONT_FILE: z.string().optional(),

  PUBLISH_COMMAND: z.string().optional(),
  PUBLISH_PLAYLIST: z.string().optional(),
  PUBLISH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),

  TIMEZONE: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  LOG_INCLUDE_TIMINGS: z.string().optional(),
  LOG_FORMAT: z.enum(["json", "pretty"]).optional(),
  LOG_COLOR: z.string().optional()
});

export const fileConfigSchema = z.object({
  capture: z
    .object({
      intervalSeconds: z.coerce.number().int().positive().default(30),
      outputDirectory: z.string().optional(),
      command: z.string().default("rpicam-still"),
      shutterMicros: z.coerce.number().int().positive().default(1500),
      timeoutMs: z.coerce.number().int().positive().default(20_000),
      retries: z.coerce.number().int().nonnegative().default(0),
      retryBackoffMs: z.coerce.number().int().positive().default(1000)
    })
    .default({}),
  window: z
    .object({
      mode: z.enum(["fixed", "astronomical"]).default("fixed"),
      start: clockTimeSchema.default("05:45"),
      end: clockTimeSchema.default("19:00"),
      latitude: z.number().optional(),
      longitude: z.number().optional(),
      marginMinutes: z.coerce.number().int().nonnegative().default(40)
    })
    .default({}),
  encoder: z
    .object({
      command: z.string().default("ffmpeg"),
      frameRate: z.coerce.number().int().positive().default(30),
      preset: z.string().default("ultrafast"),
      fontFile: z.string().optional(),
      fontSize: z.coerce.number().int().positive().default(30)
    })
    .default({}),
  publish: z
    .object({
      command: z.string().default("youtube-upload"),
      playlist: z.string().optional(),
      privacy: z.enum(["public", "unlisted", "private"]).default("unlisted"),
      timeoutMs: z.coerce.number().int().positive().default(600_000)
    })
    .default({}),
  pipeline: z
    .object({
      settleMs: z.coerce.number().int().nonnegative().default(2000)
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      includeTimings: z.boolean().default(false),
      format: z.enum(["json", "pretty"]).default("json"),
      color: z.boolean().default(false),
      timeZone: z.string().optional()
    })
    .default({})
});

export type ConfigFile = z.input<typeof fileConfigSchema>;

export type ClockTime = { hour: number; minute: number };

export type WindowPolicy =
  | { mode: "fixed"; start: ClockTime; end: ClockTime }
  | {
      mode: "astronomical";
      latitude: number;
      longitude: number;
      marginMinutes: number;
    };

/** Values supplied on the command line; they win over env and file config. */
export type ConfigOverrides = {
  intervalSeconds?: number;
  outputDirectory?: string;
  windowMode?: "fixed" | "astronomical";
  windowStart?: string;
  windowEnd?: string;
  latitude?: number;
  longitude?: number;
  marginMinutes?: number;
  playlist?: string;
};

export type AppConfig = ReturnType<typeof loadConfig>;

export function loadConfig(
  overrides: ConfigOverrides = {},
  source: NodeJS.ProcessEnv = process.env,
  file: ConfigFile = defaultConfig
) {
  const env = parseOrThrow(envSchema, source, "environment");
  const fileConfig = parseOrThrow(fileConfigSchema, file, "config.defaults.ts");

  const outputDirectory =
    overrides.outputDirectory ?? env.OUTPUT_DIRECTORY ?? fileConfig.capture.outputDirectory;

  const window = resolveWindowPolicy({
    mode: overrides.windowMode ?? env.WINDOW_MODE ?? fileConfig.window.mode,
    start: overrides.windowStart ?? env.WINDOW_START ?? fileConfig.window.start,
    end: overrides.windowEnd ?? env.WINDOW_END ?? fileConfig.window.end,
    latitude: overrides.latitude ?? env.LATITUDE ?? fileConfig.window.latitude,
    longitude: overrides.longitude ?? env.LONGITUDE ?? fileConfig.window.longitude,
    marginMinutes:
      overrides.marginMinutes ?? env.MARGIN_MINUTES ?? fileConfig.window.marginMinutes
  });

  if (overrides.marginMinutes !== undefined && window.mode !== "astronomical") {
    throw new Error("A margin only applies to the sunrise/sunset window; set latitude and longitude.");
  }

  return freezeDeep({
    capture: {
      intervalSeconds:
        overrides.intervalSeconds ??
        env.CAPTURE_INTERVAL_SECONDS ??
        fileConfig.capture.intervalSeconds,
      outputDirectory: outputDirectory ? expandHome(outputDirectory) : undefined,
      command: env.CAPTURE_COMMAND ?? fileConfig.capture.command,
      shutterMicros: env.CAPTURE_SHUTTER_MICROS ?? fileConfig.capture.shutterMicros,
      timeoutMs: fileConfig.capture.timeoutMs,
      retries: env.CAPTURE_RETRIES ?? fileConfig.capture.retries,
      retryBackoffMs: fileConfig.capture.retryBackoffMs
    },
    window,
    encoder: {
      command: env.ENCODER_COMMAND ?? fileConfig.encoder.command,
      frameRate: fileConfig.encoder.frameRate,
      preset: fileConfig.encoder.preset,
      fontFile: env.ENCODER_FONT_FILE ?? fileConfig.encoder.fontFile,
      fontSize: fileConfig.encoder.fontSize
    },
    publish: {
      command: env.PUBLISH_COMMAND ?? fileConfig.publish.command,
      playlist: blankToUndefined(
        overrides.playlist ?? env.PUBLISH_PLAYLIST ?? fileConfig.publish.playlist
      ),
      privacy: fileConfig.publish.privacy,
      timeoutMs: env.PUBLISH_TIMEOUT_MS ?? fileConfig.publish.timeoutMs
    },
    pipeline: {
      settleMs: fileConfig.pipeline.settleMs
    },
    logging: {
      level: env.LOG_LEVEL ?? fileConfig.logging.level,
      includeTimings: resolveBool(
        env.LOG_INCLUDE_TIMINGS,
        fileConfig.logging.includeTimings
      ),
      format: env.LOG_FORMAT ?? fileConfig.logging.format,
      color: resolveBool(env.LOG_COLOR, fileConfig.logging.color),
      timeZone: env.TIMEZONE ?? fileConfig.logging.timeZone
    }
  });
}

function resolveWindowPolicy(raw: {
  mode: "fixed" | "astronomical";
  start: string;
  end: string;
  latitude?: number;
  longitude?: number;
  marginMinutes: number;
}): WindowPolicy {
  if (raw.mode === "astronomical") {
    if (raw.latitude === undefined || raw.longitude === undefined) {
      throw new Error("Astronomical window requires both latitude and longitude.");
    }
    if (!Number.isFinite(raw.latitude) || raw.latitude < -90 || raw.latitude > 90) {
      throw new Error(`Invalid latitude: ${raw.latitude} (expected -90..90).`);
    }
    if (!Number.isFinite(raw.longitude) || raw.longitude < -180 || raw.longitude > 180) {
      throw new Error(`Invalid longitude: ${raw.longitude} (expected -180..180).`);
    }
    return {
      mode: "astronomical",
      latitude: raw.latitude,
      longitude: raw.longitude,
      marginMinutes: raw.marginMinutes
    };
  }

  const start = parseClockTime(raw.start);
  const end = parseClockTime(raw.end);
  if (toMinutes(start) >= toMinutes(end)) {
    throw new Error(`Window start ${raw.start} must be before window end ${raw.end}.`);
  }
  return { mode: "fixed", start, end };
}

export function parseClockTime(value: string): ClockTime {
  const parsed = clockTimeSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid time of day: ${value} (expected HH:MM).`);
  }
  const [hour, minute] = parsed.data.split(":").map(Number);
  return { hour, minute };
}

function toMinutes(time: ClockTime) {
  return time.hour * 60 + time.minute;
}

/**
 * Resolves `~` and relative paths, then checks the directory is there.
 * Nothing is created: a missing directory is a usage error.
 */
export async function validateOutputDirectory(path: string) {
  const absolutePath = resolve(expandHome(path));
  const info = await stat(absolutePath).catch(() => null);
  if (!info || !info.isDirectory()) {
    throw new Error(`Output directory does not exist: ${absolutePath}`);
  }
  return absolutePath;
}

/** Command line value first, then `OUTPUT_DIRECTORY` or the defaults file. */
export async function resolveOutputDirectory(
  config: Pick<AppConfig, "capture">,
  fromCli?: string
) {
  const path = fromCli ?? config.capture.outputDirectory;
  if (!path) {
    throw new Error("No output directory: pass -o/--output-directory or set OUTPUT_DIRECTORY.");
  }
  return validateOutputDirectory(path);
}

export function expandHome(path: string) {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return resolve(homedir(), path.slice(2));
  return path;
}

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  label: string
): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid ${label} configuration: ${issues}`);
  }
  return parsed.data;
}

function resolveBool(value: string | undefined, fallback: boolean) {
  if (value === undefined) return fallback;
  return truthy.has(value.toLowerCase());
}

function blankToUndefined(value: string | undefined) {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function freezeDeep<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child && typeof child === "object") {
      freezeDeep(child);
    }
  }
  return Object.freeze(value);
}
