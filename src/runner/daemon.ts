import { createCommandCapturer } from "../collaborators/camera.js";
import { createCommandEncoder } from "../collaborators/encoder.js";
import { createCommandPublisher } from "../collaborators/publisher.js";
import type { FrameCapturer, Publisher, VideoEncoder } from "../collaborators/types.js";
import type { AppConfig } from "../config.js";
import { logger, type ContextLogger } from "../logger.js";
import { createAssemblyPipeline, type AssemblyPipeline } from "../processors/assembly.js";
import { buildProfiles } from "../profiles.js";
import { createCaptureScheduler, type CaptureScheduler } from "../scheduler.js";
import { createWindowOracle } from "../window.js";

export type Collaborators = {
  capturer: FrameCapturer;
  encoder: VideoEncoder;
  publisher: Publisher;
};

export function createCollaborators(config: AppConfig): Collaborators {
  return {
    capturer: createCommandCapturer(config.capture),
    encoder: createCommandEncoder(config.encoder),
    publisher: createCommandPublisher(config.publish)
  };
}

export function createPipeline(
  config: AppConfig,
  collaborators: Pick<Collaborators, "encoder" | "publisher">,
  runLogger: ContextLogger = logger
): AssemblyPipeline {
  return createAssemblyPipeline({
    encoder: collaborators.encoder,
    encoderCommand: config.encoder.command,
    profiles: (directory, day) => buildProfiles(config.encoder, directory, day),
    publisher: config.publish.playlist ? collaborators.publisher : undefined,
    playlist: config.publish.playlist,
    settleMs: config.pipeline.settleMs,
    logger: runLogger
  });
}

export function createScheduler(
  config: AppConfig,
  directory: string,
  collaborators: Collaborators,
  runLogger: ContextLogger = logger
): CaptureScheduler {
  return createCaptureScheduler({
    directory,
    intervalSeconds: config.capture.intervalSeconds,
    settleMs: config.pipeline.settleMs,
    oracle: createWindowOracle(config.window),
    pipeline: createPipeline(config, collaborators, runLogger),
    capturer: collaborators.capturer,
    captureRetry: {
      retries: config.capture.retries,
      backoffMs: config.capture.retryBackoffMs
    },
    logger: runLogger
  });
}

/**
 * Runs the capture loop until SIGINT or SIGTERM. A day being assembled when
 * the signal arrives is finished before the loop exits.
 */
export async function runDaemon(
  config: AppConfig,
  directory: string,
  collaborators: Collaborators = createCollaborators(config)
) {
  const runLogger = logger.withContext({ directory });
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    runLogger.info("shutdown.requested", { signal });
    controller.abort();
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);

  runLogger.info("daemon.start", {
    window: describeWindowPolicy(config),
    intervalSeconds: config.capture.intervalSeconds,
    publish: config.publish.playlist ?? null
  });
  try {
    await createScheduler(config, directory, collaborators, runLogger).run(controller.signal);
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
  runLogger.info("daemon.exit");
}

export function describeWindowPolicy(config: AppConfig) {
  const policy = config.window;
  if (policy.mode === "fixed") {
    const format = (time: { hour: number; minute: number }) =>
      `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
    return `fixed ${format(policy.start)}-${format(policy.end)}`;
  }
  return `sun at ${policy.latitude},${policy.longitude} ±${policy.marginMinutes}min`;
}
