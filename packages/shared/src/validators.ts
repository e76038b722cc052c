import path from "node:path";

import { z } from "zod";

import { isValidTimeZone, parseFixedHours } from "./schedule.js";
import type { OrchestratorConfig, ScheduleConfig } from "./types.js";

const MAX_OFFSET_SECONDS = 3600;
const BITRATE = z.string().regex(/^\d+[kKmM]?$/, { message: "Expected a bitrate such as 2500k" });

const requiredString = (key: string) =>
  z
    .string({ required_error: `Missing required env: ${key}` })
    .trim()
    .min(1, { message: `Missing required env: ${key}` });

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const intWithDefault = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") {
        return fallback;
      }

      if (!/^-?\d+$/.test(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected an integer, got "${value}"` });
        return z.NEVER;
      }

      return Number.parseInt(value, 10);
    })
    .pipe(z.number().int().min(min).max(max));

const withDefault = <T extends z.ZodTypeAny>(schema: T, fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : fallback))
    .pipe(schema);

const fixedHours = z
  .string()
  .optional()
  .transform((value, ctx): ScheduleConfig => {
    if (!value || !value.trim()) {
      return { mode: "rolling" };
    }

    try {
      return { mode: "fixed", hours: parseFixedHours(value) };
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : "Invalid start hours"
      });
      return z.NEVER;
    }
  });

export const orchestratorEnvSchema = z.object({
  BASE_DIR: requiredString("BASE_DIR"),
  GOOGLE_CLIENT_SECRETS: requiredString("GOOGLE_CLIENT_SECRETS"),
  GOOGLE_TOKEN_FILE: requiredString("GOOGLE_TOKEN_FILE"),
  RTSP_URL: requiredString("RTSP_URL"),
  RTMP_INGEST: requiredString("RTMP_INGEST"),
  LOCAL_TZ: requiredString("LOCAL_TZ").refine(isValidTimeZone, {
    message: "LOCAL_TZ is not a recognized IANA time zone"
  }),
  YT_STREAM_KEY_FILE: requiredString("YT_STREAM_KEY_FILE"),
  YT_STREAM_ID: optionalString,
  ROTATION_HOURS: intWithDefault(12, 1, 24 * 7),
  HEALTH_CHECK_INTERVAL_SECS: intWithDefault(10, 1, 600),
  FFMPEG_EXIT_RETRY_DELAY_SECS: intWithDefault(5, 0, 600),
  MAX_CONSECUTIVE_FFMPEG_ERRORS: intWithDefault(20, 1),
  FIXED_START_HOURS: fixedHours,
  PREROLL_SECS: intWithDefault(60, 0, MAX_OFFSET_SECONDS),
  LIVE_LEAD_SECS: intWithDefault(0, 0, MAX_OFFSET_SECONDS),
  INGEST_INACTIVE_RESTART_SECS: intWithDefault(60, 1),
  MAX_LIVE_RECOVERY_RESTARTS: intWithDefault(3, 0),
  LOG_DIR: z.string().trim().optional(),
  LOG_LEVEL: withDefault(
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    "info"
  ),
  FFMPEG_PATH: optionalString,
  VIDEO_WIDTH: intWithDefault(1280, 16, 7680),
  VIDEO_HEIGHT: intWithDefault(720, 16, 4320),
  VIDEO_FPS: intWithDefault(30, 1, 120),
  VIDEO_BITRATE: withDefault(BITRATE, "2500k"),
  KEYINT: intWithDefault(60, 1, 600),
  AUDIO_SAMPLE_RATE: intWithDefault(44100, 8000, 192000),
  AUDIO_BITRATE: withDefault(BITRATE, "128k"),
  BROADCAST_PRIVACY: withDefault(z.enum(["private", "unlisted", "public"]), "public"),
  BROADCAST_TITLE_PREFIX: z
    .string()
    .trim()
    .max(80)
    .optional()
    .transform((value) => (value ? value : "Live stream"))
});

export type OrchestratorEnv = z.infer<typeof orchestratorEnvSchema>;

/**
 * Validates an already-expanded environment map. An unset LOG_DIR falls back
 * to BASE_DIR/logs while an explicitly empty one disables transcoder logs.
 */
export const parseOrchestratorConfig = (env: Record<string, string | undefined>): OrchestratorConfig => {
  const parsed = orchestratorEnvSchema.parse(env);
  const logDir =
    parsed.LOG_DIR === undefined ? path.join(parsed.BASE_DIR, "logs") : parsed.LOG_DIR || null;

  return {
    baseDir: parsed.BASE_DIR,
    clientSecretsPath: parsed.GOOGLE_CLIENT_SECRETS,
    tokenPath: parsed.GOOGLE_TOKEN_FILE,
    streamKeyPath: parsed.YT_STREAM_KEY_FILE,
    ingestId: parsed.YT_STREAM_ID ?? null,
    ingestBaseUrl: parsed.RTMP_INGEST.replace(/\/+$/, ""),
    timeZone: parsed.LOCAL_TZ,
    schedule: parsed.FIXED_START_HOURS,
    rotationHours: parsed.ROTATION_HOURS,
    healthCheckIntervalSec: parsed.HEALTH_CHECK_INTERVAL_SECS,
    exitRetryDelaySec: parsed.FFMPEG_EXIT_RETRY_DELAY_SECS,
    maxConsecutiveErrors: parsed.MAX_CONSECUTIVE_FFMPEG_ERRORS,
    prerollSec: parsed.PREROLL_SECS,
    liveLeadSec: parsed.LIVE_LEAD_SECS,
    ingestInactiveRestartSec: parsed.INGEST_INACTIVE_RESTART_SECS,
    maxLiveRecoveryRestarts: parsed.MAX_LIVE_RECOVERY_RESTARTS,
    logDir,
    logLevel: parsed.LOG_LEVEL,
    transcoder: {
      ffmpegPath: parsed.FFMPEG_PATH ?? null,
      sourceUrl: parsed.RTSP_URL,
      videoWidth: parsed.VIDEO_WIDTH,
      videoHeight: parsed.VIDEO_HEIGHT,
      videoFps: parsed.VIDEO_FPS,
      videoBitrate: parsed.VIDEO_BITRATE,
      keyframeInterval: parsed.KEYINT,
      audioSampleRate: parsed.AUDIO_SAMPLE_RATE,
      audioBitrate: parsed.AUDIO_BITRATE
    },
    broadcast: {
      privacyStatus: parsed.BROADCAST_PRIVACY,
      titlePrefix: parsed.BROADCAST_TITLE_PREFIX
    }
  };
};
