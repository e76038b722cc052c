export type BroadcastLifecycle =
  | "created"
  | "ready"
  | "testing"
  | "live"
  | "complete"
  | "revoked"
  | "unknown";

export type BroadcastTransitionTarget = "testing" | "live" | "complete";

export type IngestStreamStatus = "active" | "ready" | "created" | "inactive" | "error" | "unknown";

export type IngestHealth = "good" | "ok" | "bad" | "noData" | "unknown";

export type IngestStatusReading = {
  status: IngestStreamStatus | null;
  health: IngestHealth | null;
};

export type ReusableBroadcast = {
  id: string;
  lifecycle: BroadcastLifecycle;
  scheduledStartIsoUtc: string | null;
};

export type PrivacyStatus = "private" | "unlisted" | "public";

export type ScheduleConfig = { mode: "fixed"; hours: number[] } | { mode: "rolling" };

export type ScheduleMode = ScheduleConfig["mode"];

export type ScheduleSlot = {
  mode: ScheduleMode;
  activation: Date;
  deadline: Date;
};

export type TranscoderConfig = {
  ffmpegPath: string | null;
  sourceUrl: string;
  videoWidth: number;
  videoHeight: number;
  videoFps: number;
  videoBitrate: string;
  keyframeInterval: number;
  audioSampleRate: number;
  audioBitrate: string;
};

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type OrchestratorConfig = {
  baseDir: string;
  clientSecretsPath: string;
  tokenPath: string;
  streamKeyPath: string;
  ingestId: string | null;
  ingestBaseUrl: string;
  timeZone: string;
  schedule: ScheduleConfig;
  rotationHours: number;
  healthCheckIntervalSec: number;
  exitRetryDelaySec: number;
  maxConsecutiveErrors: number;
  prerollSec: number;
  liveLeadSec: number;
  ingestInactiveRestartSec: number;
  maxLiveRecoveryRestarts: number;
  logDir: string | null;
  logLevel: LogLevel;
  transcoder: TranscoderConfig;
  broadcast: {
    privacyStatus: PrivacyStatus;
    titlePrefix: string;
  };
};

/**
 * Remote operations the orchestration core consumes. Every method may reject
 * with a platform error; callers decide whether to retry or abandon.
 */
export interface BroadcastService {
  ensureIngest(ingestId: string | null): Promise<string>;
  createBroadcast(title: string, scheduledStartIsoUtc: string): Promise<string>;
  bindBroadcast(broadcastId: string, ingestId: string): Promise<void>;
  transitionBroadcast(broadcastId: string, target: BroadcastTransitionTarget): Promise<void>;
  getIngestStatus(ingestId: string): Promise<IngestStatusReading>;
  getBroadcastLifecycle(broadcastId: string): Promise<BroadcastLifecycle | null>;
  listReusableBroadcast(ingestId: string): Promise<ReusableBroadcast | null>;
  getIngestKey(ingestId: string): Promise<string | null>;
  findIngestByKey(streamKey: string): Promise<string | null>;
  updateBroadcastSchedule(broadcastId: string, title: string, scheduledStartIsoUtc: string): Promise<void>;
}

export const EXIT_CODES = {
  shutdown: 0,
  alreadyRunning: 1,
  recoveryExhausted: 1,
  unexpected: 1,
  configuration: 2,
  credentials: 3
} as const;
