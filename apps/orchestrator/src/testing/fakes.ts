import type {
  BroadcastLifecycle,
  BroadcastService,
  BroadcastTransitionTarget,
  IngestStatusReading,
  OrchestratorConfig,
  ReusableBroadcast
} from "@relaycam/shared";

import { RemoteCallError } from "../errors.js";
import type { Clock } from "../services/clock.js";
import type { LogSink, ProcessHandle, ProcessPoll, TranscoderSupervisor } from "../services/processSupervisor.js";

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start: Date | string) {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class FakeHandle implements ProcessHandle {
  private exitState: { code: number | null; signal: NodeJS.Signals | null } | null = null;
  stopped = false;

  constructor(
    readonly pid: number,
    readonly argv: readonly string[]
  ) {}

  poll(): ProcessPoll {
    return this.exitState ? { state: "exited", ...this.exitState } : { state: "running" };
  }

  exit(code: number | null = 1): void {
    this.exitState = { code, signal: null };
  }

  terminate(): void {
    this.exit(null);
  }

  kill(): void {
    this.exit(null);
  }

  async waitForExit(): Promise<boolean> {
    return this.exitState !== null;
  }
}

export class FakeSupervisor implements TranscoderSupervisor {
  readonly started: FakeHandle[] = [];
  readonly stops: Array<ProcessHandle | null> = [];
  /** When set, every started process is already dead on its first poll. */
  crashOnStart = false;
  private nextPid = 100;

  start(argv: readonly string[], _sink: LogSink): ProcessHandle {
    const handle = new FakeHandle(this.nextPid, argv);
    this.nextPid += 1;
    if (this.crashOnStart) {
      handle.exit(1);
    }
    this.started.push(handle);
    return handle;
  }

  poll(handle: ProcessHandle): ProcessPoll {
    return handle.poll();
  }

  async stop(handle: ProcessHandle | null): Promise<void> {
    this.stops.push(handle);
    if (handle instanceof FakeHandle && handle.poll().state === "running") {
      handle.stopped = true;
      handle.terminate();
    }
  }

  get running(): FakeHandle[] {
    return this.started.filter((handle) => handle.poll().state === "running");
  }
}

export type BroadcastCall =
  | { op: "ensureIngest"; ingestId: string | null }
  | { op: "createBroadcast"; title: string; scheduledStartIsoUtc: string }
  | { op: "bindBroadcast"; broadcastId: string; ingestId: string }
  | { op: "transitionBroadcast"; broadcastId: string; target: BroadcastTransitionTarget }
  | { op: "updateBroadcastSchedule"; broadcastId: string; title: string; scheduledStartIsoUtc: string };

/**
 * In-memory broadcast platform. Ingest readings are consumed from a queue
 * and the last one repeats once the queue runs dry.
 */
export class FakeBroadcastService implements BroadcastService {
  readonly calls: BroadcastCall[] = [];
  reusable: ReusableBroadcast | null = null;
  ingestReadings: Array<IngestStatusReading | Error> = [{ status: "active", health: "good" }];
  ingestKeys = new Map<string, string>();
  lifecycles = new Map<string, BroadcastLifecycle>();
  transitionFailures: Partial<Record<BroadcastTransitionTarget, number>> = {};
  createdIngestId = "ingest-created";
  private nextBroadcast = 1;

  async ensureIngest(ingestId: string | null): Promise<string> {
    this.calls.push({ op: "ensureIngest", ingestId });
    return ingestId ?? this.createdIngestId;
  }

  async createBroadcast(title: string, scheduledStartIsoUtc: string): Promise<string> {
    this.calls.push({ op: "createBroadcast", title, scheduledStartIsoUtc });
    const id = `broadcast-${this.nextBroadcast}`;
    this.nextBroadcast += 1;
    this.lifecycles.set(id, "created");
    return id;
  }

  async bindBroadcast(broadcastId: string, ingestId: string): Promise<void> {
    this.calls.push({ op: "bindBroadcast", broadcastId, ingestId });
  }

  async transitionBroadcast(broadcastId: string, target: BroadcastTransitionTarget): Promise<void> {
    this.calls.push({ op: "transitionBroadcast", broadcastId, target });
    const failures = this.transitionFailures[target] ?? 0;
    if (failures > 0) {
      this.transitionFailures[target] = failures - 1;
      throw new RemoteCallError(`Transition to ${target} rejected`, ["invalidtransition"], 403);
    }

    this.lifecycles.set(broadcastId, target);
    if (this.reusable?.id === broadcastId) {
      this.reusable = target === "complete" ? null : { ...this.reusable, lifecycle: target };
    }
  }

  async getIngestStatus(_ingestId: string): Promise<IngestStatusReading> {
    const next = this.ingestReadings.length > 1 ? this.ingestReadings.shift() : this.ingestReadings[0];
    if (next === undefined) {
      return { status: null, health: null };
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async getBroadcastLifecycle(broadcastId: string): Promise<BroadcastLifecycle | null> {
    return this.lifecycles.get(broadcastId) ?? null;
  }

  async listReusableBroadcast(_ingestId: string): Promise<ReusableBroadcast | null> {
    return this.reusable;
  }

  async getIngestKey(ingestId: string): Promise<string | null> {
    return this.ingestKeys.get(ingestId) ?? null;
  }

  async findIngestByKey(streamKey: string): Promise<string | null> {
    for (const [ingestId, key] of this.ingestKeys) {
      if (key === streamKey) {
        return ingestId;
      }
    }
    return null;
  }

  async updateBroadcastSchedule(broadcastId: string, title: string, scheduledStartIsoUtc: string): Promise<void> {
    this.calls.push({ op: "updateBroadcastSchedule", broadcastId, title, scheduledStartIsoUtc });
  }

  transitions(): BroadcastTransitionTarget[] {
    return this.calls.flatMap((call) => (call.op === "transitionBroadcast" ? [call.target] : []));
  }
}

export const testConfig = (overrides: Partial<OrchestratorConfig> = {}): OrchestratorConfig => ({
  baseDir: "/srv/relaycam",
  clientSecretsPath: "/srv/relaycam/client_secret.json",
  tokenPath: "/srv/relaycam/token.json",
  streamKeyPath: "/srv/relaycam/stream.key",
  ingestId: "ingest-1",
  ingestBaseUrl: "rtmp://a.rtmp.youtube.com/live2",
  timeZone: "UTC",
  schedule: { mode: "rolling" },
  rotationHours: 12,
  healthCheckIntervalSec: 10,
  exitRetryDelaySec: 5,
  maxConsecutiveErrors: 20,
  prerollSec: 60,
  liveLeadSec: 0,
  ingestInactiveRestartSec: 60,
  maxLiveRecoveryRestarts: 3,
  logDir: null,
  logLevel: "silent",
  transcoder: {
    ffmpegPath: "/usr/bin/ffmpeg",
    sourceUrl: "rtsp://camera.local/stream",
    videoWidth: 1280,
    videoHeight: 720,
    videoFps: 30,
    videoBitrate: "2500k",
    keyframeInterval: 60,
    audioSampleRate: 44100,
    audioBitrate: "128k"
  },
  broadcast: { privacyStatus: "public", titlePrefix: "Live stream" },
  ...overrides
});
