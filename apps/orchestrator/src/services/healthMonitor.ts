import type { BroadcastService, IngestStreamStatus, OrchestratorConfig } from "@relaycam/shared";
import type { Logger } from "pino";

import { LiveRecoveryExhaustedError, errorMessage } from "../errors.js";
import { napFor, type Clock } from "./clock.js";
import type { ProcessHandle, TranscoderLaunch, TranscoderSupervisor } from "./processSupervisor.js";

export type HealthCounters = {
  consecutiveExits: number;
  inactiveSec: number;
  recoveryRestarts: number;
};

export type HealthLoopRequest = {
  deadline: Date;
  ingestId: string;
  handle: ProcessHandle;
  launch: TranscoderLaunch;
  signal?: AbortSignal;
};

export type HealthLoopResult = {
  reason: "deadline" | "exit-ceiling";
  /** The process running when the loop ended; the caller stops it. */
  handle: ProcessHandle;
  counters: HealthCounters;
};

export type HealthMonitorDeps = {
  config: OrchestratorConfig;
  broadcasts: BroadcastService;
  supervisor: TranscoderSupervisor;
  clock: Clock;
  logger: Logger;
};

type LoopState = {
  handle: ProcessHandle;
  counters: HealthCounters;
};

export const freshCounters = (): HealthCounters => ({
  consecutiveExits: 0,
  inactiveSec: 0,
  recoveryRestarts: 0
});

export class HealthMonitor {
  private readonly config: OrchestratorConfig;
  private readonly broadcasts: BroadcastService;
  private readonly supervisor: TranscoderSupervisor;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: HealthMonitorDeps) {
    this.config = deps.config;
    this.broadcasts = deps.broadcasts;
    this.supervisor = deps.supervisor;
    this.clock = deps.clock;
    this.logger = deps.logger;
  }

  /**
   * Keeps the transcoder and the ingest healthy until `deadline`. Throws
   * {@link LiveRecoveryExhaustedError} when inactivity restarts run past the
   * configured ceiling. The running transcoder is stopped whenever this throws.
   */
  async run(request: HealthLoopRequest): Promise<HealthLoopResult> {
    const state: LoopState = { handle: request.handle, counters: freshCounters() };

    try {
      return await this.loop(request, state);
    } catch (error) {
      await this.supervisor.stop(state.handle);
      throw error;
    }
  }

  private async loop(request: HealthLoopRequest, state: LoopState): Promise<HealthLoopResult> {
    const { deadline, ingestId, launch, signal } = request;
    const { counters } = state;
    const intervalMs = this.config.healthCheckIntervalSec * 1000;

    this.logger.info({ deadline: deadline.toISOString(), ingestId }, "Health loop started");

    while (this.clock.now().getTime() < deadline.getTime()) {
      signal?.throwIfAborted();
      const polled = this.supervisor.poll(state.handle);

      if (polled.state === "exited") {
        counters.consecutiveExits += 1;
        this.logger.warn(
          {
            pid: state.handle.pid,
            code: polled.code,
            signal: polled.signal,
            consecutiveExits: counters.consecutiveExits
          },
          "Transcoder exited"
        );

        if (counters.consecutiveExits >= this.config.maxConsecutiveErrors) {
          this.logger.error(
            { consecutiveExits: counters.consecutiveExits },
            "Too many consecutive transcoder exits; rotating early"
          );
          return { reason: "exit-ceiling", handle: state.handle, counters };
        }

        await napFor(this.clock, this.config.exitRetryDelaySec * 1000, signal);
        state.handle = this.supervisor.start(launch.argv, launch.sink);
        continue;
      }

      counters.consecutiveExits = 0;
      await this.checkIngest(ingestId, launch, state);

      const remainingMs = deadline.getTime() - this.clock.now().getTime();
      await napFor(this.clock, Math.min(intervalMs, Math.max(0, remainingMs)), signal);
    }

    this.logger.info({ ingestId }, "Rotation deadline reached");
    return { reason: "deadline", handle: state.handle, counters };
  }

  private async checkIngest(ingestId: string, launch: TranscoderLaunch, state: LoopState): Promise<void> {
    const { counters } = state;
    let status: IngestStreamStatus | null;
    try {
      const reading = await this.broadcasts.getIngestStatus(ingestId);
      status = reading.status;
      this.logger.debug({ ingestId, status: reading.status, health: reading.health }, "Ingest status");
    } catch (error) {
      this.logger.warn({ ingestId, reason: errorMessage(error) }, "Ingest status poll failed");
      return;
    }

    if (status === "active") {
      counters.inactiveSec = 0;
      counters.recoveryRestarts = 0;
      return;
    }

    counters.inactiveSec += this.config.healthCheckIntervalSec;
    this.logger.warn({ ingestId, status, inactiveSec: counters.inactiveSec }, "Ingest not active");

    if (counters.inactiveSec < this.config.ingestInactiveRestartSec) {
      return;
    }

    counters.recoveryRestarts += 1;
    if (counters.recoveryRestarts > this.config.maxLiveRecoveryRestarts) {
      throw new LiveRecoveryExhaustedError(
        `Ingest stayed inactive through ${this.config.maxLiveRecoveryRestarts} recovery restarts`
      );
    }

    this.logger.warn(
      { ingestId, recoveryRestarts: counters.recoveryRestarts },
      "Restarting transcoder to recover ingest"
    );
    await this.supervisor.stop(state.handle);
    counters.inactiveSec = 0;
    state.handle = this.supervisor.start(launch.argv, launch.sink);
  }
}
