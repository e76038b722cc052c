import type {
  BroadcastLifecycle,
  BroadcastService,
  OrchestratorConfig,
  ScheduleSlot
} from "@relaycam/shared";
import { buildBroadcastTitle, canTransitionBroadcast } from "@relaycam/shared";
import type { Logger } from "pino";

import { errorMessage } from "../errors.js";
import { napFor, napUntil, type Clock } from "./clock.js";
import type { ProcessHandle, TranscoderLaunch, TranscoderSupervisor } from "./processSupervisor.js";

export const RECONCILER_TIMINGS = {
  ingestPollMs: 3_000,
  ingestTimeoutFixedMs: 180_000,
  ingestTimeoutRollingMs: 120_000,
  rollingStartLeadMs: 120_000,
  testingRetryDelayMs: 5_000,
  testingConfirmPollMs: 2_000,
  testingConfirmTimeoutMs: 30_000,
  liveRetryDelayMs: 8_000
} as const;

export type ReconcileRequest = {
  slot: ScheduleSlot;
  ingestId: string;
  streamKey: string;
  launch: TranscoderLaunch;
  signal?: AbortSignal;
};

export type ReconcileOutcome =
  | {
      status: "streaming";
      broadcastId: string;
      ingestId: string;
      handle: ProcessHandle;
    }
  | {
      status: "abandoned";
      broadcastId: string;
      ingestId: string;
      reason: string;
    };

type AcquiredBroadcast = {
  broadcastId: string;
  lifecycle: BroadcastLifecycle;
  reused: boolean;
};

export type BroadcastReconcilerDeps = {
  config: OrchestratorConfig;
  broadcasts: BroadcastService;
  supervisor: TranscoderSupervisor;
  clock: Clock;
  logger: Logger;
};

/**
 * Brings one cycle from "nothing" to "ingest active and broadcast live".
 * Errors before ffmpeg starts propagate; once ffmpeg runs, remote failures
 * end in either a streaming or an abandoned outcome.
 */
export class BroadcastReconciler {
  private readonly config: OrchestratorConfig;
  private readonly broadcasts: BroadcastService;
  private readonly supervisor: TranscoderSupervisor;
  private readonly clock: Clock;
  private readonly logger: Logger;
  /** Created on a previous cycle but never bound; bound and reused before creating another. */
  private unboundBroadcastId: string | null = null;

  constructor(deps: BroadcastReconcilerDeps) {
    this.config = deps.config;
    this.broadcasts = deps.broadcasts;
    this.supervisor = deps.supervisor;
    this.clock = deps.clock;
    this.logger = deps.logger;
  }

  async reconcile(request: ReconcileRequest): Promise<ReconcileOutcome> {
    const { slot, streamKey, launch, signal } = request;
    signal?.throwIfAborted();
    const acquired = await this.acquireBroadcast(slot, request.ingestId);

    if (acquired.reused && slot.mode === "fixed") {
      await this.refreshSchedule(acquired, slot);
    }

    const ingestId = await this.verifyIngestKey(acquired.broadcastId, request.ingestId, streamKey);
    signal?.throwIfAborted();
    const handle = this.supervisor.start(launch.argv, launch.sink);

    try {
      const active = await this.waitForActiveIngest(ingestId, slot, signal);
      if (!active) {
        await this.supervisor.stop(handle);
        return {
          status: "abandoned",
          broadcastId: acquired.broadcastId,
          ingestId,
          reason: "ingest never became active"
        };
      }

      const reachedLive = await this.advanceLifecycle(acquired, ingestId, slot, signal);
      if (!reachedLive) {
        await this.supervisor.stop(handle);
        return {
          status: "abandoned",
          broadcastId: acquired.broadcastId,
          ingestId,
          reason: "transition to testing failed twice"
        };
      }
    } catch (error) {
      await this.supervisor.stop(handle);
      throw error;
    }

    return { status: "streaming", broadcastId: acquired.broadcastId, ingestId, handle };
  }

  private async acquireBroadcast(slot: ScheduleSlot, ingestId: string): Promise<AcquiredBroadcast> {
    const reusable = await this.broadcasts.listReusableBroadcast(ingestId);
    if (reusable) {
      this.logger.info(
        { broadcastId: reusable.id, lifecycle: reusable.lifecycle },
        "Reusing broadcast bound to ingest"
      );
      return { broadcastId: reusable.id, lifecycle: reusable.lifecycle, reused: true };
    }

    const leftover = this.unboundBroadcastId;
    if (leftover) {
      this.unboundBroadcastId = null;
      try {
        await this.broadcasts.bindBroadcast(leftover, ingestId);
        this.logger.info({ broadcastId: leftover }, "Bound broadcast left over from a failed cycle");
        return { broadcastId: leftover, lifecycle: "created", reused: true };
      } catch (error) {
        this.logger.warn(
          { broadcastId: leftover, reason: errorMessage(error) },
          "Leftover broadcast could not be bound; creating a new one"
        );
      }
    }

    const now = this.clock.now();
    const startAt = this.scheduledStartFor(slot, now);
    const title = this.titleFor(slot, now);
    const broadcastId = await this.broadcasts.createBroadcast(title, startAt.toISOString());
    await this.bindNewBroadcast(broadcastId, ingestId);

    this.logger.info(
      { broadcastId, title, scheduledStart: startAt.toISOString() },
      "Created new broadcast"
    );
    return { broadcastId, lifecycle: "created", reused: false };
  }

  private async bindNewBroadcast(broadcastId: string, ingestId: string): Promise<void> {
    try {
      await this.broadcasts.bindBroadcast(broadcastId, ingestId);
    } catch (error) {
      this.unboundBroadcastId = broadcastId;
      this.logger.error(
        { broadcastId, ingestId, reason: errorMessage(error) },
        "Binding new broadcast failed; it will be bound on the next cycle"
      );
      throw error;
    }
  }

  private async refreshSchedule(acquired: AcquiredBroadcast, slot: ScheduleSlot): Promise<void> {
    if (acquired.lifecycle === "testing" || acquired.lifecycle === "live") {
      return;
    }

    const now = this.clock.now();
    const title = this.titleFor(slot, now);
    const startAt = this.scheduledStartFor(slot, now);
    try {
      await this.broadcasts.updateBroadcastSchedule(acquired.broadcastId, title, startAt.toISOString());
      this.logger.info(
        { broadcastId: acquired.broadcastId, title, scheduledStart: startAt.toISOString() },
        "Updated reused broadcast for slot"
      );
    } catch (error) {
      this.logger.warn(
        { broadcastId: acquired.broadcastId, reason: errorMessage(error) },
        "Could not update reused broadcast schedule; keeping it as is"
      );
    }
  }

  /** The stream key is authoritative; returns the ingest id that owns it. */
  private async verifyIngestKey(broadcastId: string, ingestId: string, streamKey: string): Promise<string> {
    try {
      const registeredKey = await this.broadcasts.getIngestKey(ingestId);
      if (registeredKey === streamKey) {
        return ingestId;
      }

      const owner = await this.broadcasts.findIngestByKey(streamKey);
      if (!owner) {
        this.logger.warn({ ingestId }, "No ingest on the channel matches the configured stream key");
        return ingestId;
      }

      if (owner !== ingestId) {
        await this.broadcasts.bindBroadcast(broadcastId, owner);
        this.logger.warn(
          { configuredIngestId: ingestId, ingestId: owner, broadcastId },
          "Stream key belongs to another ingest; rebound broadcast"
        );
      }

      return owner;
    } catch (error) {
      this.logger.warn({ ingestId, reason: errorMessage(error) }, "Could not verify ingest binding");
      return ingestId;
    }
  }

  private async waitForActiveIngest(ingestId: string, slot: ScheduleSlot, signal?: AbortSignal): Promise<boolean> {
    const timeoutMs =
      slot.mode === "fixed" ? RECONCILER_TIMINGS.ingestTimeoutFixedMs : RECONCILER_TIMINGS.ingestTimeoutRollingMs;

    for (let waited = 0; waited < timeoutMs; waited += RECONCILER_TIMINGS.ingestPollMs) {
      try {
        const reading = await this.broadcasts.getIngestStatus(ingestId);
        this.logger.info({ ingestId, status: reading.status, health: reading.health }, "Ingest status");
        if (reading.status === "active") {
          return true;
        }
      } catch (error) {
        this.logger.warn({ ingestId, reason: errorMessage(error) }, "Ingest status poll failed");
      }

      await napFor(this.clock, RECONCILER_TIMINGS.ingestPollMs, signal);
    }

    this.logger.warn({ ingestId, timeoutMs }, "Ingest never became active; abandoning cycle");
    return false;
  }

  /** Returns false only when the broadcast could not be moved to testing. */
  private async advanceLifecycle(
    acquired: AcquiredBroadcast,
    ingestId: string,
    slot: ScheduleSlot,
    signal?: AbortSignal
  ): Promise<boolean> {
    const { broadcastId, lifecycle } = acquired;

    if (lifecycle === "live") {
      this.logger.info({ broadcastId }, "Broadcast already live");
      return true;
    }

    if (lifecycle !== "testing") {
      if (!canTransitionBroadcast(lifecycle, "testing")) {
        this.logger.warn({ broadcastId, lifecycle }, "Skipping transition to testing");
      } else if (!(await this.enterTesting(broadcastId, signal))) {
        return false;
      }
    }

    if (slot.mode === "fixed") {
      const goLiveAt = new Date(slot.activation.getTime() - this.config.liveLeadSec * 1000);
      if (goLiveAt.getTime() > this.clock.now().getTime()) {
        this.logger.info({ broadcastId, goLiveAt: goLiveAt.toISOString() }, "Waiting for go-live time");
        await napUntil(this.clock, goLiveAt, signal);
      }
    }

    await this.enterLive(broadcastId, ingestId, signal);
    return true;
  }

  private async enterTesting(broadcastId: string, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    try {
      await this.broadcasts.transitionBroadcast(broadcastId, "testing");
    } catch (error) {
      this.logger.warn({ broadcastId, reason: errorMessage(error) }, "Transition to testing failed; retrying");
      await napFor(this.clock, RECONCILER_TIMINGS.testingRetryDelayMs, signal);

      try {
        await this.broadcasts.transitionBroadcast(broadcastId, "testing");
      } catch (retryError) {
        this.logger.error(
          { broadcastId, reason: errorMessage(retryError) },
          "Transition to testing failed again; abandoning cycle"
        );
        return false;
      }
    }

    await this.confirmTesting(broadcastId, signal);
    return true;
  }

  private async confirmTesting(broadcastId: string, signal?: AbortSignal): Promise<void> {
    for (
      let waited = 0;
      waited < RECONCILER_TIMINGS.testingConfirmTimeoutMs;
      waited += RECONCILER_TIMINGS.testingConfirmPollMs
    ) {
      try {
        const lifecycle = await this.broadcasts.getBroadcastLifecycle(broadcastId);
        this.logger.info({ broadcastId, lifecycle }, "Broadcast lifecycle");
        if (lifecycle === "testing") {
          return;
        }
      } catch (error) {
        this.logger.warn({ broadcastId, reason: errorMessage(error) }, "Lifecycle poll failed");
      }

      await napFor(this.clock, RECONCILER_TIMINGS.testingConfirmPollMs, signal);
    }

    this.logger.warn({ broadcastId }, "Broadcast not confirmed in testing; going live anyway");
  }

  private async enterLive(broadcastId: string, ingestId: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    try {
      await this.broadcasts.transitionBroadcast(broadcastId, "live");
      this.logger.info({ broadcastId }, "Broadcast is live");
      return;
    } catch (error) {
      const context = await this.describeRemoteState(broadcastId, ingestId);
      this.logger.warn({ broadcastId, ...context, reason: errorMessage(error) }, "Transition to live failed; retrying");
    }

    await napFor(this.clock, RECONCILER_TIMINGS.liveRetryDelayMs, signal);

    try {
      await this.broadcasts.transitionBroadcast(broadcastId, "live");
      this.logger.info({ broadcastId }, "Broadcast is live");
    } catch (error) {
      this.logger.error(
        { broadcastId, reason: errorMessage(error) },
        "Second transition to live failed; continuing with health checks"
      );
    }
  }

  private async describeRemoteState(
    broadcastId: string,
    ingestId: string
  ): Promise<{ lifecycle: string | null; streamStatus: string | null; health: string | null }> {
    let lifecycle: string | null = null;
    let streamStatus: string | null = null;
    let health: string | null = null;

    try {
      lifecycle = await this.broadcasts.getBroadcastLifecycle(broadcastId);
      const reading = await this.broadcasts.getIngestStatus(ingestId);
      streamStatus = reading.status;
      health = reading.health;
    } catch (error) {
      this.logger.debug({ broadcastId, reason: errorMessage(error) }, "Could not read remote state");
    }

    return { lifecycle, streamStatus, health };
  }

  /** The slot activation while it is still ahead, otherwise a short lead from now. */
  private scheduledStartFor(slot: ScheduleSlot, now: Date): Date {
    if (slot.mode === "fixed" && slot.activation.getTime() > now.getTime()) {
      return slot.activation;
    }

    return new Date(now.getTime() + RECONCILER_TIMINGS.rollingStartLeadMs);
  }

  private titleFor(slot: ScheduleSlot, now: Date): string {
    const at = slot.mode === "fixed" ? slot.activation : now;
    return buildBroadcastTitle(this.config.broadcast.titlePrefix, this.config.timeZone, at);
  }
}
