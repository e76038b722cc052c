import type { BroadcastLifecycle, BroadcastService, OrchestratorConfig, ScheduleSlot } from "@relaycam/shared";
import { canTransitionBroadcast, nextSlot } from "@relaycam/shared";
import type { Logger } from "pino";

import { FatalError, ShutdownRequestedError, errorMessage } from "../errors.js";
import type { BroadcastReconciler } from "./broadcastReconciler.js";
import { napFor, napUntil, type Clock } from "./clock.js";
import type { HealthMonitor } from "./healthMonitor.js";
import type { TranscoderLaunch, TranscoderSupervisor } from "./processSupervisor.js";

export const ROTATION_DELAY_MS = 5_000;
export const CYCLE_BACKOFF_MS = 15_000;

export type CycleEnding = "deadline" | "exit-ceiling" | "abandoned";

export type CycleReport = {
  slot: ScheduleSlot;
  broadcastId: string;
  ingestId: string;
  ending: CycleEnding;
};

export type OrchestratorDriverDeps = {
  config: OrchestratorConfig;
  broadcasts: BroadcastService;
  supervisor: TranscoderSupervisor;
  reconciler: Pick<BroadcastReconciler, "reconcile">;
  healthMonitor: Pick<HealthMonitor, "run">;
  clock: Clock;
  logger: Logger;
  streamKey: string;
  launch: TranscoderLaunch;
};

export class OrchestratorDriver {
  private readonly config: OrchestratorConfig;
  private readonly broadcasts: BroadcastService;
  private readonly supervisor: TranscoderSupervisor;
  private readonly reconciler: Pick<BroadcastReconciler, "reconcile">;
  private readonly healthMonitor: Pick<HealthMonitor, "run">;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly streamKey: string;
  private readonly launch: TranscoderLaunch;

  private ingestId: string | null;
  /** Fixed mode only: the slot activation the next cycle should pick up from. */
  private resumeAt: Date | null = null;

  constructor(deps: OrchestratorDriverDeps) {
    this.config = deps.config;
    this.broadcasts = deps.broadcasts;
    this.supervisor = deps.supervisor;
    this.reconciler = deps.reconciler;
    this.healthMonitor = deps.healthMonitor;
    this.clock = deps.clock;
    this.logger = deps.logger;
    this.streamKey = deps.streamKey;
    this.launch = deps.launch;
    this.ingestId = deps.config.ingestId;
  }

  /**
   * Runs cycles until a fatal error or a shutdown request. Anything else
   * escaping a cycle is logged and retried after a backoff.
   */
  async run(signal?: AbortSignal): Promise<never> {
    for (;;) {
      try {
        await this.runCycle(signal);
      } catch (error) {
        if (error instanceof FatalError || error instanceof ShutdownRequestedError || signal?.aborted) {
          throw error;
        }

        this.logger.error(
          { reason: errorMessage(error), backoffMs: CYCLE_BACKOFF_MS },
          "Cycle failed; retrying after backoff"
        );
        await napFor(this.clock, CYCLE_BACKOFF_MS, signal);
      }
    }
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    signal?.throwIfAborted();
    const slot = this.planSlot();
    this.logger.info(
      { mode: slot.mode, activation: slot.activation.toISOString(), deadline: slot.deadline.toISOString() },
      "Planned slot"
    );

    if (slot.mode === "fixed") {
      const startAt = new Date(slot.activation.getTime() - this.config.prerollSec * 1000);
      if (startAt.getTime() > this.clock.now().getTime()) {
        this.logger.info({ startAt: startAt.toISOString() }, "Sleeping until preroll");
        await napUntil(this.clock, startAt, signal);
      }
    }

    signal?.throwIfAborted();
    const ingestId = await this.broadcasts.ensureIngest(this.ingestId);
    this.ingestId = ingestId;

    const outcome = await this.reconciler.reconcile({
      slot,
      ingestId,
      streamKey: this.streamKey,
      launch: this.launch,
      signal
    });
    this.ingestId = outcome.ingestId;

    if (outcome.status === "abandoned") {
      this.logger.warn({ broadcastId: outcome.broadcastId, reason: outcome.reason }, "Cycle abandoned");
      this.markCycleEnd(slot);
      await napFor(this.clock, ROTATION_DELAY_MS, signal);
      return { slot, broadcastId: outcome.broadcastId, ingestId: outcome.ingestId, ending: "abandoned" };
    }

    const result = await this.healthMonitor.run({
      deadline: slot.deadline,
      ingestId: outcome.ingestId,
      handle: outcome.handle,
      launch: this.launch,
      signal
    });

    await this.supervisor.stop(result.handle);
    await this.completeBroadcast(outcome.broadcastId);
    this.markCycleEnd(slot);

    this.logger.info({ broadcastId: outcome.broadcastId, ending: result.reason }, "Cycle finished");
    await napFor(this.clock, ROTATION_DELAY_MS, signal);

    return { slot, broadcastId: outcome.broadcastId, ingestId: outcome.ingestId, ending: result.reason };
  }

  private planSlot(): ScheduleSlot {
    const options = { timeZone: this.config.timeZone, rotationHours: this.config.rotationHours };
    const now = this.clock.now();

    if (this.config.schedule.mode === "fixed" && this.resumeAt) {
      const resumed = nextSlot(this.config.schedule, options, new Date(this.resumeAt.getTime() - 1000));
      if (resumed.deadline.getTime() > now.getTime()) {
        return resumed;
      }
    }

    return nextSlot(this.config.schedule, options, now);
  }

  /** A slot cut short is retried; a finished one hands over to the slot starting at its deadline. */
  private markCycleEnd(slot: ScheduleSlot): void {
    if (slot.mode !== "fixed") {
      this.resumeAt = null;
      return;
    }

    this.resumeAt = this.clock.now().getTime() < slot.deadline.getTime() ? slot.activation : slot.deadline;
  }

  private async completeBroadcast(broadcastId: string): Promise<void> {
    let lifecycle: BroadcastLifecycle | null = null;
    try {
      lifecycle = await this.broadcasts.getBroadcastLifecycle(broadcastId);
    } catch (error) {
      this.logger.warn({ broadcastId, reason: errorMessage(error) }, "Could not read broadcast lifecycle");
    }

    if (lifecycle && !canTransitionBroadcast(lifecycle, "complete")) {
      this.logger.info({ broadcastId, lifecycle }, "Skipping transition to complete");
      return;
    }

    try {
      await this.broadcasts.transitionBroadcast(broadcastId, "complete");
      this.logger.info({ broadcastId }, "Broadcast completed");
    } catch (error) {
      this.logger.warn({ broadcastId, reason: errorMessage(error) }, "Transition to complete failed");
    }
  }
}
