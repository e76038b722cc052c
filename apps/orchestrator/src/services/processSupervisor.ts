import fs from "node:fs";
import path from "node:path";
import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import { setTimeout as delay } from "node:timers/promises";

import dateFormat from "dateformat";
import type { Logger } from "pino";

import { errorMessage } from "../errors.js";
import type { Clock } from "./clock.js";

export type ProcessPoll =
  | { state: "running" }
  | { state: "exited"; code: number | null; signal: NodeJS.Signals | null };

export interface ProcessHandle {
  readonly pid: number | undefined;
  poll(): ProcessPoll;
  terminate(): void;
  kill(): void;
  waitForExit(timeoutMs: number): Promise<boolean>;
}

export type SinkTarget = {
  fd: number | null;
  filePath: string | null;
};

export interface LogSink {
  open(): SinkTarget;
}

/** A transcoder command plus where its output goes; reused for every restart. */
export type TranscoderLaunch = {
  argv: readonly string[];
  sink: LogSink;
};

export type SpawnFn = (file: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export type GroupSignaller = (child: ChildProcess, signal: NodeJS.Signals) => void;

export const signalProcessGroup: GroupSignaller = (child, signal) => {
  if (process.platform !== "win32" && child.pid !== undefined) {
    process.kill(-child.pid, signal);
    return;
  }

  child.kill(signal);
};

export class FileLogSink implements LogSink {
  constructor(
    private readonly logDir: string,
    private readonly prefix: string,
    private readonly clock: Clock
  ) {}

  open(): SinkTarget {
    fs.mkdirSync(this.logDir, { recursive: true });
    const stamp = dateFormat(this.clock.now(), "yyyymmdd-HHMMss");
    const filePath = path.join(this.logDir, `${this.prefix}-${stamp}.log`);

    return { fd: fs.openSync(filePath, "a"), filePath };
  }
}

export const discardLogSink: LogSink = {
  open: () => ({ fd: null, filePath: null })
};

class ChildProcessHandle implements ProcessHandle {
  private exit: { code: number | null; signal: NodeJS.Signals | null } | null = null;
  private readonly exitWaiters = new Set<() => void>();

  constructor(
    private readonly child: ChildProcess,
    private readonly signalGroup: GroupSignaller,
    private readonly logger: Logger
  ) {
    child.once("exit", (code, signal) => {
      this.markExited(code, signal);
    });

    child.on("error", (error) => {
      this.logger.error({ pid: child.pid, err: error }, "Transcoder process error");
      if (child.pid === undefined) {
        this.markExited(null, null);
      }
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  poll(): ProcessPoll {
    if (!this.exit) {
      return { state: "running" };
    }

    return { state: "exited", code: this.exit.code, signal: this.exit.signal };
  }

  terminate(): void {
    this.signalGroup(this.child, "SIGTERM");
  }

  kill(): void {
    this.signalGroup(this.child, "SIGKILL");
  }

  async waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exit) {
      return true;
    }

    const timer = new AbortController();
    let waiter: (() => void) | undefined;

    const exited = new Promise<boolean>((resolve) => {
      waiter = () => resolve(true);
      this.exitWaiters.add(waiter);
    });
    const timedOut = delay(timeoutMs, false, { signal: timer.signal }).catch(() => false);

    try {
      return await Promise.race([exited, timedOut]);
    } finally {
      timer.abort();
      if (waiter) {
        this.exitWaiters.delete(waiter);
      }
    }
  }

  private markExited(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exit) {
      return;
    }

    this.exit = { code, signal };
    for (const waiter of this.exitWaiters) {
      waiter();
    }
    this.exitWaiters.clear();
  }
}

export type ProcessSupervisorOptions = {
  logger: Logger;
  spawnProcess?: SpawnFn;
  signalGroup?: GroupSignaller;
  stopTimeoutMs?: number;
};

export class ProcessSupervisor {
  private readonly logger: Logger;
  private readonly spawnProcess: SpawnFn;
  private readonly signalGroup: GroupSignaller;
  private readonly stopTimeoutMs: number;

  constructor(options: ProcessSupervisorOptions) {
    this.logger = options.logger;
    this.spawnProcess = options.spawnProcess ?? ((file, args, spawnOptions) => spawn(file, args, spawnOptions));
    this.signalGroup = options.signalGroup ?? signalProcessGroup;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 10_000;
  }

  /** Launches `argv` as the leader of a new process group. */
  start(argv: readonly string[], sink: LogSink): ProcessHandle {
    const [file, ...args] = argv;
    if (!file) {
      throw new Error("Transcoder command is empty");
    }

    const target = sink.open();
    const output = target.fd ?? "ignore";
    let child: ChildProcess;

    try {
      child = this.spawnProcess(file, args, {
        detached: true,
        stdio: ["ignore", output, output]
      });
    } finally {
      if (target.fd !== null) {
        fs.closeSync(target.fd);
      }
    }

    const handle = new ChildProcessHandle(child, this.signalGroup, this.logger);
    this.logger.info({ pid: child.pid, log: target.filePath }, "Transcoder started");
    return handle;
  }

  poll(handle: ProcessHandle): ProcessPoll {
    return handle.poll();
  }

  /**
   * SIGTERM to the group, then SIGKILL once the grace period runs out.
   * Signalling failures are expected when the group is already gone.
   */
  async stop(handle: ProcessHandle | null): Promise<void> {
    if (!handle || handle.poll().state === "exited") {
      return;
    }

    try {
      handle.terminate();
    } catch (error) {
      this.logger.debug({ pid: handle.pid, reason: errorMessage(error) }, "SIGTERM failed");
    }

    if (await handle.waitForExit(this.stopTimeoutMs)) {
      this.logger.info({ pid: handle.pid }, "Transcoder stopped");
      return;
    }

    this.logger.warn({ pid: handle.pid, graceMs: this.stopTimeoutMs }, "Transcoder ignored SIGTERM; killing group");

    try {
      handle.kill();
    } catch (error) {
      this.logger.debug({ pid: handle.pid, reason: errorMessage(error) }, "SIGKILL failed");
    }

    await handle.waitForExit(this.stopTimeoutMs);
  }
}

export type TranscoderSupervisor = Pick<ProcessSupervisor, "start" | "poll" | "stop">;
