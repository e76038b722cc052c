import { EventEmitter } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { silentLogger } from "../logger.js";
import { FakeClock } from "../testing/fakes.js";
import { FileLogSink, ProcessSupervisor, discardLogSink, type GroupSignaller } from "./processSupervisor.js";

class FakeChild extends EventEmitter {
  pid: number | undefined = 4321;
  kill = vi.fn();
}

const createSupervisor = (child: FakeChild, signalGroup: GroupSignaller, stopTimeoutMs = 20) => {
  const spawnProcess = vi.fn().mockReturnValue(child);
  const supervisor = new ProcessSupervisor({
    logger: silentLogger(),
    spawnProcess,
    signalGroup,
    stopTimeoutMs
  });

  return { supervisor, spawnProcess };
};

describe("ProcessSupervisor", () => {
  it("starts the command as a detached group leader", () => {
    const child = new FakeChild();
    const { supervisor, spawnProcess } = createSupervisor(child, vi.fn());

    const handle = supervisor.start(["/usr/bin/ffmpeg", "-i", "rtsp://camera.local/stream"], discardLogSink);

    expect(spawnProcess).toHaveBeenCalledWith("/usr/bin/ffmpeg", ["-i", "rtsp://camera.local/stream"], {
      detached: true,
      stdio: ["ignore", "ignore", "ignore"]
    });
    expect(handle.pid).toBe(4321);
    expect(supervisor.poll(handle)).toEqual({ state: "running" });
  });

  it("rejects an empty command", () => {
    const { supervisor } = createSupervisor(new FakeChild(), vi.fn());

    expect(() => supervisor.start([], discardLogSink)).toThrow("Transcoder command is empty");
  });

  it("reports the exit code once the child exits", () => {
    const child = new FakeChild();
    const { supervisor } = createSupervisor(child, vi.fn());
    const handle = supervisor.start(["ffmpeg"], discardLogSink);

    child.emit("exit", 1, null);

    expect(supervisor.poll(handle)).toEqual({ state: "exited", code: 1, signal: null });
  });

  it("treats a spawn failure as an exit without a code", () => {
    const child = new FakeChild();
    child.pid = undefined;
    const { supervisor } = createSupervisor(child, vi.fn());
    const handle = supervisor.start(["missing-binary"], discardLogSink);

    child.emit("error", new Error("spawn missing-binary ENOENT"));

    expect(supervisor.poll(handle)).toEqual({ state: "exited", code: null, signal: null });
  });

  it("stops with SIGTERM when the group exits in time", async () => {
    const child = new FakeChild();
    const signalGroup = vi.fn<GroupSignaller>((target, signal) => {
      target.emit("exit", null, signal);
    });
    const { supervisor } = createSupervisor(child, signalGroup);
    const handle = supervisor.start(["ffmpeg"], discardLogSink);

    await supervisor.stop(handle);

    expect(signalGroup.mock.calls.map(([, signal]) => signal)).toEqual(["SIGTERM"]);
    expect(supervisor.poll(handle)).toEqual({ state: "exited", code: null, signal: "SIGTERM" });
  });

  it("escalates to SIGKILL when SIGTERM is ignored", async () => {
    const child = new FakeChild();
    const signalGroup = vi.fn<GroupSignaller>((target, signal) => {
      if (signal === "SIGKILL") {
        target.emit("exit", null, signal);
      }
    });
    const { supervisor } = createSupervisor(child, signalGroup);
    const handle = supervisor.start(["ffmpeg"], discardLogSink);

    await supervisor.stop(handle);

    expect(signalGroup.mock.calls.map(([, signal]) => signal)).toEqual(["SIGTERM", "SIGKILL"]);
  });

  it("has no effect on null, stopped or twice-stopped handles", async () => {
    const child = new FakeChild();
    const signalGroup = vi.fn<GroupSignaller>((target, signal) => {
      target.emit("exit", null, signal);
    });
    const { supervisor } = createSupervisor(child, signalGroup);
    const handle = supervisor.start(["ffmpeg"], discardLogSink);

    await supervisor.stop(null);
    await supervisor.stop(handle);
    await supervisor.stop(handle);

    expect(signalGroup).toHaveBeenCalledTimes(1);
  });

  it("still waits when signalling fails", async () => {
    const child = new FakeChild();
    const signalGroup = vi.fn<GroupSignaller>(() => {
      throw new Error("kill ESRCH");
    });
    const { supervisor } = createSupervisor(child, signalGroup);
    const handle = supervisor.start(["ffmpeg"], discardLogSink);

    await expect(supervisor.stop(handle)).resolves.toBeUndefined();
    expect(signalGroup).toHaveBeenCalledTimes(2);
  });
});

describe("FileLogSink", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("opens a new timestamped log file per start", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "relaycam-logs-"));
    dirs.push(dir);
    const sink = new FileLogSink(path.join(dir, "logs"), "ffmpeg", new FakeClock("2026-03-10T08:05:09.000Z"));

    const target = sink.open();

    expect(target.fd).toEqual(expect.any(Number));
    expect(target.filePath).not.toBeNull();
    expect(path.basename(target.filePath ?? "")).toMatch(/^ffmpeg-\d{8}-\d{6}\.log$/);
    expect(fs.existsSync(target.filePath ?? "")).toBe(true);

    if (target.fd !== null) {
      fs.closeSync(target.fd);
    }
  });
});
