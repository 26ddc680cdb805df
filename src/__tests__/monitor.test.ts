import { EventEmitter } from "node:events";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ConfigError } from "../config";
import type { ProbeResult } from "../domain";
import { AlreadyRunningError } from "../errors";
import { createSilentLogger } from "../logger";
import { startMonitor } from "../monitor";
import type { ProbeRunner, ProbeTarget } from "../probe";
import { readLockPid } from "../process-lock";
import { readStatusSnapshot } from "../status";

class UpProbe implements ProbeRunner {
  readonly calls: string[] = [];

  async execute(target: ProbeTarget): Promise<ProbeResult> {
    this.calls.push(target.url);
    return {
      url: target.url,
      checkedAt: new Date(),
      httpStatus: 200,
      responseTimeMs: 42,
      status: "UP",
      statusDescription: "OK",
    };
  }
}

describe("startMonitor", () => {
  let root: string;
  let configDir: string;
  let dataDir: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "sitewarden-monitor-"));
    configDir = join(root, "config");
    dataDir = join(root, "data");
    await mkdir(configDir, { recursive: true });
    await writeFile(join(configDir, "monitor.conf"), "SCAN_INTERVAL=5\nLOG_LEVEL=INFO\n");
    await writeFile(join(configDir, "websites.conf"), "# name and interval\nhttps://example.com/|Example|60|10|false\n");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("monitors until SIGTERM, reloading on SIGHUP and persisting state on the way out", async () => {
    const signals = new EventEmitter();
    const probe = new UpProbe();

    const monitor = await startMonitor({
      configDir,
      dataDir,
      logger: createSilentLogger(),
      signals,
      probe,
      pid: 4242,
    });

    expect(await readLockPid(monitor.paths.lockPath)).toBe(4242);
    await vi.waitFor(() => {
      expect(probe.calls).toEqual(["https://example.com/"]);
    });

    signals.emit("SIGHUP");
    await vi.waitFor(async () => {
      expect(await monitor.eventLog.collect({ statuses: ["CONFIG_RELOADED"] })).toHaveLength(1);
    });

    signals.emit("SIGTERM");
    await monitor.done;

    expect(signals.listenerCount("SIGTERM")).toBe(0);
    expect(await readLockPid(monitor.paths.lockPath)).toBeUndefined();

    const entries = await monitor.eventLog.collect();
    expect(entries[0]).toMatchObject({
      finalStatus: "MONITOR_STARTED",
      message: "Monitor started (PID 4242, 1 targets)",
    });
    expect(entries[entries.length - 1]).toMatchObject({ finalStatus: "MONITOR_STOPPED", message: "Monitor stopped" });

    const snapshot = await readStatusSnapshot(monitor.paths.statusPath);
    expect(snapshot?.targets).toMatchObject([{ url: "https://example.com/", name: "Example", check_count: 1 }]);

    const breakers: unknown = JSON.parse(await readFile(monitor.paths.circuitBreakerStatePath, "utf8"));
    expect(breakers).toMatchObject({ version: 1, entries: [] });
  });

  it("refuses to start without any valid target", async () => {
    await writeFile(join(configDir, "websites.conf"), "# nothing configured\n");

    const attempt = startMonitor({ configDir, dataDir, logger: createSilentLogger(), signals: new EventEmitter() });

    await expect(attempt).rejects.toBeInstanceOf(ConfigError);
    await expect(attempt).rejects.toMatchObject({ exitCode: 5 });
    expect(await readLockPid(join(dataDir, "monitor.lock"))).toBeUndefined();
  });

  it("refuses to start while another live monitor holds the lock", async () => {
    await mkdir(dataDir, { recursive: true });
    await writeFile(join(dataDir, "monitor.lock"), `${process.pid}\n`);

    const attempt = startMonitor({
      configDir,
      dataDir,
      logger: createSilentLogger(),
      signals: new EventEmitter(),
      probe: new UpProbe(),
      pid: 999_999,
    });

    await expect(attempt).rejects.toBeInstanceOf(AlreadyRunningError);
    expect(await readLockPid(join(dataDir, "monitor.lock"))).toBe(process.pid);
  });
});
