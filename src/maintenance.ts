import { promises as fs } from "node:fs";
import { join } from "node:path";

import type { CircuitBreakerRegistry } from "./circuit-breaker";
import type { MonitorSettings } from "./config";
import type { ContentHashStore } from "./content-hash-store";
import type { EventLog } from "./event-log";
import { saveStateFile } from "./state-files";
import type { ObservationStore } from "./storage";

export const MAINTENANCE_CONTEXT = "DAEMON_MAINTENANCE";

export interface MaintenanceContext {
  now: Date;
  settings: MonitorSettings;
  /** Keys of the currently configured targets. */
  activeKeys: ReadonlySet<string>;
  breakers: CircuitBreakerRegistry;
  contentStore: ContentHashStore;
  observations: ObservationStore;
  eventLog: EventLog;
}

export interface MaintenanceTask {
  name: string;
  /** Returns a short summary for the completion event. */
  run(context: MaintenanceContext): Promise<string>;
}

export interface DataPaths {
  dataDir: string;
  logPath: string;
  statusPath: string;
  lockPath: string;
  tempDir: string;
  circuitBreakerStatePath: string;
  contentHashStatePath: string;
}

export function resolveDataPaths(dataDir: string): DataPaths {
  return {
    dataDir,
    logPath: join(dataDir, "logs", "monitor.log"),
    statusPath: join(dataDir, "monitor.status.json"),
    lockPath: join(dataDir, "monitor.lock"),
    tempDir: join(dataDir, "temp"),
    circuitBreakerStatePath: join(dataDir, "circuit-breakers.json"),
    contentHashStatePath: join(dataDir, "content-hashes.json"),
  };
}

/** Removes regular files in `directory` last modified before `cutoff`. */
export async function removeFilesOlderThan(directory: string, cutoff: number): Promise<number> {
  let names: string[];
  try {
    names = await fs.readdir(directory);
  } catch (error) {
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
      return 0;
    }
    throw error;
  }

  let removed = 0;
  for (const name of names) {
    const path = join(directory, name);
    const stats = await fs.stat(path);
    if (stats.isFile() && stats.mtimeMs < cutoff) {
      await fs.rm(path, { force: true });
      removed += 1;
    }
  }
  return removed;
}

export async function persistState(
  paths: Pick<DataPaths, "circuitBreakerStatePath" | "contentHashStatePath">,
  breakers: CircuitBreakerRegistry,
  contentStore: ContentHashStore,
  now: Date,
): Promise<void> {
  await saveStateFile(paths.circuitBreakerStatePath, breakers.snapshot(), now);
  await contentStore.persist(paths.contentHashStatePath, now);
}

export function createMaintenanceTasks(paths: DataPaths): MaintenanceTask[] {
  return [
    {
      name: "log rotation",
      async run({ eventLog, settings }) {
        const rotated = await eventLog.rotate(settings.maxLogSizeMb, settings.maxLogFiles);
        return rotated ? "event log rotated" : "event log below size threshold";
      },
    },
    {
      name: "log retention",
      async run({ eventLog, settings, now }) {
        const result = await eventLog.prune(settings.logRetentionDays, now);
        return `removed ${result.removed} entries and ${result.removedFiles} rotated files`;
      },
    },
    {
      name: "temp cleanup",
      async run({ settings, now }) {
        const cutoff = now.getTime() - settings.tempFileMaxAgeHours * 3_600_000;
        const removed = await removeFilesOlderThan(paths.tempDir, cutoff);
        return `removed ${removed} temp files`;
      },
    },
    {
      name: "state pruning",
      async run({ activeKeys, breakers, contentStore, observations, settings, now }) {
        const breakersRemoved = breakers.prune(activeKeys);
        const hashesRemoved = contentStore.prune(activeKeys);
        observations.retainOnly(activeKeys);
        observations.pruneOlderThan(now.getTime() - settings.statsWindowHours * 3_600_000);
        return `pruned ${breakersRemoved} breakers and ${hashesRemoved} content hashes`;
      },
    },
    {
      name: "state snapshot",
      async run({ breakers, contentStore, now }) {
        await persistState(paths, breakers, contentStore, now);
        return `saved ${breakers.snapshot().length} breakers and ${contentStore.size} content hashes`;
      },
    },
  ];
}
