import { loadConfiguration, TargetRegistry } from "./config";
import { ContentHashStore } from "./content-hash-store";
import { EventLog } from "./event-log";
import { createKeepAliveAgents } from "./http";
import type { Logger } from "./logger";
import {
  createMaintenanceTasks,
  persistState,
  resolveDataPaths,
  type DataPaths,
} from "./maintenance";
import { Probe, type ProbeRunner } from "./probe";
import { acquireProcessLock } from "./process-lock";
import { MonitorScheduler, type SchedulerCommand } from "./scheduler";
import { loadStateFile, validateCircuitBreakerState } from "./state-files";
import { ObservationStore } from "./storage";
import { HealthSupervisor } from "./supervisor";

/** Where OS signals come from. `process` in production. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface MonitorOptions {
  configDir: string;
  dataDir: string;
  logger: Logger;
  signals?: SignalSource;
  /** Replaces the HTTP probe, mainly for tests. */
  probe?: ProbeRunner;
  now?: () => number;
  pid?: number;
}

export interface RunningMonitor {
  readonly scheduler: MonitorScheduler;
  readonly supervisor: HealthSupervisor;
  readonly eventLog: EventLog;
  readonly paths: DataPaths;
  /** Settles once the monitor has drained and released its lock. */
  readonly done: Promise<void>;
  shutdown(): Promise<void>;
}

const SIGNAL_COMMANDS: ReadonlyArray<[NodeJS.Signals, SchedulerCommand]> = [
  ["SIGTERM", { type: "shutdown" }],
  ["SIGINT", { type: "shutdown" }],
  ["SIGHUP", { type: "reload" }],
  ["SIGUSR2", { type: "maintenance" }],
];

async function restoreState(
  paths: DataPaths,
  scheduler: MonitorScheduler,
  contentStore: ContentHashStore,
  logger: Logger,
): Promise<void> {
  try {
    const restored = await contentStore.load(paths.contentHashStatePath);
    logger.debug({ restored }, "Restored content hashes");
  } catch (error) {
    logger.warn({ err: error, path: paths.contentHashStatePath }, "Ignoring unreadable content hash state");
  }

  try {
    const snapshots = await loadStateFile(paths.circuitBreakerStatePath, validateCircuitBreakerState);
    scheduler.breakers.restore(snapshots);
    logger.debug({ restored: snapshots.length }, "Restored circuit breakers");
  } catch (error) {
    logger.warn({ err: error, path: paths.circuitBreakerStatePath }, "Ignoring unreadable circuit breaker state");
  }
}

/**
 * Wires configuration, persisted state, the probe, the scheduler and the
 * supervisor together and starts monitoring in this process. Signals are
 * translated into scheduler commands; the loop never sees them.
 */
export async function startMonitor(options: MonitorOptions): Promise<RunningMonitor> {
  const { configDir, dataDir, logger } = options;
  const now = options.now ?? Date.now;
  const signals: SignalSource = options.signals ?? process;
  const pid = options.pid ?? process.pid;

  const configuration = await loadConfiguration({ configDir, requireTargets: true });
  const { settings } = configuration;
  const paths = resolveDataPaths(dataDir);
  const lock = await acquireProcessLock(paths.lockPath, { pid });

  const agents = createKeepAliveAgents({ connectionsPerOrigin: settings.maxConcurrentChecks });
  const eventLog = new EventLog({ path: paths.logPath, level: settings.logLevel, now: () => new Date(now()) });
  const contentStore = new ContentHashStore();
  const probe =
    options.probe ??
    new Probe(
      {
        slowResponseThresholdMs: settings.slowResponseThresholdMs,
        criticalResponseThresholdMs: settings.criticalResponseThresholdMs,
      },
      { keepAliveAgents: agents, contentStore, env: process.env },
    );

  const scheduler = new MonitorScheduler({
    registry: new TargetRegistry(configuration.targets),
    settings,
    probe,
    eventLog,
    contentStore,
    observations: new ObservationStore(),
    logger: logger.child({ component: "scheduler" }),
    loadConfiguration: () => loadConfiguration({ configDir }),
    maintenanceTasks: createMaintenanceTasks(paths),
    statusPath: paths.statusPath,
    now,
  });
  const supervisor = new HealthSupervisor({
    loop: scheduler,
    eventLog,
    logger: logger.child({ component: "supervisor" }),
    intervalMs: settings.healthCheckIntervalSeconds * 1_000,
    maxFailures: settings.healthMaxFailures,
    staleAfterMs: settings.healthStaleAfterSeconds * 1_000,
    now,
  });

  try {
    await restoreState(paths, scheduler, contentStore, logger);
    for (const warning of configuration.warnings) {
      await eventLog.append({ message: warning, finalStatus: "CONFIG_WARNING" });
    }
    await eventLog.append({
      message: `Monitor started (PID ${pid}, ${configuration.targets.length} targets)`,
      finalStatus: "MONITOR_STARTED",
    });
  } catch (error) {
    await agents.close();
    await lock.release();
    throw error;
  }

  const listeners = SIGNAL_COMMANDS.map(([signal, command]) => {
    const listener = () => {
      logger.info({ signal, command: command.type }, "Received signal");
      scheduler.send(command);
    };
    signals.on(signal, listener);
    return { signal, listener };
  });

  const drain = async (): Promise<void> => {
    try {
      await supervisor.stop();
      await persistState(paths, scheduler.breakers, contentStore, new Date(now()));
      await eventLog.append({ message: "Monitor stopped", finalStatus: "MONITOR_STOPPED" });
      await eventLog.flush();
    } finally {
      for (const { signal, listener } of listeners) {
        signals.off(signal, listener);
      }
      await agents.close();
      await lock.release();
      logger.info({ pid }, "Monitor stopped");
    }
  };

  const done = scheduler.start().then(drain);
  supervisor.start();
  logger.info({ pid, targets: configuration.targets.length, configDir, dataDir }, "Monitor started");

  return {
    scheduler,
    supervisor,
    eventLog,
    paths,
    done,
    async shutdown() {
      scheduler.send({ type: "shutdown" });
      await done;
    },
  };
}
