import { CircuitBreakerRegistry, type CircuitEvent } from "./circuit-breaker";
import type { LoadedConfiguration, MonitorSettings, TargetRegistry } from "./config";
import type { ContentHashStore } from "./content-hash-store";
import {
  targetStatusFromProbe,
  type ProbeResult,
  type Target,
  type TargetRuntimeState,
} from "./domain";
import { formatIncidentDuration } from "./duration";
import type { EventInput, EventLog } from "./event-log";
import { createConcurrencyLimiter } from "./http";
import type { Logger } from "./logger";
import { MAINTENANCE_CONTEXT, type MaintenanceTask } from "./maintenance";
import { probeWithRetry, type ProbeRunner } from "./probe";
import { retryOperation, type RetryHooks, type RetryOptions } from "./retry";
import { writeFileAtomic } from "./state-files";
import type { MonitorStatusSnapshot, TargetStatusRow } from "./status";
import type { ObservationStore } from "./storage";
import { VERSION } from "./version";

export type { ProbeRunner } from "./probe";

export type SchedulerCommand =
  | { type: "reload" }
  | { type: "maintenance" }
  | { type: "shutdown" };

export interface MonitorSchedulerOptions {
  registry: TargetRegistry;
  settings: MonitorSettings;
  probe: ProbeRunner;
  eventLog: EventLog;
  contentStore: ContentHashStore;
  observations: ObservationStore;
  logger: Logger;
  /** Re-reads configuration for the reload command. */
  loadConfiguration?: () => Promise<LoadedConfiguration>;
  maintenanceTasks?: MaintenanceTask[];
  /** Where the status snapshot is written after every cycle. */
  statusPath?: string;
  /** Custom clock in epoch milliseconds. */
  now?: () => number;
  /** Wait strategy for retry delays, mainly for tests. */
  retryWait?: RetryOptions["wait"];
  setTimeoutFn?: (callback: () => void, delay: number) => ReturnType<typeof setTimeout>;
  clearTimeoutFn?: (handle: ReturnType<typeof setTimeout>) => void;
}

export interface CycleReport {
  due: number;
  dispatched: number;
  blocked: number;
  results: ProbeResult[];
}

interface CompletedProbe {
  target: Target;
  result: ProbeResult;
  completedAt: number;
}

const PERSISTENT_DOWNTIME_EVERY = 5;
const MAINTENANCE_RETRIES = 2;
const MAINTENANCE_RETRY_DELAY_MS = 1_000;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function initialState(now: number): TargetRuntimeState {
  return {
    lastCheckAt: 0,
    nextDueAt: now,
    checkCount: 0,
    consecutiveErrors: 0,
    lastStatus: "unknown",
  };
}

function toIso(epochMs: number | undefined): string | null {
  return epochMs === undefined || epochMs === 0 ? null : new Date(epochMs).toISOString();
}

/**
 * Owns per-target runtime state and drives the scan loop: dispatch due
 * targets through the breaker gate and the concurrency cap, wait for the
 * whole cycle, then apply outcomes in one place. Control requests arrive as
 * commands and are handled between cycles.
 */
export class MonitorScheduler {
  private readonly registry: TargetRegistry;
  private settings: MonitorSettings;
  private readonly probe: ProbeRunner;
  private readonly eventLog: EventLog;
  private readonly contentStore: ContentHashStore;
  private readonly observations: ObservationStore;
  private readonly logger: Logger;
  private readonly loadConfiguration?: () => Promise<LoadedConfiguration>;
  private readonly maintenanceTasks: MaintenanceTask[];
  private readonly statusPath?: string;
  private readonly now: () => number;
  private readonly retryWait?: RetryOptions["wait"];
  private readonly setTimeoutFn: (callback: () => void, delay: number) => ReturnType<typeof setTimeout>;
  private readonly clearTimeoutFn: (handle: ReturnType<typeof setTimeout>) => void;

  private breakerRegistry: CircuitBreakerRegistry;
  private readonly states = new Map<string, TargetRuntimeState>();
  private readonly commands: SchedulerCommand[] = [];
  private readonly outbox: EventInput[] = [];
  /** Keys whose probe has not settled yet, whichever loop dispatched it. */
  private readonly inFlight = new Set<string>();

  private generation = 0;
  private loop: Promise<void> | null = null;
  private stopRequested = false;
  private wakeSleeper: (() => void) | null = null;
  private startedAt = 0;
  private lastMaintenanceAt = 0;
  private heartbeatAt = 0;
  private resolveStopped: () => void = () => {};
  private readonly stopped: Promise<void>;

  constructor(options: MonitorSchedulerOptions) {
    this.registry = options.registry;
    this.settings = options.settings;
    this.probe = options.probe;
    this.eventLog = options.eventLog;
    this.contentStore = options.contentStore;
    this.observations = options.observations;
    this.logger = options.logger;
    this.loadConfiguration = options.loadConfiguration;
    this.maintenanceTasks = options.maintenanceTasks ?? [];
    this.statusPath = options.statusPath;
    this.now = options.now ?? Date.now;
    this.retryWait = options.retryWait;
    this.setTimeoutFn = options.setTimeoutFn ?? ((cb, delay) => setTimeout(cb, delay));
    this.clearTimeoutFn = options.clearTimeoutFn ?? ((handle) => clearTimeout(handle));
    this.breakerRegistry = this.createBreakers();
    this.stopped = new Promise<void>((resolve) => {
      this.resolveStopped = resolve;
    });

    this.syncStates(this.now());
  }

  get breakers(): CircuitBreakerRegistry {
    return this.breakerRegistry;
  }

  get currentSettings(): MonitorSettings {
    return this.settings;
  }

  /** Epoch milliseconds of the last loop iteration, 0 before the first one. */
  get lastHeartbeatAt(): number {
    return this.heartbeatAt;
  }

  get isRunning(): boolean {
    return this.loop !== null && !this.stopRequested;
  }

  getState(key: string): TargetRuntimeState | undefined {
    const state = this.states.get(key);
    return state ? { ...state } : undefined;
  }

  /**
   * Starts the scan loop. The returned promise settles once a shutdown has
   * drained the loop.
   */
  start(): Promise<void> {
    if (this.loop) {
      return this.stopped;
    }

    this.startedAt = this.now();
    this.lastMaintenanceAt = this.startedAt;
    this.heartbeatAt = this.startedAt;
    this.generation += 1;
    this.loop = this.runLoop(this.generation);
    return this.stopped;
  }

  get activeChecks(): number {
    return this.inFlight.size;
  }

  /**
   * Abandons the current loop and starts a fresh one. A cycle still running
   * in the abandoned loop only settles its breakers; its targets stay out of
   * selection until then.
   */
  restart(): void {
    if (!this.loop || this.stopRequested) {
      return;
    }

    this.generation += 1;
    this.heartbeatAt = this.now();
    this.wake();
    this.loop = this.runLoop(this.generation);
  }

  send(command: SchedulerCommand): void {
    if (command.type === "shutdown") {
      this.stopRequested = true;
    }
    this.commands.push(command);
    this.wake();
  }

  async stop(): Promise<void> {
    if (!this.loop) {
      return;
    }
    this.send({ type: "shutdown" });
    await this.stopped;
  }

  /**
   * Runs one dispatch-and-barrier cycle. Exposed for the loop and for tests.
   */
  async runCycle(generation = this.generation): Promise<CycleReport> {
    const startedAt = this.now();
    const cap = this.settings.maxConcurrentChecks;
    const limit = createConcurrencyLimiter(cap);
    const selected: Target[] = [];
    let due = 0;
    let blocked = 0;

    for (const target of this.registry.list()) {
      const state = this.stateFor(target.key, startedAt);
      if (state.nextDueAt > startedAt || this.inFlight.has(target.key)) {
        continue;
      }
      due += 1;

      if (selected.length >= cap) {
        continue;
      }

      const decision = this.breakerRegistry.tryAcquire(target.key, startedAt);
      if (!decision.allowed) {
        state.nextDueAt = startedAt + target.intervalSeconds * 1_000;
        blocked += 1;
        continue;
      }

      selected.push(target);
    }

    for (const target of selected) {
      this.inFlight.add(target.key);
    }

    let completed: CompletedProbe[];
    try {
      await this.flushOutbox();
      completed = await Promise.all(
        selected.map((target) => limit(() => this.runProbe(target))),
      );

      if (generation !== this.generation) {
        for (const { target, result, completedAt } of completed) {
          this.settleBreaker(target, result, completedAt);
        }
      } else {
        for (const outcome of completed) {
          this.applyOutcome(outcome);
        }
      }
    } finally {
      for (const target of selected) {
        this.inFlight.delete(target.key);
      }
    }

    await this.flushOutbox();
    if (generation !== this.generation) {
      return { due, dispatched: selected.length, blocked, results: [] };
    }

    return {
      due,
      dispatched: selected.length,
      blocked,
      results: completed.map((outcome) => outcome.result),
    };
  }

  /** Runs every maintenance task through the retry controller. */
  async runMaintenance(): Promise<void> {
    const now = new Date(this.now());
    this.lastMaintenanceAt = now.getTime();
    const failures: string[] = [];

    for (const task of this.maintenanceTasks) {
      try {
        const summary = await retryOperation(
          () =>
            task.run({
              now,
              settings: this.settings,
              activeKeys: this.registry.keys(),
              breakers: this.breakerRegistry,
              contentStore: this.contentStore,
              observations: this.observations,
              eventLog: this.eventLog,
            }),
          {
            retries: MAINTENANCE_RETRIES,
            backoff: { initialDelayMs: MAINTENANCE_RETRY_DELAY_MS },
            wait: this.retryWait,
            ...this.retryHooks(MAINTENANCE_CONTEXT),
          },
        );
        this.logger.debug({ task: task.name, summary }, "Maintenance task completed");
      } catch (error) {
        failures.push(task.name);
        this.emit({
          message: `Maintenance task ${task.name} failed: ${describeError(error)}`,
          finalStatus: "MAINTENANCE_ERROR",
          url: MAINTENANCE_CONTEXT,
        });
        this.logger.error({ err: error, task: task.name }, "Maintenance task failed");
      }
    }

    if (failures.length === 0) {
      this.emit({
        message: `Maintenance completed (${this.maintenanceTasks.length} tasks)`,
        finalStatus: "MAINTENANCE_COMPLETED",
        url: MAINTENANCE_CONTEXT,
      });
    }

    await this.flushOutbox();
  }

  /**
   * Replaces targets and settings from a fresh configuration load. A failed
   * load keeps the current set.
   */
  async reload(): Promise<boolean> {
    if (!this.loadConfiguration) {
      return false;
    }

    let loaded: LoadedConfiguration;
    try {
      loaded = await this.loadConfiguration();
    } catch (error) {
      this.emit({
        message: `Configuration reload failed, keeping current targets: ${describeError(error)}`,
        finalStatus: "CONFIG_WARNING",
        level: "ERROR",
      });
      this.logger.error({ err: error }, "Configuration reload failed");
      await this.flushOutbox();
      return false;
    }

    this.applyConfiguration(loaded);
    await this.flushOutbox();
    return true;
  }

  applyConfiguration(loaded: LoadedConfiguration): void {
    const previous = this.settings;
    this.settings = loaded.settings;
    this.registry.replace(loaded.targets);
    this.syncStates(this.now());
    this.eventLog.setLevel(loaded.settings.logLevel);
    this.probe.updateThresholds?.({
      slowResponseThresholdMs: loaded.settings.slowResponseThresholdMs,
      criticalResponseThresholdMs: loaded.settings.criticalResponseThresholdMs,
    });

    if (
      previous.circuitBreakerThreshold !== loaded.settings.circuitBreakerThreshold ||
      previous.circuitBreakerTimeoutSeconds !== loaded.settings.circuitBreakerTimeoutSeconds
    ) {
      const snapshot = this.breakerRegistry.snapshot();
      this.breakerRegistry = this.createBreakers();
      this.breakerRegistry.restore(snapshot);
    }

    for (const warning of loaded.warnings) {
      this.emit({ message: warning, finalStatus: "CONFIG_WARNING" });
    }
    this.emit({
      message: `Configuration reloaded: ${loaded.targets.length} targets`,
      finalStatus: "CONFIG_RELOADED",
    });
  }

  snapshot(): MonitorStatusSnapshot {
    const now = this.now();
    const windowMs = this.settings.statsWindowHours * 3_600_000;
    const targets: TargetStatusRow[] = this.registry.list().map((target) => {
      const state = this.stateFor(target.key, now);
      const stats = this.observations.summarize(target.key, now, windowMs);
      const breaker = this.breakerRegistry.getState(target.key);
      return {
        url: target.url,
        name: target.name,
        last_status: state.lastStatus,
        last_response_time_ms: state.lastResponseTimeMs ?? null,
        last_check_timestamp: toIso(state.lastCheckAt),
        next_check_timestamp: toIso(state.nextDueAt),
        uptime_percent: stats.uptimePercent ?? null,
        avg_response_time_ms: stats.avgResponseTimeMs ?? null,
        min_response_time_ms: stats.minResponseTimeMs ?? null,
        max_response_time_ms: stats.maxResponseTimeMs ?? null,
        checks_in_window: stats.checks,
        check_count: state.checkCount,
        consecutive_errors: state.consecutiveErrors,
        circuit_state: breaker.state,
        circuit_failures: breaker.failures,
      };
    });

    return {
      pid: process.pid,
      version: VERSION,
      started_at: new Date(this.startedAt || now).toISOString(),
      updated_at: new Date(now).toISOString(),
      active_checks: this.activeChecks,
      last_maintenance_at: toIso(this.lastMaintenanceAt),
      settings: {
        max_concurrent_checks: this.settings.maxConcurrentChecks,
        scan_interval_seconds: this.settings.scanIntervalSeconds,
        maintenance_interval_seconds: this.settings.maintenanceIntervalSeconds,
        stats_window_hours: this.settings.statsWindowHours,
        log_level: this.settings.logLevel,
      },
      targets,
    };
  }

  async writeStatus(): Promise<void> {
    if (!this.statusPath) {
      return;
    }
    await writeFileAtomic(this.statusPath, `${JSON.stringify(this.snapshot(), null, 2)}\n`);
  }

  private async runLoop(generation: number): Promise<void> {
    while (generation === this.generation) {
      try {
        const proceed = await this.processCommands();
        if (!proceed || generation !== this.generation) {
          break;
        }

        await this.runCycle(generation);
        if (generation !== this.generation) {
          break;
        }

        const maintenanceDueAt =
          this.lastMaintenanceAt + this.settings.maintenanceIntervalSeconds * 1_000;
        if (this.now() >= maintenanceDueAt) {
          await this.runMaintenance();
        }

        await this.writeStatus();
      } catch (error) {
        this.logger.error({ err: error }, "Scheduler cycle failed");
      }

      this.heartbeatAt = this.now();
      if (this.stopRequested) {
        continue;
      }
      await this.sleep(this.settings.scanIntervalSeconds * 1_000);
    }

    if (generation === this.generation && this.stopRequested) {
      this.loop = null;
      this.resolveStopped();
    }
  }

  /** Handles queued commands. Returns false once a shutdown was requested. */
  private async processCommands(): Promise<boolean> {
    while (this.commands.length > 0) {
      const command = this.commands.shift();
      if (!command) {
        break;
      }

      switch (command.type) {
        case "shutdown":
          return false;
        case "reload":
          await this.reload();
          break;
        case "maintenance":
          await this.runMaintenance();
          break;
        default: {
          const exhaustiveCheck: never = command;
          return exhaustiveCheck;
        }
      }
    }

    return !this.stopRequested;
  }

  private sleep(delayMs: number): Promise<void> {
    if (this.commands.length > 0) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const handle = this.setTimeoutFn(() => {
        this.wakeSleeper = null;
        resolve();
      }, delayMs);
      this.wakeSleeper = () => {
        this.clearTimeoutFn(handle);
        this.wakeSleeper = null;
        resolve();
      };
    });
  }

  private wake(): void {
    this.wakeSleeper?.();
  }

  private async runProbe(target: Target): Promise<CompletedProbe> {
    let result: ProbeResult;
    try {
      result = await probeWithRetry(this.probe, target, {
        maxAttempts: this.settings.maxRetryAttempts,
        initialDelayMs: this.settings.retryDelaySeconds * 1_000,
        wait: this.retryWait,
        ...this.retryHooks(target.url),
        contentRetryHooks: this.retryHooks(target.url, "Content fetch"),
      });
    } catch (error) {
      this.logger.error({ err: error, url: target.url }, "Probe raised an unexpected error");
      result = {
        url: target.url,
        checkedAt: new Date(this.now()),
        httpStatus: 0,
        responseTimeMs: 0,
        status: "ERROR",
        errorMessage: `request failed: ${describeError(error)}`,
      };
    }

    return { target, result, completedAt: this.now() };
  }

  private applyOutcome({ target, result, completedAt }: CompletedProbe): void {
    const state = this.states.get(target.key);
    if (!state) {
      return;
    }

    const previousStatus = state.lastStatus;
    const failed = result.status !== "UP";

    state.lastCheckAt = completedAt;
    state.nextDueAt = completedAt + target.intervalSeconds * 1_000;
    state.checkCount += 1;
    state.lastResponseTimeMs = result.responseTimeMs;
    state.lastStatus = targetStatusFromProbe(result.status);
    state.consecutiveErrors = failed ? state.consecutiveErrors + 1 : 0;

    const detail = result.errorMessage ? ` - ${result.errorMessage}` : "";
    this.emit({
      message: failed
        ? `Website check failed: ${target.name}${detail}`
        : `Website check successful: ${target.name}`,
      finalStatus: result.status,
      url: target.url,
      responseTimeMs: result.responseTimeMs,
      statusCode: result.httpStatus,
    });

    if (result.performance) {
      const threshold =
        result.performance === "CRITICAL"
          ? this.settings.criticalResponseThresholdMs
          : this.settings.slowResponseThresholdMs;
      this.emit({
        message: `${result.performance}_RESPONSE: ${result.responseTimeMs}ms > ${threshold}ms for ${target.url}`,
        finalStatus: result.performance,
        url: target.url,
        responseTimeMs: result.responseTimeMs,
        statusCode: result.httpStatus,
      });
    }

    if (result.content) {
      this.emit({
        message: result.content.summary,
        finalStatus: result.content.status,
        url: target.url,
        statusCode: result.httpStatus,
      });
    }

    if (result.contentError) {
      this.emit({ message: result.contentError, finalStatus: "CONTENT_ERROR", url: target.url });
    }

    this.settleBreaker(target, result, completedAt);

    if (failed && state.consecutiveErrors === 1) {
      state.downSince = completedAt;
      this.emitIncident(target, "DOWNTIME", "Website became unavailable");
    } else if (failed && state.consecutiveErrors % PERSISTENT_DOWNTIME_EVERY === 0) {
      this.emitIncident(
        target,
        "PERSISTENT_DOWNTIME",
        `Website still unavailable after ${state.consecutiveErrors} checks`,
      );
    } else if (!failed && (previousStatus === "unavailable" || previousStatus === "error")) {
      const duration = formatIncidentDuration(completedAt - (state.downSince ?? completedAt));
      this.emitIncident(target, "RECOVERY", "Website is available again", duration);
      state.downSince = undefined;
    }

    this.observations.add(target.key, {
      at: completedAt,
      status: result.status,
      responseTimeMs: result.responseTimeMs,
    });
  }

  private settleBreaker(target: Target, result: ProbeResult, completedAt: number): void {
    if (result.status === "UP") {
      this.breakerRegistry.recordSuccess(target.key);
    } else {
      this.breakerRegistry.recordFailure(target.key, completedAt);
    }
  }

  private emitIncident(
    target: Target,
    type: "DOWNTIME" | "PERSISTENT_DOWNTIME" | "RECOVERY",
    details: string,
    duration?: string,
  ): void {
    const label = type === "DOWNTIME" ? "DOWNTIME started" : type;
    const durationPart = duration ? ` (duration: ${duration})` : "";
    this.emit({ message: `${label}${durationPart} - ${details}`, finalStatus: type, url: target.url });
  }

  private retryHooks(context: string, operation = "Operation"): RetryHooks {
    return {
      onRetry: (error, failedAttempt, delayMs) => {
        this.emit({
          message: `${operation} attempt ${failedAttempt} failed, retrying in ${delayMs}ms: ${describeError(error)}`,
          finalStatus: "RETRY_ATTEMPT",
          url: context,
        });
      },
      onSuccessAfterRetry: (attempt) => {
        this.emit({
          message: `${operation} succeeded after ${attempt} attempts`,
          finalStatus: "RETRY_SUCCESS",
          url: context,
        });
      },
      onExhausted: (error, attempts) => {
        if (attempts <= 1) {
          return;
        }
        this.emit({
          message: `${operation} failed after ${attempts} attempts: ${describeError(error)}`,
          finalStatus: "RETRY_EXHAUSTED",
          url: context,
        });
      },
    };
  }

  private createBreakers(): CircuitBreakerRegistry {
    return new CircuitBreakerRegistry({
      failureThreshold: this.settings.circuitBreakerThreshold,
      timeoutMs: this.settings.circuitBreakerTimeoutSeconds * 1_000,
      onEvent: (event: CircuitEvent) => {
        const target = this.registry.get(event.name);
        this.emit({
          message: event.message,
          finalStatus: event.type,
          url: target?.url ?? event.name,
        });
      },
    });
  }

  private stateFor(key: string, now: number): TargetRuntimeState {
    let state = this.states.get(key);
    if (!state) {
      state = initialState(now);
      this.states.set(key, state);
    }
    return state;
  }

  private syncStates(now: number): void {
    const keys = this.registry.keys();
    for (const key of [...this.states.keys()]) {
      if (!keys.has(key)) {
        this.states.delete(key);
      }
    }
    for (const key of keys) {
      this.stateFor(key, now);
    }
  }

  private emit(input: EventInput): void {
    this.outbox.push(input);
  }

  private async flushOutbox(): Promise<void> {
    while (this.outbox.length > 0) {
      const input = this.outbox.shift();
      if (!input) {
        break;
      }
      try {
        await this.eventLog.append(input);
      } catch (error) {
        this.logger.error({ err: error, event: input.finalStatus }, "Failed to append event log entry");
      }
    }
  }
}
