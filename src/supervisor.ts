import { formatIncidentDuration } from "./duration";
import type { EventInput, EventLog } from "./event-log";
import type { Logger } from "./logger";

export const HEALTH_CONTEXT = "DAEMON_HEALTH";

/** The part of the scheduler the supervisor watches and restarts. */
export interface SupervisedLoop {
  readonly lastHeartbeatAt: number;
  readonly isRunning: boolean;
  restart(): void;
}

export interface HealthSupervisorOptions {
  loop: SupervisedLoop;
  eventLog: EventLog;
  logger: Logger;
  intervalMs: number;
  /** Consecutive unhealthy checks before a restart is attempted. */
  maxFailures: number;
  /** A heartbeat older than this marks the loop unhealthy. */
  staleAfterMs: number;
  now?: () => number;
  setTimeoutFn?: (callback: () => void, delay: number) => ReturnType<typeof setTimeout>;
  clearTimeoutFn?: (handle: ReturnType<typeof setTimeout>) => void;
}

export type HealthCheckOutcome = "healthy" | "recovered" | "unhealthy" | "restarted" | "restart-failed";

export interface HealthCheckReport {
  outcome: HealthCheckOutcome;
  consecutiveFailures: number;
  heartbeatAgeMs: number;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Periodic liveness check of the scheduler loop. Every check, threshold breach
 * and restart attempt is written to the event log under `DAEMON_HEALTH`.
 */
export class HealthSupervisor {
  private readonly loop: SupervisedLoop;
  private readonly eventLog: EventLog;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly maxFailures: number;
  private readonly staleAfterMs: number;
  private readonly now: () => number;
  private readonly setTimeoutFn: (callback: () => void, delay: number) => ReturnType<typeof setTimeout>;
  private readonly clearTimeoutFn: (handle: ReturnType<typeof setTimeout>) => void;

  private failures = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pending: Promise<void> | null = null;
  private active = false;

  constructor(options: HealthSupervisorOptions) {
    if (!Number.isInteger(options.maxFailures) || options.maxFailures < 1) {
      throw new TypeError("maxFailures must be an integer greater than or equal to 1");
    }
    this.loop = options.loop;
    this.eventLog = options.eventLog;
    this.logger = options.logger;
    this.intervalMs = options.intervalMs;
    this.maxFailures = options.maxFailures;
    this.staleAfterMs = options.staleAfterMs;
    this.now = options.now ?? Date.now;
    this.setTimeoutFn = options.setTimeoutFn ?? ((cb, delay) => setTimeout(cb, delay));
    this.clearTimeoutFn = options.clearTimeoutFn ?? ((handle) => clearTimeout(handle));
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.schedule();
  }

  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      this.clearTimeoutFn(this.timer);
      this.timer = null;
    }
    await this.pending;
  }

  async check(): Promise<HealthCheckReport> {
    const heartbeatAgeMs = Math.max(0, this.now() - this.loop.lastHeartbeatAt);
    const problem = this.findProblem(heartbeatAgeMs);

    if (!problem) {
      const previousFailures = this.failures;
      this.failures = 0;
      if (previousFailures > 0) {
        await this.record({
          message: `Health check recovered after ${previousFailures} failed checks`,
          finalStatus: "HEALTH_CHECK_RECOVERED",
        });
        return { outcome: "recovered", consecutiveFailures: 0, heartbeatAgeMs };
      }
      await this.record({
        message: `Health check passed (last heartbeat ${formatIncidentDuration(heartbeatAgeMs)} ago)`,
        finalStatus: "HEALTH_CHECK_OK",
      });
      return { outcome: "healthy", consecutiveFailures: 0, heartbeatAgeMs };
    }

    this.failures += 1;
    await this.record({
      message: `Health check failed (${this.failures}/${this.maxFailures}): ${problem}`,
      finalStatus: "HEALTH_CHECK_FAILED",
    });

    if (this.failures < this.maxFailures) {
      return { outcome: "unhealthy", consecutiveFailures: this.failures, heartbeatAgeMs };
    }

    await this.record({
      message: `Health check failure threshold reached (${this.maxFailures}), restarting scheduler loop`,
      finalStatus: "HEALTH_CHECK_THRESHOLD",
    });

    try {
      this.loop.restart();
    } catch (error) {
      return this.restartFailed(describeError(error), heartbeatAgeMs);
    }

    if (!this.loop.isRunning) {
      return this.restartFailed("scheduler loop is not running after restart", heartbeatAgeMs);
    }

    this.failures = 0;
    await this.record({
      message: "Scheduler loop restarted successfully",
      finalStatus: "HEALTH_RECOVERY_SUCCESS",
    });
    return { outcome: "restarted", consecutiveFailures: 0, heartbeatAgeMs };
  }

  private findProblem(heartbeatAgeMs: number): string | undefined {
    if (!this.loop.isRunning) {
      return "scheduler loop is not running";
    }
    if (heartbeatAgeMs > this.staleAfterMs) {
      return `no scheduler heartbeat for ${formatIncidentDuration(heartbeatAgeMs)}`;
    }
    return undefined;
  }

  private async restartFailed(reason: string, heartbeatAgeMs: number): Promise<HealthCheckReport> {
    await this.record({
      message: `Scheduler loop restart failed: ${reason}`,
      finalStatus: "HEALTH_RECOVERY_FAILED",
    });
    return { outcome: "restart-failed", consecutiveFailures: this.failures, heartbeatAgeMs };
  }

  private schedule(): void {
    this.timer = this.setTimeoutFn(() => {
      this.timer = null;
      this.pending = this.tick();
    }, this.intervalMs);
  }

  private async tick(): Promise<void> {
    try {
      await this.check();
    } catch (error) {
      this.logger.error({ err: error }, "Health check failed to run");
    }
    if (this.active) {
      this.schedule();
    }
  }

  private async record(input: Omit<EventInput, "url">): Promise<void> {
    try {
      await this.eventLog.append({ ...input, url: HEALTH_CONTEXT });
    } catch (error) {
      this.logger.error({ err: error, event: input.finalStatus }, "Failed to append health event");
    }
  }
}
