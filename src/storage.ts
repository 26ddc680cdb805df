import type { ProbeStatus } from "./domain";

export interface Observation {
  /** Epoch milliseconds the probe completed. */
  at: number;
  status: ProbeStatus;
  responseTimeMs: number;
}

export interface RollingStats {
  checks: number;
  upChecks: number;
  /** Share of UP probes in the window, two decimals. Undefined without checks. */
  uptimePercent?: number;
  /** Mean latency of UP probes in the window, rounded to whole milliseconds. */
  avgResponseTimeMs?: number;
  minResponseTimeMs?: number;
  maxResponseTimeMs?: number;
}

export const DEFAULT_OBSERVATION_CAPACITY = 10_000;

/** Bounded per-target history of probe outcomes. */
export class ObservationStore {
  private readonly histories = new Map<string, Observation[]>();

  constructor(private readonly capacity: number = DEFAULT_OBSERVATION_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new TypeError("ObservationStore capacity must be a positive integer");
    }
  }

  /**
   * Stores a new observation in the ring buffer of the respective target.
   */
  add(key: string, observation: Observation): void {
    const history = this.histories.get(key) ?? [];

    if (history.length === this.capacity) {
      history.shift();
    }

    history.push(observation);
    this.histories.set(key, history);
  }

  /**
   * Statistics over observations recorded at or after `now - windowMs`.
   */
  summarize(key: string, now: number, windowMs: number): RollingStats {
    const since = now - windowMs;
    const inWindow = (this.histories.get(key) ?? []).filter((entry) => entry.at >= since);
    const upLatencies = inWindow
      .filter((entry) => entry.status === "UP" && Number.isFinite(entry.responseTimeMs))
      .map((entry) => entry.responseTimeMs);

    const stats: RollingStats = {
      checks: inWindow.length,
      upChecks: upLatencies.length,
    };

    if (inWindow.length > 0) {
      stats.uptimePercent = Math.round((upLatencies.length / inWindow.length) * 10_000) / 100;
    }

    if (upLatencies.length > 0) {
      const total = upLatencies.reduce((sum, value) => sum + value, 0);
      stats.avgResponseTimeMs = Math.round(total / upLatencies.length);
      stats.minResponseTimeMs = Math.min(...upLatencies);
      stats.maxResponseTimeMs = Math.max(...upLatencies);
    }

    return stats;
  }

  /** Drops observations older than `cutoff` across every target. */
  pruneOlderThan(cutoff: number): number {
    let removed = 0;
    for (const [key, history] of this.histories) {
      const kept = history.filter((entry) => entry.at >= cutoff);
      removed += history.length - kept.length;
      if (kept.length === 0) {
        this.histories.delete(key);
      } else {
        this.histories.set(key, kept);
      }
    }
    return removed;
  }

  /** Forgets targets that are no longer configured. */
  retainOnly(keys: ReadonlySet<string>): void {
    for (const key of [...this.histories.keys()]) {
      if (!keys.has(key)) {
        this.histories.delete(key);
      }
    }
  }
}
