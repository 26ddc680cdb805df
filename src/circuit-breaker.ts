import type { CircuitBreakerSnapshot, CircuitState } from "./domain";

export type CircuitEventType =
  | "CIRCUIT_OPENED"
  | "CIRCUIT_HALF_OPEN"
  | "CIRCUIT_CLOSED"
  | "CIRCUIT_BLOCKED"
  | "CIRCUIT_FAILURE";

export interface CircuitEvent {
  type: CircuitEventType;
  name: string;
  state: CircuitState;
  failures: number;
  message: string;
}

export interface CircuitBreakerOptions {
  /**
   * Consecutive failures that open the circuit. Defaults to 5.
   */
  failureThreshold?: number;
  /**
   * Time an open circuit waits after its last failure before admitting a
   * trial attempt. Defaults to 300 seconds.
   */
  timeoutMs?: number;
  onEvent?: (event: CircuitEvent) => void;
}

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_CIRCUIT_TIMEOUT_MS = 300_000;

interface BreakerRecord {
  state: CircuitState;
  failures: number;
  lastFailureAt: number;
  trialInFlight: boolean;
}

export type AcquireDecision =
  | { allowed: true; state: CircuitState }
  | { allowed: false; retryAt: number };

function validatePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new TypeError(`${name} must be an integer greater than or equal to 1`);
  }
}

/**
 * Per-target breakers. Every transition happens synchronously inside one
 * method call, so a read-modify-write for a key can never interleave with
 * another caller on the event loop.
 */
export class CircuitBreakerRegistry {
  private readonly failureThreshold: number;
  private readonly timeoutMs: number;
  private readonly onEvent?: (event: CircuitEvent) => void;
  private readonly breakers = new Map<string, BreakerRecord>();

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CIRCUIT_TIMEOUT_MS;
    validatePositiveInteger("failureThreshold", this.failureThreshold);
    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs < 0) {
      throw new TypeError("timeoutMs must be a finite non-negative number");
    }
    this.onEvent = options.onEvent;
  }

  /**
   * Asks whether an attempt may run now. An open circuit whose timeout has
   * elapsed moves to HALF_OPEN and admits exactly one attempt; everything else
   * while open is blocked.
   */
  tryAcquire(name: string, now: number): AcquireDecision {
    const record = this.breakers.get(name);

    if (!record || record.state === "CLOSED") {
      return { allowed: true, state: "CLOSED" };
    }

    if (record.state === "OPEN") {
      const retryAt = record.lastFailureAt + this.timeoutMs;
      if (now >= retryAt) {
        record.state = "HALF_OPEN";
        record.trialInFlight = true;
        this.emit("CIRCUIT_HALF_OPEN", name, record, "Circuit breaker transitioning to half-open state");
        return { allowed: true, state: "HALF_OPEN" };
      }

      this.emit("CIRCUIT_BLOCKED", name, record, "Circuit breaker is open, blocking request");
      return { allowed: false, retryAt };
    }

    if (record.trialInFlight) {
      this.emit("CIRCUIT_BLOCKED", name, record, "Circuit breaker is half-open, trial already running");
      return { allowed: false, retryAt: now };
    }

    record.trialInFlight = true;
    return { allowed: true, state: "HALF_OPEN" };
  }

  recordSuccess(name: string): void {
    const record = this.breakers.get(name);
    if (!record) {
      return;
    }

    const previous = record.state;
    record.state = "CLOSED";
    record.failures = 0;
    record.trialInFlight = false;

    if (previous !== "CLOSED") {
      this.emit("CIRCUIT_CLOSED", name, record, "Circuit breaker closed after successful execution");
    }
  }

  recordFailure(name: string, now: number): void {
    let record = this.breakers.get(name);
    if (!record) {
      record = { state: "CLOSED", failures: 0, lastFailureAt: 0, trialInFlight: false };
      this.breakers.set(name, record);
    }

    const previous = record.state;
    record.failures += 1;
    record.lastFailureAt = now;
    record.trialInFlight = false;

    if (previous === "HALF_OPEN" || record.failures >= this.failureThreshold) {
      record.state = "OPEN";
      if (previous !== "OPEN") {
        this.emit(
          "CIRCUIT_OPENED",
          name,
          record,
          `Circuit breaker opened after ${record.failures} failures`,
        );
      }
      return;
    }

    this.emit(
      "CIRCUIT_FAILURE",
      name,
      record,
      `Circuit breaker recorded failure (${record.failures}/${this.failureThreshold})`,
    );
  }

  getState(name: string): CircuitBreakerSnapshot {
    const record = this.breakers.get(name);
    return {
      name,
      state: record?.state ?? "CLOSED",
      failures: record?.failures ?? 0,
      lastFailureAt: record?.lastFailureAt ?? 0,
    };
  }

  snapshot(): CircuitBreakerSnapshot[] {
    return [...this.breakers.keys()].map((name) => this.getState(name));
  }

  /**
   * Replaces in-memory state with persisted snapshots. A restored HALF_OPEN
   * breaker admits one fresh trial.
   */
  restore(snapshots: readonly CircuitBreakerSnapshot[]): void {
    this.breakers.clear();
    for (const snapshot of snapshots) {
      this.breakers.set(snapshot.name, {
        state: snapshot.state,
        failures: snapshot.failures,
        lastFailureAt: snapshot.lastFailureAt,
        trialInFlight: false,
      });
    }
  }

  /** Drops breakers whose name is not in `keep`. Returns how many were removed. */
  prune(keep: ReadonlySet<string>): number {
    let removed = 0;
    for (const name of [...this.breakers.keys()]) {
      if (!keep.has(name)) {
        this.breakers.delete(name);
        removed += 1;
      }
    }
    return removed;
  }

  private emit(type: CircuitEventType, name: string, record: BreakerRecord, message: string): void {
    this.onEvent?.({ type, name, state: record.state, failures: record.failures, message });
  }
}
