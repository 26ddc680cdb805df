/** Primary outcome of a single probe attempt. */
export type ProbeStatus = "UP" | "DOWN" | "TIMEOUT" | "ERROR";

/** Result of comparing a fetched body digest against the stored one. */
export type ContentStatus = "CONTENT_INITIAL" | "CONTENT_CHANGED" | "CONTENT_UNCHANGED";

/** Latency flag raised on an UP probe. CRITICAL supersedes SLOW. */
export type PerformanceFlag = "SLOW" | "CRITICAL";

/** Scheduler-level availability of a target. */
export type TargetStatus = "unknown" | "available" | "unavailable" | "error";

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

/** Verbosity threshold, most severe first. */
export type LogLevel = "ERROR" | "WARN" | "INFO" | "DEBUG";

export const LOG_LEVELS: readonly LogLevel[] = ["ERROR", "WARN", "INFO", "DEBUG"];

export interface Target {
  /**
   * Validated http(s) URL of the endpoint.
   */
  url: string;
  /**
   * Normalized identity derived from the URL. Unique within a registry.
   */
  key: string;
  /**
   * Display name. Defaults to the URL.
   */
  name: string;
  /** Seconds between checks (>= 10). */
  intervalSeconds: number;
  /** Request timeout in seconds (>= 1). */
  timeoutSeconds: number;
  /** Whether the body digest is tracked for change detection. */
  contentCheck: boolean;
}

export interface TargetRuntimeState {
  /** Epoch milliseconds of the last completed probe, 0 before the first one. */
  lastCheckAt: number;
  /** Epoch milliseconds at which the target is next due. */
  nextDueAt: number;
  checkCount: number;
  consecutiveErrors: number;
  lastStatus: TargetStatus;
  /** Latency of the last completed probe. */
  lastResponseTimeMs?: number;
  /** Epoch milliseconds at which the current downtime started. */
  downSince?: number;
}

export interface ContentCheckOutcome {
  status: ContentStatus;
  /** SHA-256 hex digest of the fetched body. */
  hash: string;
  previousHash?: string;
  /** Milliseconds since the previous digest was recorded. */
  sinceLastChangeMs?: number;
  summary: string;
}

export interface ProbeResult {
  url: string;
  checkedAt: Date;
  /** HTTP status code, 0 when no response was received. */
  httpStatus: number;
  /** Wall-clock latency measured around the request. */
  responseTimeMs: number;
  status: ProbeStatus;
  /** Human-readable description of the HTTP status, when one was received. */
  statusDescription?: string;
  performance?: PerformanceFlag;
  content?: ContentCheckOutcome;
  /** Failure to fetch or hash the body. Never fails the probe itself. */
  contentError?: string;
  errorMessage?: string;
}

export interface CircuitBreakerSnapshot {
  name: string;
  state: CircuitState;
  failures: number;
  /** Epoch milliseconds of the last recorded failure, 0 if none. */
  lastFailureAt: number;
}

export interface ContentHashRecord {
  key: string;
  digest: string;
  /** Epoch milliseconds when the digest was stored. */
  recordedAt: number;
}

export function targetStatusFromProbe(status: ProbeStatus): TargetStatus {
  switch (status) {
    case "UP":
      return "available";
    case "DOWN":
      return "unavailable";
    case "TIMEOUT":
    case "ERROR":
      return "error";
    default: {
      const exhaustiveCheck: never = status;
      return exhaustiveCheck;
    }
  }
}
