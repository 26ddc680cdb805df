import type { LogLevel } from "../domain";
import { LOG_LEVELS } from "../domain";

export const INCIDENT_TYPES = ["DOWNTIME", "PERSISTENT_DOWNTIME", "RECOVERY"] as const;
export type IncidentType = (typeof INCIDENT_TYPES)[number];

export const RECOVERY_EVENT_TYPES = [
  "RETRY_ATTEMPT",
  "RETRY_SUCCESS",
  "RETRY_EXHAUSTED",
  "CIRCUIT_OPENED",
  "CIRCUIT_HALF_OPEN",
  "CIRCUIT_CLOSED",
  "CIRCUIT_BLOCKED",
  "CIRCUIT_FAILURE",
  "HEALTH_CHECK_OK",
  "HEALTH_CHECK_FAILED",
  "HEALTH_CHECK_RECOVERED",
  "HEALTH_CHECK_THRESHOLD",
  "HEALTH_RECOVERY_SUCCESS",
  "HEALTH_RECOVERY_FAILED",
  "MAINTENANCE_COMPLETED",
  "MAINTENANCE_ERROR",
] as const;
export type RecoveryEventType = (typeof RECOVERY_EVENT_TYPES)[number];

const LIFECYCLE_EVENT_TYPES = [
  "MONITOR_STARTED",
  "MONITOR_STOPPED",
  "CONFIG_RELOADED",
  "CONFIG_WARNING",
  "LOG_ROTATED",
  "CONTENT_ERROR",
] as const;
export type LifecycleEventType = (typeof LIFECYCLE_EVENT_TYPES)[number];

const PROBE_KINDS = [
  "UP",
  "DOWN",
  "TIMEOUT",
  "ERROR",
  "SLOW",
  "CRITICAL",
  "CONTENT_INITIAL",
  "CONTENT_CHANGED",
  "CONTENT_UNCHANGED",
] as const;

export type EventKind =
  | (typeof PROBE_KINDS)[number]
  | IncidentType
  | RecoveryEventType
  | LifecycleEventType;

const EVENT_KINDS: ReadonlySet<string> = new Set<string>([
  ...PROBE_KINDS,
  ...INCIDENT_TYPES,
  ...RECOVERY_EVENT_TYPES,
  ...LIFECYCLE_EVENT_TYPES,
]);

export function isEventKind(value: string): value is EventKind {
  return EVENT_KINDS.has(value);
}

export function isRecoveryEventType(value: string): value is RecoveryEventType {
  return RECOVERY_EVENT_TYPES.some((type) => type === value);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * One line of the event log:
 * `timestamp|level|message|url|response_time_ms|status_code|final_status`.
 * The url column carries a component name such as `DAEMON_HEALTH` for events
 * that are not tied to a target.
 */
export interface EventLogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  url?: string;
  responseTimeMs?: number;
  statusCode?: number;
  finalStatus: EventKind;
}

const FIELD_SEPARATOR = "|";
const FIELD_COUNT = 7;

const LEVEL_BY_KIND: Partial<Record<EventKind, LogLevel>> = {
  DOWN: "ERROR",
  ERROR: "ERROR",
  TIMEOUT: "ERROR",
  CRITICAL: "ERROR",
  DOWNTIME: "ERROR",
  PERSISTENT_DOWNTIME: "ERROR",
  CIRCUIT_OPENED: "ERROR",
  RETRY_EXHAUSTED: "ERROR",
  HEALTH_CHECK_THRESHOLD: "ERROR",
  HEALTH_RECOVERY_FAILED: "ERROR",
  MAINTENANCE_ERROR: "ERROR",
  SLOW: "WARN",
  RETRY_ATTEMPT: "WARN",
  CIRCUIT_BLOCKED: "WARN",
  CIRCUIT_FAILURE: "WARN",
  HEALTH_CHECK_FAILED: "WARN",
  CONFIG_WARNING: "WARN",
  CONTENT_ERROR: "WARN",
  CONTENT_UNCHANGED: "DEBUG",
  HEALTH_CHECK_OK: "DEBUG",
};

export function levelForKind(kind: EventKind): LogLevel {
  return LEVEL_BY_KIND[kind] ?? "INFO";
}

/** True when an entry at `level` passes a `threshold` of LOG_LEVEL. */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(threshold);
}

export function escapeField(value: string): string {
  return value
    .replaceAll("\\", "\\\\")
    .replaceAll("|", "\\p")
    .replaceAll("\n", "\\n")
    .replaceAll("\r", "\\r");
}

const UNESCAPES: Record<string, string> = {
  "\\": "\\",
  p: "|",
  n: "\n",
  r: "\r",
};

export function unescapeField(value: string): string {
  let result = "";

  for (let index = 0; index < value.length; index += 1) {
    const char = value[index];
    if (char !== "\\" || index === value.length - 1) {
      result += char;
      continue;
    }

    const next = value[index + 1];
    const replacement = UNESCAPES[next];
    if (replacement === undefined) {
      result += char;
      continue;
    }

    result += replacement;
    index += 1;
  }

  return result;
}

function formatOptionalNumber(value: number | undefined): string {
  return value === undefined ? "" : String(Math.round(value));
}

export function formatEventLine(entry: EventLogEntry): string {
  return [
    entry.timestamp.toISOString(),
    entry.level,
    escapeField(entry.message),
    escapeField(entry.url ?? ""),
    formatOptionalNumber(entry.responseTimeMs),
    formatOptionalNumber(entry.statusCode),
    entry.finalStatus,
  ].join(FIELD_SEPARATOR);
}

function parseOptionalNumber(value: string): number | undefined | null {
  if (value === "") {
    return undefined;
  }

  if (!/^-?\d+$/.test(value)) {
    return null;
  }

  return Number.parseInt(value, 10);
}

/**
 * Parses a line written by {@link formatEventLine}. Returns undefined for
 * lines that are not event entries.
 */
export function parseEventLine(line: string): EventLogEntry | undefined {
  const fields = line.split(FIELD_SEPARATOR);
  if (fields.length !== FIELD_COUNT) {
    return undefined;
  }

  const [rawTimestamp, level, message, url, responseTime, statusCode, finalStatus] = fields;
  const timestamp = new Date(rawTimestamp);
  if (Number.isNaN(timestamp.getTime()) || !isLogLevel(level) || !isEventKind(finalStatus)) {
    return undefined;
  }

  const parsedResponseTime = parseOptionalNumber(responseTime);
  const parsedStatusCode = parseOptionalNumber(statusCode);
  if (parsedResponseTime === null || parsedStatusCode === null) {
    return undefined;
  }

  const entry: EventLogEntry = {
    timestamp,
    level,
    message: unescapeField(message),
    finalStatus,
  };

  if (url !== "") {
    entry.url = unescapeField(url);
  }
  if (parsedResponseTime !== undefined) {
    entry.responseTimeMs = parsedResponseTime;
  }
  if (parsedStatusCode !== undefined) {
    entry.statusCode = parsedStatusCode;
  }

  return entry;
}
