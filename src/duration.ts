const DURATION_REGEX = /^(\d+)(ms|s|m|h)?$/;

const UNIT_MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

export class DurationParseError extends Error {
  constructor(value: unknown) {
    const display = typeof value === "string" ? value : String(value);
    super(`Invalid duration string: "${display}"`);
    this.name = "DurationParseError";
  }
}

/**
 * Parses `500ms`, `10s`, `5m`, `1h`, or a bare integer which is read as seconds.
 */
export function parseDurationToMilliseconds(value: string): number {
  const match = DURATION_REGEX.exec(value.trim());

  if (!match) {
    throw new DurationParseError(value);
  }

  const [, numeric, unit = "s"] = match;
  const amount = Number.parseInt(numeric, 10);
  const multiplier = UNIT_MULTIPLIERS[unit];

  if (!Number.isSafeInteger(amount) || multiplier === undefined) {
    throw new DurationParseError(value);
  }

  return amount * multiplier;
}

export function formatMillisecondsToDuration(value: number): string {
  if (!Number.isFinite(value) || value < 0) {
    throw new TypeError("Duration must be a non-negative finite number of milliseconds");
  }

  if (value !== 0 && value % UNIT_MULTIPLIERS.h === 0) {
    return `${value / UNIT_MULTIPLIERS.h}h`;
  }

  if (value % UNIT_MULTIPLIERS.m === 0) {
    return `${value / UNIT_MULTIPLIERS.m}m`;
  }

  if (value % UNIT_MULTIPLIERS.s === 0) {
    return `${value / UNIT_MULTIPLIERS.s}s`;
  }

  return `${value}ms`;
}

function toWholeSeconds(milliseconds: number): number {
  if (!Number.isFinite(milliseconds)) {
    throw new TypeError("Duration must be a finite number of milliseconds");
  }

  return Math.floor(Math.abs(milliseconds) / 1_000);
}

/**
 * Downtime length attached to RECOVERY incidents: `45s`, `5m 3s`, `2h 10m`.
 */
export function formatIncidentDuration(milliseconds: number): string {
  const seconds = toWholeSeconds(milliseconds);

  if (seconds < 60) {
    return `${seconds}s`;
  }

  if (seconds < 3_600) {
    return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
  }

  return `${Math.floor(seconds / 3_600)}h ${Math.floor((seconds % 3_600) / 60)}m`;
}

/**
 * Coarse elapsed time, used for "last change: 3h 5m ago".
 */
export function formatTimeDifference(milliseconds: number): string {
  const seconds = toWholeSeconds(milliseconds);

  if (seconds < 60) {
    return `${seconds}s`;
  }

  if (seconds < 3_600) {
    return `${Math.floor(seconds / 60)}m`;
  }

  if (seconds < 86_400) {
    const hours = Math.floor(seconds / 3_600);
    const minutes = Math.floor((seconds % 3_600) / 60);
    return minutes === 0 ? `${hours}h` : `${hours}h ${minutes}m`;
  }

  const days = Math.floor(seconds / 86_400);
  const hours = Math.floor((seconds % 86_400) / 3_600);
  return hours === 0 ? `${days}d` : `${days}d ${hours}h`;
}
