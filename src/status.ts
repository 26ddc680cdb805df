import Ajv, { type JSONSchemaType } from "ajv";
import { promises as fs } from "node:fs";

import type { CircuitState, TargetStatus } from "./domain";
import { InternalError } from "./errors";

/** One row of the per-target view read by reporting and `status`. */
export interface TargetStatusRow {
  url: string;
  name: string;
  last_status: TargetStatus;
  last_response_time_ms: number | null;
  last_check_timestamp: string | null;
  next_check_timestamp: string | null;
  uptime_percent: number | null;
  avg_response_time_ms: number | null;
  min_response_time_ms: number | null;
  max_response_time_ms: number | null;
  checks_in_window: number;
  check_count: number;
  consecutive_errors: number;
  circuit_state: CircuitState;
  circuit_failures: number;
}

export interface SettingsSummary {
  max_concurrent_checks: number;
  scan_interval_seconds: number;
  maintenance_interval_seconds: number;
  stats_window_hours: number;
  log_level: string;
}

export interface MonitorStatusSnapshot {
  pid: number;
  version: string;
  started_at: string;
  updated_at: string;
  active_checks: number;
  last_maintenance_at: string | null;
  settings: SettingsSummary;
  targets: TargetStatusRow[];
}

const nullableNumber = { type: "number", nullable: true } as const;
const nullableString = { type: "string", nullable: true } as const;

const statusSnapshotSchema: JSONSchemaType<MonitorStatusSnapshot> = {
  type: "object",
  required: [
    "pid",
    "version",
    "started_at",
    "updated_at",
    "active_checks",
    "last_maintenance_at",
    "settings",
    "targets",
  ],
  properties: {
    pid: { type: "integer" },
    version: { type: "string" },
    started_at: { type: "string" },
    updated_at: { type: "string" },
    active_checks: { type: "integer" },
    last_maintenance_at: nullableString,
    settings: {
      type: "object",
      required: [
        "max_concurrent_checks",
        "scan_interval_seconds",
        "maintenance_interval_seconds",
        "stats_window_hours",
        "log_level",
      ],
      properties: {
        max_concurrent_checks: { type: "integer" },
        scan_interval_seconds: { type: "integer" },
        maintenance_interval_seconds: { type: "integer" },
        stats_window_hours: { type: "integer" },
        log_level: { type: "string" },
      },
    },
    targets: {
      type: "array",
      items: {
        type: "object",
        required: [
          "url",
          "name",
          "last_status",
          "last_response_time_ms",
          "last_check_timestamp",
          "next_check_timestamp",
          "uptime_percent",
          "avg_response_time_ms",
          "min_response_time_ms",
          "max_response_time_ms",
          "checks_in_window",
          "check_count",
          "consecutive_errors",
          "circuit_state",
          "circuit_failures",
        ],
        properties: {
          url: { type: "string" },
          name: { type: "string" },
          last_status: { type: "string", enum: ["unknown", "available", "unavailable", "error"] },
          last_response_time_ms: nullableNumber,
          last_check_timestamp: nullableString,
          next_check_timestamp: nullableString,
          uptime_percent: nullableNumber,
          avg_response_time_ms: nullableNumber,
          min_response_time_ms: nullableNumber,
          max_response_time_ms: nullableNumber,
          checks_in_window: { type: "integer" },
          check_count: { type: "integer" },
          consecutive_errors: { type: "integer" },
          circuit_state: { type: "string", enum: ["CLOSED", "OPEN", "HALF_OPEN"] },
          circuit_failures: { type: "integer" },
        },
      },
    },
  },
};

const validateStatusSnapshot = new Ajv({ allErrors: true }).compile(statusSnapshotSchema);

/** Reads the snapshot written by a running monitor. Undefined when absent. */
export async function readStatusSnapshot(path: string): Promise<MonitorStatusSnapshot | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(path, "utf8");
  } catch (error) {
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new InternalError("Status file is not valid JSON", { context: { path }, cause: error });
  }

  if (!validateStatusSnapshot(parsed)) {
    throw new InternalError("Status file has an unexpected shape", { context: { path } });
  }

  return parsed;
}
