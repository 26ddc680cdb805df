import type { RecoveryStatistics } from "../event-log";
import type { MonitorStatusSnapshot, TargetStatusRow } from "../status";

export interface StatusReportInput {
  /** PID of the live monitor, undefined when none is running. */
  runningPid?: number;
  statusPath: string;
  snapshot?: MonitorStatusSnapshot;
  recovery: RecoveryStatistics;
}

const TARGET_HEADER = ["NAME", "URL", "STATUS", "LAST CHECK", "RESPONSE", "UPTIME", "AVG", "ERRORS", "CIRCUIT"];

function formatMs(value: number | null): string {
  return value === null ? "-" : `${value}ms`;
}

function formatTable(rows: readonly string[][], indent = "  "): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, column) => {
      widths[column] = Math.max(widths[column] ?? 0, cell.length);
    });
  }

  return rows.map((row) =>
    `${indent}${row.map((cell, column) => (column === row.length - 1 ? cell : cell.padEnd(widths[column] + 2, " "))).join("")}`.trimEnd(),
  );
}

function targetRow(target: TargetStatusRow): string[] {
  return [
    target.name,
    target.url,
    target.last_status,
    target.last_check_timestamp ?? "never",
    formatMs(target.last_response_time_ms),
    target.uptime_percent === null ? "-" : `${target.uptime_percent}%`,
    formatMs(target.avg_response_time_ms),
    String(target.consecutive_errors),
    `${target.circuit_state} (${target.circuit_failures})`,
  ];
}

export function renderStatusReport(input: StatusReportInput): string {
  const lines: string[] = [];
  const { snapshot } = input;

  lines.push(
    input.runningPid === undefined ? "Monitor: not running" : `Monitor: running (PID ${input.runningPid})`,
  );

  if (!snapshot) {
    lines.push(`No status snapshot found at ${input.statusPath}`);
  } else {
    const { settings } = snapshot;
    lines.push(`Version: ${snapshot.version}`);
    lines.push(`Started: ${snapshot.started_at}`);
    lines.push(`Updated: ${snapshot.updated_at}`);
    lines.push(`Active checks: ${snapshot.active_checks}`);
    lines.push(`Last maintenance: ${snapshot.last_maintenance_at ?? "never"}`);
    lines.push(
      `Settings: max ${settings.max_concurrent_checks} concurrent checks, scan every ${settings.scan_interval_seconds}s, ` +
        `stats over ${settings.stats_window_hours}h, log level ${settings.log_level}`,
    );
    lines.push("");
    lines.push(`Targets (${snapshot.targets.length}):`);
    if (snapshot.targets.length > 0) {
      lines.push(...formatTable([TARGET_HEADER, ...snapshot.targets.map(targetRow)]));
    }
  }

  lines.push("");
  lines.push("Recovery events (last 24h):");
  const counted = Object.entries(input.recovery).filter(([, count]) => count > 0);
  if (counted.length === 0) {
    lines.push("  none");
  } else {
    lines.push(...formatTable(counted.map(([type, count]) => [type, String(count)])));
  }

  return `${lines.join("\n")}\n`;
}
