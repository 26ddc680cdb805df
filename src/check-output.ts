import type { ProbeResult } from "./domain";
import { categorizeError } from "./errors";
import { escapeField } from "./event-log";
import { getStatusInfo } from "./http";

export const CHECK_OUTPUT_FORMATS = ["structured", "json", "human"] as const;

export type CheckOutputFormat = (typeof CHECK_OUTPUT_FORMATS)[number];

export interface CheckJsonResult {
  timestamp: string;
  url: string;
  status: ProbeResult["status"];
  status_code: number;
  status_description: string | null;
  response_time_ms: number;
  performance: string | null;
  content_status: string | null;
  content_hash: string | null;
  error_message: string | null;
}

export function isCheckOutputFormat(value: string): value is CheckOutputFormat {
  return (CHECK_OUTPUT_FORMATS as readonly string[]).includes(value);
}

function toIsoString(date: Date): string {
  const timestamp = date.getTime();

  if (!Number.isFinite(timestamp)) {
    throw new TypeError("Invalid Date value provided for serialization");
  }

  return date.toISOString();
}

/** Probe failure first, then a failed content fetch. */
function errorText(result: ProbeResult): string | undefined {
  return result.errorMessage ?? result.contentError;
}

export function buildCheckJson(result: ProbeResult): CheckJsonResult {
  return {
    timestamp: toIsoString(result.checkedAt),
    url: result.url,
    status: result.status,
    status_code: result.httpStatus,
    status_description: result.statusDescription ?? null,
    response_time_ms: Math.round(result.responseTimeMs),
    performance: result.performance ?? null,
    content_status: result.content?.status ?? null,
    content_hash: result.content?.hash ?? null,
    error_message: errorText(result) ?? null,
  };
}

/**
 * `timestamp|url|status_code|response_time_ms|content_hash|status|error_message`,
 * escaped the same way as event log fields.
 */
export function formatStructuredLine(result: ProbeResult): string {
  return [
    toIsoString(result.checkedAt),
    result.url,
    String(result.httpStatus),
    String(Math.round(result.responseTimeMs)),
    result.content?.hash ?? "",
    result.status,
    errorText(result) ?? "",
  ]
    .map(escapeField)
    .join("|");
}

/** Likely cause and follow-up for a failed check. */
function diagnose(result: ProbeResult): string {
  if (result.httpStatus > 0) {
    const info = getStatusInfo(result.httpStatus);
    return `${info.description} (severity ${info.severity}, action ${info.actionRequired})`;
  }

  const categorization = categorizeError(errorText(result) ?? "");
  return (
    `${categorization.category} (severity ${categorization.severity.toLowerCase()}, ` +
    `action ${categorization.recommendedAction})`
  );
}

export function formatHumanReport(result: ProbeResult): string {
  const rows: Array<[string, string]> = [["URL", result.url]];

  const description = result.statusDescription ? ` (${result.httpStatus} ${result.statusDescription})` : "";
  rows.push(["Status", `${result.status}${description}`]);

  const flag = result.performance ? ` [${result.performance}]` : "";
  rows.push(["Response time", `${Math.round(result.responseTimeMs)}ms${flag}`]);

  if (result.content) {
    rows.push(["Content", `${result.content.summary} (sha256 ${result.content.hash.slice(0, 12)})`]);
  }

  const error = errorText(result);
  if (error) {
    rows.push(["Error", error]);
  }

  if (result.status !== "UP") {
    rows.push(["Diagnosis", diagnose(result)]);
  }

  rows.push(["Checked at", toIsoString(result.checkedAt)]);

  const width = rows.reduce((max, [label]) => Math.max(max, label.length), 0) + 2;
  return rows.map(([label, value]) => `${`${label}:`.padEnd(width, " ")}${value}`).join("\n");
}

export function formatCheckResult(result: ProbeResult, format: CheckOutputFormat): string {
  switch (format) {
    case "structured":
      return `${formatStructuredLine(result)}\n`;
    case "json":
      return `${JSON.stringify(buildCheckJson(result), null, 2)}\n`;
    case "human":
      return `${formatHumanReport(result)}\n`;
    default: {
      const exhaustiveCheck: never = format;
      return exhaustiveCheck;
    }
  }
}
