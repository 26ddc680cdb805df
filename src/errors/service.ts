import { EXIT_CODE_GENERAL_ERROR } from "../exit-codes";
import type { ProbeResult } from "../domain";
import { SitewardenError, type ErrorContext } from "./base";

export type ErrorCategory =
  | "NETWORK"
  | "TIMEOUT"
  | "HTTP"
  | "CONFIG"
  | "SYSTEM"
  | "CONTENT"
  | "UNKNOWN";

export type ErrorSeverity = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW";

export interface TargetErrorContext {
  targetName: string;
  attempt?: number;
  url?: string | URL;
}

function normalizeTargetContext(context: TargetErrorContext): ErrorContext {
  const normalized: ErrorContext = {
    targetName: context.targetName,
  };

  if (typeof context.attempt === "number") {
    normalized.attempt = context.attempt;
  }

  if (context.url instanceof URL) {
    normalized.url = context.url.toString();
  } else if (typeof context.url === "string") {
    normalized.url = context.url;
  }

  return normalized;
}

/**
 * Raised inside a retried probe when the request never produced an HTTP
 * response. Carries the classified result so the caller can record it once
 * retries are exhausted.
 */
export class TransportError extends SitewardenError {
  readonly category: ErrorCategory;
  readonly result: ProbeResult;

  constructor(result: ProbeResult, context: TargetErrorContext, options: { cause?: unknown } = {}) {
    super(result.errorMessage ?? `Probe failed with ${result.status}`, {
      exitCode: EXIT_CODE_GENERAL_ERROR,
      context: normalizeTargetContext(context),
      cause: options.cause,
      name: "TransportError",
    });

    this.category = result.status === "TIMEOUT" ? "TIMEOUT" : "NETWORK";
    this.result = result;
  }
}
