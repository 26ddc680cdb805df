import { RequestTimeoutError } from "./request";

export type TransportFailureKind =
  | "dns"
  | "connect"
  | "timeout"
  | "tls"
  | "empty_reply"
  | "receive"
  | "other";

export interface TransportFailure {
  kind: TransportFailureKind;
  status: "TIMEOUT" | "ERROR";
  message: string;
}

const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_NONAME", "EAI_FAIL"]);
const CONNECT_CODES = new Set([
  "ECONNREFUSED",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EHOSTDOWN",
  "EADDRNOTAVAIL",
]);
const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);
const TLS_CODE_PATTERN = /^(ERR_TLS_|ERR_SSL_|CERT_|UNABLE_TO_|DEPTH_ZERO_SELF_SIGNED|SELF_SIGNED|EPROTO$)/;
const RECEIVE_CODES = new Set(["ECONNRESET", "EPIPE"]);

function readErrorCode(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "code" in value) {
    return typeof value.code === "string" ? value.code : undefined;
  }

  return undefined;
}

function describeError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }

  return String(value);
}

/**
 * Walks the error, its `cause` chain and any aggregated errors, collecting
 * every errno-style code found along the way.
 */
function collectErrorCodes(error: unknown): string[] {
  const codes: string[] = [];
  const queue: unknown[] = [error];
  const seen = new Set<unknown>();

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || current === null || seen.has(current)) {
      continue;
    }
    seen.add(current);

    const code = readErrorCode(current);
    if (code) {
      codes.push(code);
    }

    if (current instanceof AggregateError) {
      queue.push(...current.errors);
    }

    if (current instanceof Error && current.cause !== undefined) {
      queue.push(current.cause);
    }
  }

  return codes;
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

/**
 * Maps a rejected request onto the probe taxonomy. Anything that never
 * produced an HTTP status is TIMEOUT or ERROR.
 */
export function classifyTransportError(
  error: unknown,
  url: string,
  timeoutSeconds: number,
): TransportFailure {
  if (error instanceof RequestTimeoutError) {
    return {
      kind: "timeout",
      status: "TIMEOUT",
      message: `operation timed out after ${timeoutSeconds} seconds`,
    };
  }

  const codes = collectErrorCodes(error);
  const host = hostOf(url);

  if (codes.some((code) => DNS_CODES.has(code))) {
    return { kind: "dns", status: "ERROR", message: `could not resolve host ${host}` };
  }

  if (codes.some((code) => CONNECT_CODES.has(code))) {
    return { kind: "connect", status: "ERROR", message: `failed to connect to host ${host}` };
  }

  if (codes.some((code) => TIMEOUT_CODES.has(code))) {
    return {
      kind: "timeout",
      status: "TIMEOUT",
      message: `operation timed out after ${timeoutSeconds} seconds`,
    };
  }

  if (codes.some((code) => TLS_CODE_PATTERN.test(code))) {
    return {
      kind: "tls",
      status: "ERROR",
      message: `TLS handshake failed: ${describeError(error)}`,
    };
  }

  if (codes.includes("UND_ERR_SOCKET")) {
    return { kind: "empty_reply", status: "ERROR", message: "empty reply from server" };
  }

  if (codes.some((code) => RECEIVE_CODES.has(code))) {
    return {
      kind: "receive",
      status: "ERROR",
      message: `failure in receiving network data: ${describeError(error)}`,
    };
  }

  return { kind: "other", status: "ERROR", message: `request failed: ${describeError(error)}` };
}
