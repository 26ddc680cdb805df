import { describe, expect, it } from "vitest";

import { RequestTimeoutError } from "../request";
import { classifyTransportError } from "../transport-errors";

function errorWithCode(message: string, code: string, cause?: unknown): Error {
  return Object.assign(new Error(message, cause === undefined ? undefined : { cause }), { code });
}

const URL_UNDER_TEST = "https://site.test/path";

describe("classifyTransportError", () => {
  it("reports DNS failures as could not resolve host", () => {
    const failure = classifyTransportError(
      new TypeError("fetch failed", { cause: errorWithCode("getaddrinfo ENOTFOUND", "ENOTFOUND") }),
      URL_UNDER_TEST,
      10,
    );

    expect(failure).toEqual({
      kind: "dns",
      status: "ERROR",
      message: "could not resolve host site.test",
    });
  });

  it("looks inside aggregated connection errors", () => {
    const aggregate = new AggregateError([
      errorWithCode("connect ECONNREFUSED ::1:80", "ECONNREFUSED"),
      errorWithCode("connect ECONNREFUSED 127.0.0.1:80", "ECONNREFUSED"),
    ]);

    expect(classifyTransportError(aggregate, URL_UNDER_TEST, 10)).toEqual({
      kind: "connect",
      status: "ERROR",
      message: "failed to connect to host site.test",
    });
  });

  it("maps the request deadline and undici timeouts to TIMEOUT", () => {
    expect(classifyTransportError(new RequestTimeoutError(5_000), URL_UNDER_TEST, 5)).toEqual({
      kind: "timeout",
      status: "TIMEOUT",
      message: "operation timed out after 5 seconds",
    });
    expect(
      classifyTransportError(
        errorWithCode("Headers Timeout Error", "UND_ERR_HEADERS_TIMEOUT"),
        URL_UNDER_TEST,
        7,
      ).status,
    ).toBe("TIMEOUT");
  });

  it("recognises TLS failures", () => {
    const failure = classifyTransportError(
      errorWithCode("self-signed certificate", "DEPTH_ZERO_SELF_SIGNED_CERT"),
      URL_UNDER_TEST,
      10,
    );

    expect(failure.kind).toBe("tls");
    expect(failure.message).toBe("TLS handshake failed: self-signed certificate");
  });

  it("treats a closed socket as an empty reply", () => {
    expect(
      classifyTransportError(errorWithCode("other side closed", "UND_ERR_SOCKET"), URL_UNDER_TEST, 10),
    ).toEqual({ kind: "empty_reply", status: "ERROR", message: "empty reply from server" });
  });

  it("keeps the message of anything unrecognised", () => {
    expect(classifyTransportError(new Error("boom"), URL_UNDER_TEST, 10)).toEqual({
      kind: "other",
      status: "ERROR",
      message: "request failed: boom",
    });
    expect(classifyTransportError("plain", "not a url", 10).message).toBe("request failed: plain");
  });
});
