import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";

import { ContentHashStore, computeContentDigest } from "../content-hash-store";
import { httpRequest, type HttpRequestFn } from "../http";
import { Probe, probeWithRetry, type ProbeTarget } from "../probe";
import { startMockSiteServer, type MockSiteServer } from "../testing/mock-site-server";

const thresholds = { slowResponseThresholdMs: 2_000, criticalResponseThresholdMs: 5_000 };

function sequenceClock(values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)];
    index += 1;
    return value;
  };
}

function dnsFailure(): Error {
  return Object.assign(new Error("getaddrinfo ENOTFOUND 127.0.0.1"), { code: "ENOTFOUND" });
}

describe("probe against a local site", () => {
  let server: MockSiteServer;

  beforeAll(async () => {
    server = await startMockSiteServer({ slowDelayMs: 50 });
  });

  afterAll(async () => {
    await server.close();
  });

  function target(pathname: string, overrides: Partial<ProbeTarget> = {}): ProbeTarget {
    const url = server.url(pathname);
    return { url, key: url, name: pathname, timeoutSeconds: 2, contentCheck: false, ...overrides };
  }

  it("classifies a 200 response as UP without a latency flag", async () => {
    const probe = new Probe(thresholds, {
      env: {},
      clock: sequenceClock([1_000, 1_150]),
      now: () => new Date("2024-05-01T00:00:00.000Z"),
    });

    const result = await probe.execute(target("/ok"));

    expect(result).toEqual({
      url: server.url("/ok"),
      checkedAt: new Date("2024-05-01T00:00:00.000Z"),
      httpStatus: 200,
      responseTimeMs: 150,
      status: "UP",
      statusDescription: "OK",
    });
  });

  it("classifies a 503 response as DOWN with its description", async () => {
    const probe = new Probe(thresholds, { env: {} });

    const result = await probe.execute(target("/status/503"));

    expect(result.status).toBe("DOWN");
    expect(result.httpStatus).toBe(503);
    expect(result.statusDescription).toBe("Service Unavailable");
    expect(result.errorMessage).toBe("HTTP 503 Service Unavailable");
  });

  it("follows redirects to the final response", async () => {
    const result = await new Probe(thresholds, { env: {} }).execute(target("/redirect"));

    expect(result.status).toBe("UP");
    expect(result.httpStatus).toBe(200);
  });

  it("flags slow and critical latency on UP results", async () => {
    const slow = await new Probe(thresholds, { env: {}, clock: sequenceClock([0, 2_500]) }).execute(
      target("/ok"),
    );
    const critical = await new Probe(thresholds, { env: {}, clock: sequenceClock([0, 6_000]) }).execute(
      target("/ok"),
    );

    expect(slow.performance).toBe("SLOW");
    expect(critical.performance).toBe("CRITICAL");
  });

  it("does not flag latency on DOWN results", async () => {
    const result = await new Probe(thresholds, { env: {}, clock: sequenceClock([0, 9_000]) }).execute(
      target("/status/500"),
    );

    expect(result.status).toBe("DOWN");
    expect(result.performance).toBeUndefined();
  });

  it("reports a timeout when the site never answers", async () => {
    const result = await new Probe(thresholds, { env: {} }).execute(
      target("/hang", { timeoutSeconds: 1 }),
    );

    expect(result.status).toBe("TIMEOUT");
    expect(result.httpStatus).toBe(0);
    expect(result.errorMessage).toBe("operation timed out after 1 seconds");
  });

  it("reports an error when the connection closes without a response", async () => {
    const result = await new Probe(thresholds, { env: {} }).execute(target("/drop"));

    expect(result.status).toBe("ERROR");
    expect(result.httpStatus).toBe(0);
  });

  it("tracks body changes across probes", async () => {
    const store = new ContentHashStore();
    const probe = new Probe(thresholds, { env: {}, contentStore: store });
    const contentTarget = target("/content", { contentCheck: true });

    server.setContent("first body");
    const first = await probe.execute(contentTarget);
    const second = await probe.execute(contentTarget);
    server.setContent("second body");
    const third = await probe.execute(contentTarget);

    expect(first.content?.status).toBe("CONTENT_INITIAL");
    expect(first.content?.hash).toBe(computeContentDigest("first body"));
    expect(second.content?.status).toBe("CONTENT_UNCHANGED");
    expect(third.content?.status).toBe("CONTENT_CHANGED");
    expect(third.content?.summary).toContain(
      `previous: ${computeContentDigest("first body").slice(0, 8)}..., current: ${computeContentDigest("second body").slice(0, 8)}...`,
    );
  });

  it("keeps the probe UP when only the content fetch fails", async () => {
    let calls = 0;
    const flaky: HttpRequestFn = async (options) => {
      calls += 1;
      if (calls > 1) {
        throw dnsFailure();
      }
      return await httpRequest(options);
    };
    const onExhausted = vi.fn();
    const probe = new Probe(
      thresholds,
      { env: {}, request: flaky, contentStore: new ContentHashStore() },
      { retries: 2, initialDelayMs: 10, wait: () => Promise.resolve() },
    );

    const result = await probe.execute(target("/content", { contentCheck: true }), {
      contentRetryHooks: { onExhausted },
    });

    expect(result.status).toBe("UP");
    expect(result.content).toBeUndefined();
    expect(result.contentError).toBe("Content fetch failed: could not resolve host 127.0.0.1");
    expect(calls).toBe(4);
    expect(onExhausted).toHaveBeenCalledTimes(1);
    expect(onExhausted.mock.calls[0][1]).toBe(3);
  });

  it("does not retry a DOWN result", async () => {
    const before = server.requestCount("/status/404");
    const wait = vi.fn(() => Promise.resolve());

    const result = await probeWithRetry(new Probe(thresholds, { env: {} }), target("/status/404"), {
      maxAttempts: 3,
      initialDelayMs: 10,
      wait,
    });

    expect(result.status).toBe("DOWN");
    expect(result.statusDescription).toBe("Not Found");
    expect(server.requestCount("/status/404") - before).toBe(1);
    expect(wait).not.toHaveBeenCalled();
  });
});

describe("probe transport failures", () => {
  const unresolvable: ProbeTarget = {
    url: "https://unresolvable.example.test/",
    key: "https://unresolvable.example.test/",
    name: "unresolvable",
    timeoutSeconds: 5,
    contentCheck: false,
  };

  it("classifies a DNS failure as ERROR and retries up to the attempt budget", async () => {
    const request = vi.fn<HttpRequestFn>(() => Promise.reject(dnsFailure()));
    const onRetry = vi.fn();
    const onExhausted = vi.fn();

    const result = await probeWithRetry(new Probe(thresholds, { request }), unresolvable, {
      maxAttempts: 3,
      initialDelayMs: 1_000,
      wait: () => Promise.resolve(),
      onRetry,
      onExhausted,
    });

    expect(result.status).toBe("ERROR");
    expect(result.httpStatus).toBe(0);
    expect(result.errorMessage).toBe("could not resolve host unresolvable.example.test");
    expect(request).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onExhausted).toHaveBeenCalledTimes(1);
  });

  it("makes a single attempt with a budget of one and rejects an empty budget", async () => {
    const request = vi.fn<HttpRequestFn>(() => Promise.reject(dnsFailure()));
    const probe = new Probe(thresholds, { request });

    const result = await probeWithRetry(probe, unresolvable, { maxAttempts: 1, initialDelayMs: 1 });
    expect(result.status).toBe("ERROR");
    expect(request).toHaveBeenCalledTimes(1);

    await expect(probeWithRetry(probe, unresolvable, { maxAttempts: 0, initialDelayMs: 1 })).rejects.toThrow(
      "maxAttempts must be a finite number greater than or equal to 1",
    );
    expect(request).toHaveBeenCalledTimes(1);
  });

  it("returns the last failure when every attempt fails", async () => {
    let calls = 0;
    const request: HttpRequestFn = () => {
      calls += 1;
      return Promise.reject(
        calls === 1
          ? dnsFailure()
          : Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" }),
      );
    };
    const onSuccessAfterRetry = vi.fn();

    const result = await probeWithRetry(new Probe(thresholds, { request }), unresolvable, {
      maxAttempts: 2,
      initialDelayMs: 1,
      wait: () => Promise.resolve(),
      onSuccessAfterRetry,
    });

    expect(result.errorMessage).toBe("failed to connect to host unresolvable.example.test");
    expect(onSuccessAfterRetry).not.toHaveBeenCalled();
  });
});
