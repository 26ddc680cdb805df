import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { isProxyBypassed, resolveProxy } from "../request";

describe("resolveProxy", () => {
  it("prefers HTTPS_PROXY for https targets and falls back to HTTP_PROXY", () => {
    const url = new URL("https://shop.example.test/health");

    expect(resolveProxy(url, { HTTPS_PROXY: "http://secure-proxy.test:3128", HTTP_PROXY: "http://proxy.test:3128" })).toBe(
      "http://secure-proxy.test:3128",
    );
    expect(resolveProxy(url, { http_proxy: " http://proxy.test:3128 " })).toBe("http://proxy.test:3128");
  });

  it("ignores HTTPS_PROXY and blank values for http targets", () => {
    expect(
      resolveProxy(new URL("http://example.test/"), { HTTPS_PROXY: "http://secure-proxy.test:3128", HTTP_PROXY: "  " }),
    ).toBeUndefined();
  });

  it("skips the proxy for NO_PROXY hosts", () => {
    const env = { HTTP_PROXY: "http://proxy.test:3128", NO_PROXY: "localhost, .internal.test" };

    expect(resolveProxy(new URL("http://status.internal.test/"), env)).toBeUndefined();
    expect(resolveProxy(new URL("http://example.test/"), env)).toBe("http://proxy.test:3128");
  });
});

describe("isProxyBypassed", () => {
  it.each([
    ["*", "http://anything.test/", true],
    ["example.test", "http://example.test/", true],
    ["example.test", "http://api.example.test/", true],
    ["example.test", "http://notexample.test/", false],
    ["*.example.test", "https://api.example.test/", true],
    ["example.test:8080", "http://example.test:8080/", true],
    ["example.test:8080", "http://example.test/", false],
    ["example.test:443", "https://example.test/", true],
  ])("NO_PROXY=%s for %s is %s", (noProxy, url, expected) => {
    expect(isProxyBypassed(new URL(url), { no_proxy: noProxy })).toBe(expected);
  });
});

describe("httpRequest dispatcher selection", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    vi.doUnmock("undici");
    vi.resetModules();
  });

  async function loadWithMockedUndici() {
    const requestSpy = vi.fn().mockResolvedValue({ statusCode: 200, body: { dump: () => Promise.resolve() } });
    const created: Array<{ kind: string; options: unknown }> = [];

    class MockAgent {
      closed = false;

      constructor(options: unknown) {
        created.push({ kind: "agent", options });
      }

      close(): Promise<void> {
        this.closed = true;
        return Promise.resolve();
      }
    }

    class MockProxyAgent extends MockAgent {
      constructor(options: unknown) {
        super(options);
        created[created.length - 1] = { kind: "proxy", options };
      }
    }

    vi.doMock("undici", () => ({ request: requestSpy, Agent: MockAgent, ProxyAgent: MockProxyAgent }));

    const { httpRequest } = await import("../request");
    const { createKeepAliveAgents } = await import("../keep-alive");
    return { httpRequest, createKeepAliveAgents, requestSpy, created };
  }

  it("sends direct requests through the pooled agent", async () => {
    const { httpRequest, createKeepAliveAgents, requestSpy } = await loadWithMockedUndici();
    const agents = createKeepAliveAgents({ connectionsPerOrigin: 3 });

    await httpRequest({ url: "https://example.test/", keepAliveAgents: agents, env: {} });

    expect(requestSpy).toHaveBeenCalledWith(
      new URL("https://example.test/"),
      expect.objectContaining({ dispatcher: agents.direct, method: "GET", maxRedirections: 5 }),
    );
  });

  it("routes proxied requests through a proxy agent from the pools", async () => {
    const { httpRequest, createKeepAliveAgents, requestSpy, created } = await loadWithMockedUndici();
    const agents = createKeepAliveAgents({ connectionsPerOrigin: 3 });
    const env = { HTTP_PROXY: "http://proxy.test:3128" };

    await httpRequest({ url: "http://example.test/a", keepAliveAgents: agents, env });
    await httpRequest({ url: "http://example.test/b", keepAliveAgents: agents, env });

    const proxies = created.filter((entry) => entry.kind === "proxy");
    expect(proxies).toEqual([
      { kind: "proxy", options: { uri: "http://proxy.test:3128", connections: 3, keepAliveTimeout: 30_000 } },
    ]);
    expect(requestSpy).toHaveBeenLastCalledWith(
      new URL("http://example.test/b"),
      expect.objectContaining({ dispatcher: agents.proxyAgent("http://proxy.test:3128") }),
    );
  });

  it("refuses a proxied request without pools to own the proxy agent", async () => {
    const { httpRequest, requestSpy, created } = await loadWithMockedUndici();

    await expect(
      httpRequest({ url: "http://example.test/", env: { HTTP_PROXY: "http://proxy.test:3128" } }),
    ).rejects.toThrow(
      "Proxy http://proxy.test:3128 is configured for http://example.test/ but no connection pools were provided",
    );
    expect(requestSpy).not.toHaveBeenCalled();
    expect(created).toEqual([]);
  });

  it("leaves dispatcher selection to undici without pools or proxy", async () => {
    const { httpRequest, requestSpy } = await loadWithMockedUndici();

    await httpRequest({ url: "http://example.test/", env: {} });

    expect(requestSpy.mock.calls[0]?.[1]).not.toHaveProperty("dispatcher");
  });
});
