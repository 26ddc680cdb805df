import { Agent, ProxyAgent } from "undici";
import { describe, expect, it } from "vitest";

import { createKeepAliveAgents } from "../keep-alive";

describe("createKeepAliveAgents", () => {
  it("creates one proxy agent per proxy URL", async () => {
    const agents = createKeepAliveAgents({ connectionsPerOrigin: 2 });

    const first = agents.proxyAgent("http://proxy.test:3128");
    const again = agents.proxyAgent("http://proxy.test:3128");
    const other = agents.proxyAgent("http://other-proxy.test:3128");

    expect(agents.direct).toBeInstanceOf(Agent);
    expect(first).toBeInstanceOf(ProxyAgent);
    expect(again).toBe(first);
    expect(other).not.toBe(first);

    await agents.close();
  });

  it("closes every pool once", async () => {
    const agents = createKeepAliveAgents();
    agents.proxyAgent("http://proxy.test:3128");

    const first = agents.close();
    const second = agents.close();

    expect(second).toBe(first);
    expect(agents.closed).toBe(true);
    await first;
    expect(agents.direct.closed).toBe(true);
  });

  it("refuses new proxy agents after close", async () => {
    const agents = createKeepAliveAgents();
    await agents.close();

    expect(() => agents.proxyAgent("http://proxy.test:3128")).toThrow("Connection pools are closed");
  });
});
