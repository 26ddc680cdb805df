import { Agent, ProxyAgent } from "undici";

export interface KeepAliveAgentOptions {
  /** Sockets kept per origin. The monitor passes MAX_CONCURRENT_CHECKS. */
  connectionsPerOrigin?: number;
  /** Idle sockets are dropped after this long. */
  idleTimeoutMs?: number;
}

/**
 * Connection pools shared by every probe of one process: a direct agent for
 * http and https targets, plus one proxy agent per proxy URL in use. The
 * owner closes them during drain.
 */
export interface KeepAliveAgents {
  readonly direct: Agent;
  proxyAgent(proxyUrl: string): ProxyAgent;
  readonly closed: boolean;
  /** Waits for in-flight requests, then closes every pool. Idempotent. */
  close(): Promise<void>;
}

const DEFAULT_CONNECTIONS_PER_ORIGIN = 5;
const DEFAULT_IDLE_TIMEOUT_MS = 30_000;

export function createKeepAliveAgents(options: KeepAliveAgentOptions = {}): KeepAliveAgents {
  const connections = Math.max(1, options.connectionsPerOrigin ?? DEFAULT_CONNECTIONS_PER_ORIGIN);
  const keepAliveTimeout = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;

  const direct = new Agent({ connections, keepAliveTimeout, keepAliveMaxTimeout: keepAliveTimeout * 20 });
  const proxies = new Map<string, ProxyAgent>();
  let closing: Promise<void> | null = null;

  return {
    direct,
    proxyAgent(proxyUrl) {
      if (closing) {
        throw new Error("Connection pools are closed");
      }

      let agent = proxies.get(proxyUrl);
      if (!agent) {
        agent = new ProxyAgent({ uri: proxyUrl, connections, keepAliveTimeout });
        proxies.set(proxyUrl, agent);
      }
      return agent;
    },
    get closed() {
      return closing !== null;
    },
    close() {
      if (!closing) {
        const pools = [direct, ...proxies.values()];
        closing = Promise.all(pools.map((pool) => pool.close())).then(() => undefined);
      }
      return closing;
    },
  };
}
