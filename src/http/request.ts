import { request, type Dispatcher } from "undici";

import type { KeepAliveAgents } from "./keep-alive";

/** Redirects followed before the last response is returned as is. */
export const MAX_REDIRECTIONS = 5;

export class RequestTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export interface HttpRequestOptions
  extends Pick<Dispatcher.RequestOptions, "headers" | "headersTimeout" | "bodyTimeout"> {
  url: string;
  method?: Dispatcher.HttpMethod;
  /** Rejects with {@link RequestTimeoutError} when no response arrives in time. */
  timeoutMs?: number;
  signal?: AbortSignal;
  maxRedirections?: number;
  /** Required when a proxy applies to the URL; proxy agents live in these pools. */
  keepAliveAgents?: KeepAliveAgents;
  /** Source of the proxy variables. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

export type HttpRequestFn = (options: HttpRequestOptions) => Promise<Dispatcher.ResponseData>;

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name] ?? env[name.toLowerCase()];
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * True when `NO_PROXY` exempts the URL. Entries are host names, matched on
 * the host itself and its subdomains, optionally with a port; `*` exempts
 * everything.
 */
export function isProxyBypassed(url: URL, env: NodeJS.ProcessEnv): boolean {
  const noProxy = readEnv(env, "NO_PROXY");
  if (!noProxy) {
    return false;
  }

  const host = url.hostname.toLowerCase();
  const port = url.port || (url.protocol === "https:" ? "443" : "80");

  return noProxy
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0)
    .some((entry) => {
      if (entry === "*") {
        return true;
      }

      const [entryHost, entryPort] = entry.split(":");
      if (entryPort !== undefined && entryPort !== port) {
        return false;
      }

      const bare = entryHost.replace(/^\*?\./, "");
      return host === bare || host.endsWith(`.${bare}`);
    });
}

/** Proxy for the URL from `HTTPS_PROXY`/`HTTP_PROXY` (either case), honouring `NO_PROXY`. */
export function resolveProxy(url: URL, env: NodeJS.ProcessEnv): string | undefined {
  if (isProxyBypassed(url, env)) {
    return undefined;
  }

  if (url.protocol === "https:") {
    return readEnv(env, "HTTPS_PROXY") ?? readEnv(env, "HTTP_PROXY");
  }

  return readEnv(env, "HTTP_PROXY");
}

function selectDispatcher(
  url: URL,
  agents: KeepAliveAgents | undefined,
  env: NodeJS.ProcessEnv,
): Dispatcher | undefined {
  const proxy = resolveProxy(url, env);

  if (proxy) {
    if (!agents) {
      throw new Error(`Proxy ${proxy} is configured for ${url.href} but no connection pools were provided`);
    }
    return agents.proxyAgent(proxy);
  }

  return agents?.direct;
}

/**
 * Issues one request through undici, following redirects. The caller
 * consumes or dumps the body; `bodyTimeout` bounds reading it.
 */
export async function httpRequest(options: HttpRequestOptions): Promise<Dispatcher.ResponseData> {
  const target = new URL(options.url);
  if (target.protocol !== "http:" && target.protocol !== "https:") {
    throw new Error(`Unsupported protocol for request: ${target.protocol}`);
  }

  const dispatcher = selectDispatcher(target, options.keepAliveAgents, options.env ?? process.env);

  const controller = new AbortController();
  const { signal, timeoutMs } = options;
  let timer: NodeJS.Timeout | undefined;

  const onAbort = () => {
    controller.abort(signal?.reason);
  };
  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  if (timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs > 0) {
    timer = setTimeout(() => {
      controller.abort(new RequestTimeoutError(timeoutMs));
    }, timeoutMs);
  }

  try {
    return await request(target, {
      method: options.method ?? "GET",
      headers: options.headers,
      headersTimeout: options.headersTimeout,
      bodyTimeout: options.bodyTimeout,
      maxRedirections: options.maxRedirections ?? MAX_REDIRECTIONS,
      signal: controller.signal,
      ...(dispatcher ? { dispatcher } : {}),
    });
  } catch (error) {
    const reason: unknown = controller.signal.reason;
    if (controller.signal.aborted && reason instanceof Error) {
      throw reason;
    }
    throw error;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}
