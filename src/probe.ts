import { performance } from "node:perf_hooks";
import type { Dispatcher } from "undici";

import type { ContentHashStore } from "./content-hash-store";
import { computeContentDigest } from "./content-hash-store";
import type { PerformanceFlag, ProbeResult, Target } from "./domain";
import { TransportError } from "./errors";
import {
  classifyTransportError,
  describeStatus,
  httpRequest,
  isAvailableStatus,
  type HttpRequestFn,
  type KeepAliveAgents,
} from "./http";
import { retriesFromMaxAttempts, retryOperation, type RetryHooks, type RetryOptions } from "./retry";
import { USER_AGENT } from "./version";

export type ProbeTarget = Pick<Target, "url" | "key" | "name" | "timeoutSeconds" | "contentCheck">;

export interface ProbeThresholds {
  slowResponseThresholdMs: number;
  criticalResponseThresholdMs: number;
}

export interface ContentRetryPolicy {
  retries: number;
  initialDelayMs: number;
  wait?: RetryOptions["wait"];
}

export interface ProbeDependencies {
  request?: HttpRequestFn;
  keepAliveAgents?: KeepAliveAgents;
  env?: NodeJS.ProcessEnv;
  /** Required for content checks. Targets with contentCheck are fetched only once without it. */
  contentStore?: ContentHashStore;
  now?: () => Date;
  /** Monotonic milliseconds used for latency. */
  clock?: () => number;
  userAgent?: string;
}

export interface ProbeExecuteOptions {
  signal?: AbortSignal;
  /** Hooks for the retried content fetch. */
  contentRetryHooks?: RetryHooks;
}

const DEFAULT_CONTENT_RETRY: ContentRetryPolicy = { retries: 2, initialDelayMs: 1_000 };

/** Anything that can run a single probe attempt against a target. */
export interface ProbeRunner {
  execute(target: ProbeTarget, options?: ProbeExecuteOptions): Promise<ProbeResult>;
  updateThresholds?(thresholds: ProbeThresholds): void;
}

export function classifyPerformance(
  responseTimeMs: number,
  thresholds: ProbeThresholds,
): PerformanceFlag | undefined {
  if (responseTimeMs > thresholds.criticalResponseThresholdMs) {
    return "CRITICAL";
  }

  if (responseTimeMs > thresholds.slowResponseThresholdMs) {
    return "SLOW";
  }

  return undefined;
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one check against one target. Transport failures are classified into
 * the result rather than thrown; only programming errors escape.
 */
export class Probe implements ProbeRunner {
  private readonly request: HttpRequestFn;
  private readonly clock: () => number;
  private readonly now: () => Date;
  private readonly userAgent: string;
  private readonly contentRetry: ContentRetryPolicy;
  private thresholds: ProbeThresholds;

  constructor(
    thresholds: ProbeThresholds,
    private readonly dependencies: ProbeDependencies = {},
    contentRetry: ContentRetryPolicy = DEFAULT_CONTENT_RETRY,
  ) {
    this.thresholds = { ...thresholds };
    this.request = dependencies.request ?? httpRequest;
    this.clock = dependencies.clock ?? (() => performance.now());
    this.now = dependencies.now ?? (() => new Date());
    this.userAgent = dependencies.userAgent ?? USER_AGENT;
    this.contentRetry = contentRetry;
  }

  updateThresholds(thresholds: ProbeThresholds): void {
    this.thresholds = { ...thresholds };
  }

  async execute(target: ProbeTarget, options: ProbeExecuteOptions = {}): Promise<ProbeResult> {
    const checkedAt = this.now();
    const startedAt = this.clock();

    let httpStatus: number;
    try {
      const response = await this.send(target, options.signal);
      httpStatus = response.statusCode;
      await response.body.dump();
    } catch (error) {
      const failure = classifyTransportError(error, target.url, target.timeoutSeconds);
      return {
        url: target.url,
        checkedAt,
        httpStatus: 0,
        responseTimeMs: this.elapsedSince(startedAt),
        status: failure.status,
        errorMessage: failure.message,
      };
    }

    const responseTimeMs = this.elapsedSince(startedAt);
    const statusDescription = describeStatus(httpStatus);

    if (!isAvailableStatus(httpStatus)) {
      return {
        url: target.url,
        checkedAt,
        httpStatus,
        responseTimeMs,
        status: "DOWN",
        statusDescription,
        errorMessage: `HTTP ${httpStatus} ${statusDescription}`,
      };
    }

    const result: ProbeResult = {
      url: target.url,
      checkedAt,
      httpStatus,
      responseTimeMs,
      status: "UP",
      statusDescription,
    };

    const performanceFlag = classifyPerformance(responseTimeMs, this.thresholds);
    if (performanceFlag) {
      result.performance = performanceFlag;
    }

    const store = this.dependencies.contentStore;
    if (target.contentCheck && store) {
      try {
        const body = await retryOperation(() => this.fetchBody(target, options.signal), {
          retries: this.contentRetry.retries,
          backoff: { initialDelayMs: this.contentRetry.initialDelayMs },
          wait: this.contentRetry.wait,
          ...options.contentRetryHooks,
        });
        result.content = await store.compareAndStore(
          target.key,
          computeContentDigest(body),
          checkedAt.getTime(),
        );
      } catch (error) {
        result.contentError = `Content fetch failed: ${describeFailure(error)}`;
      }
    }

    return result;
  }

  private async send(target: ProbeTarget, signal: AbortSignal | undefined): Promise<Dispatcher.ResponseData> {
    const timeoutMs = target.timeoutSeconds * 1_000;
    return await this.request({
      url: target.url,
      method: "GET",
      timeoutMs,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      headers: { "user-agent": this.userAgent },
      keepAliveAgents: this.dependencies.keepAliveAgents,
      env: this.dependencies.env,
      signal,
    });
  }

  private async fetchBody(target: ProbeTarget, signal: AbortSignal | undefined): Promise<Uint8Array> {
    let response: Dispatcher.ResponseData;
    try {
      response = await this.send(target, signal);
    } catch (error) {
      throw new Error(classifyTransportError(error, target.url, target.timeoutSeconds).message, {
        cause: error,
      });
    }

    if (!isAvailableStatus(response.statusCode)) {
      await response.body.dump();
      throw new Error(`HTTP ${response.statusCode} ${describeStatus(response.statusCode)}`);
    }

    return new Uint8Array(await response.body.arrayBuffer());
  }

  private elapsedSince(startedAt: number): number {
    return Math.max(0, Math.round(this.clock() - startedAt));
  }
}

export interface ProbeWithRetryOptions extends RetryHooks {
  /** Total attempts including the first one. */
  maxAttempts: number;
  initialDelayMs: number;
  /** 1 gives a fixed delay. Defaults to 2. */
  factor?: number;
  /** 0 disables jitter. Defaults to 0.25. */
  jitterRatio?: number;
  wait?: RetryOptions["wait"];
  signal?: AbortSignal;
  contentRetryHooks?: RetryHooks;
}

/**
 * Re-runs the probe while it ends in ERROR or TIMEOUT. A DOWN result is a
 * valid answer and is returned as is. When attempts run out the last failed
 * result is returned.
 */
export async function probeWithRetry(
  probe: ProbeRunner,
  target: ProbeTarget,
  options: ProbeWithRetryOptions,
): Promise<ProbeResult> {
  try {
    return await retryOperation(
      async (attempt) => {
        const result = await probe.execute(target, {
          signal: options.signal,
          contentRetryHooks: options.contentRetryHooks,
        });
        if (result.status === "ERROR" || result.status === "TIMEOUT") {
          throw new TransportError(result, { targetName: target.name, attempt, url: target.url });
        }
        return result;
      },
      {
        retries: retriesFromMaxAttempts(options.maxAttempts),
        backoff: {
          initialDelayMs: options.initialDelayMs,
          factor: options.factor,
          jitterRatio: options.jitterRatio,
        },
        shouldRetry: (error) => error instanceof TransportError && options.signal?.aborted !== true,
        wait: options.wait,
        onRetry: options.onRetry,
        onSuccessAfterRetry: options.onSuccessAfterRetry,
        onExhausted: options.onExhausted,
      },
    );
  } catch (error) {
    if (error instanceof TransportError) {
      return error.result;
    }
    throw error;
  }
}
