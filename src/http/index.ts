export type { ConcurrencyLimiter } from "./concurrency";
export { createConcurrencyLimiter, KeyedLock } from "./concurrency";
export type { KeepAliveAgentOptions, KeepAliveAgents } from "./keep-alive";
export { createKeepAliveAgents } from "./keep-alive";
export type { HttpRequestFn, HttpRequestOptions } from "./request";
export { MAX_REDIRECTIONS, RequestTimeoutError, httpRequest, isProxyBypassed, resolveProxy } from "./request";
export type { StatusCategory, StatusInfo, StatusSeverity } from "./status-text";
export { categorizeStatus, describeStatus, getStatusInfo, isAvailableStatus } from "./status-text";
export type { TransportFailure, TransportFailureKind } from "./transport-errors";
export { classifyTransportError } from "./transport-errors";
