import type { LogLevel } from "../domain";

/**
 * Settings as they appear in `monitor.conf`, after coercion.
 */
export interface RawSettingsFile {
  DEFAULT_INTERVAL: number;
  DEFAULT_TIMEOUT: number;
  MAX_CONCURRENT_CHECKS: number;
  LOG_RETENTION_DAYS: number;
  CONTENT_CHECK_ENABLED: boolean;
  SLOW_RESPONSE_THRESHOLD: number;
  CRITICAL_RESPONSE_THRESHOLD: number;
  LOG_LEVEL: LogLevel;
  MAX_RETRY_ATTEMPTS: number;
  RETRY_DELAY: number;
  CIRCUIT_BREAKER_THRESHOLD: number;
  CIRCUIT_BREAKER_TIMEOUT: number;
  MAINTENANCE_INTERVAL: number;
  SCAN_INTERVAL: number;
  STATS_WINDOW_HOURS: number;
  MAX_LOG_SIZE_MB: number;
  MAX_LOG_FILES: number;
  HEALTH_CHECK_INTERVAL: number;
  HEALTH_MAX_FAILURES: number;
  HEALTH_STALE_AFTER: number;
  TEMP_FILE_MAX_AGE_HOURS: number;
}

export type SettingKey = keyof RawSettingsFile;

export interface MonitorSettings {
  defaultIntervalSeconds: number;
  defaultTimeoutSeconds: number;
  maxConcurrentChecks: number;
  logRetentionDays: number;
  contentCheckEnabled: boolean;
  slowResponseThresholdMs: number;
  criticalResponseThresholdMs: number;
  logLevel: LogLevel;
  /** Total probe attempts, first attempt included. */
  maxRetryAttempts: number;
  retryDelaySeconds: number;
  circuitBreakerThreshold: number;
  circuitBreakerTimeoutSeconds: number;
  maintenanceIntervalSeconds: number;
  scanIntervalSeconds: number;
  statsWindowHours: number;
  maxLogSizeMb: number;
  maxLogFiles: number;
  healthCheckIntervalSeconds: number;
  healthMaxFailures: number;
  healthStaleAfterSeconds: number;
  tempFileMaxAgeHours: number;
}

/**
 * One `websites.conf` line after coercion. Omitted fields fall back to the
 * settings defaults.
 */
export interface RawTargetEntry {
  url: string;
  name?: string;
  interval?: number;
  timeout?: number;
  content_check?: boolean;
}

export interface ConfigWarning {
  /** 1-based line number in the source file, when the warning is tied to a line. */
  line?: number;
  message: string;
}
