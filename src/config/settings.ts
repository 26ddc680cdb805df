import { isSettingKey } from "./schema";
import type { ConfigWarning, MonitorSettings, RawSettingsFile } from "./types";
import { validateSettings } from "./validator";

const SETTING_LINE = /^([A-Z_][A-Z0-9_]*)=(.*)$/;

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

export function toMonitorSettings(raw: RawSettingsFile): MonitorSettings {
  return {
    defaultIntervalSeconds: raw.DEFAULT_INTERVAL,
    defaultTimeoutSeconds: raw.DEFAULT_TIMEOUT,
    maxConcurrentChecks: raw.MAX_CONCURRENT_CHECKS,
    logRetentionDays: raw.LOG_RETENTION_DAYS,
    contentCheckEnabled: raw.CONTENT_CHECK_ENABLED,
    slowResponseThresholdMs: raw.SLOW_RESPONSE_THRESHOLD,
    criticalResponseThresholdMs: raw.CRITICAL_RESPONSE_THRESHOLD,
    logLevel: raw.LOG_LEVEL,
    maxRetryAttempts: raw.MAX_RETRY_ATTEMPTS,
    retryDelaySeconds: raw.RETRY_DELAY,
    circuitBreakerThreshold: raw.CIRCUIT_BREAKER_THRESHOLD,
    circuitBreakerTimeoutSeconds: raw.CIRCUIT_BREAKER_TIMEOUT,
    maintenanceIntervalSeconds: raw.MAINTENANCE_INTERVAL,
    scanIntervalSeconds: raw.SCAN_INTERVAL,
    statsWindowHours: raw.STATS_WINDOW_HOURS,
    maxLogSizeMb: raw.MAX_LOG_SIZE_MB,
    maxLogFiles: raw.MAX_LOG_FILES,
    healthCheckIntervalSeconds: raw.HEALTH_CHECK_INTERVAL,
    healthMaxFailures: raw.HEALTH_MAX_FAILURES,
    healthStaleAfterSeconds: raw.HEALTH_STALE_AFTER,
    tempFileMaxAgeHours: raw.TEMP_FILE_MAX_AGE_HOURS,
  };
}

export interface ParsedSettings {
  settings: MonitorSettings;
  warnings: ConfigWarning[];
}

/**
 * Parses `KEY=value` lines. Blank lines and `#` comments are skipped; lines
 * that are not assignments, unknown keys and invalid values produce warnings.
 * A later assignment of the same key wins.
 */
export function parseSettings(content: string): ParsedSettings {
  const values: Record<string, string> = {};
  const lineNumbers: Record<string, number> = {};
  const warnings: ConfigWarning[] = [];

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    const lineNumber = index + 1;

    if (line.length === 0 || line.startsWith("#")) {
      return;
    }

    const match = SETTING_LINE.exec(line);
    if (!match) {
      warnings.push({ line: lineNumber, message: `Invalid configuration line: ${line}` });
      return;
    }

    const [, key, value] = match;
    if (!isSettingKey(key)) {
      warnings.push({ line: lineNumber, message: `Unknown configuration key: ${key}` });
      return;
    }

    values[key] = stripQuotes(value);
    lineNumbers[key] = lineNumber;
  });

  const validated = validateSettings(values, lineNumbers);

  return {
    settings: toMonitorSettings(validated.settings),
    warnings: [...warnings, ...validated.warnings],
  };
}

export function defaultSettings(): MonitorSettings {
  return parseSettings("").settings;
}
