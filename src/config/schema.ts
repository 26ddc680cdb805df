import type { Schema } from "ajv";

import { LOG_LEVELS } from "../domain";
import type { RawSettingsFile, SettingKey } from "./types";

export const URL_PATTERN = "^https?://[a-zA-Z0-9.-]+[a-zA-Z0-9]+(:[0-9]+)?(/.*)?$";

export const DEFAULT_SETTINGS: Readonly<RawSettingsFile> = {
  DEFAULT_INTERVAL: 300,
  DEFAULT_TIMEOUT: 10,
  MAX_CONCURRENT_CHECKS: 5,
  LOG_RETENTION_DAYS: 30,
  CONTENT_CHECK_ENABLED: true,
  SLOW_RESPONSE_THRESHOLD: 2000,
  CRITICAL_RESPONSE_THRESHOLD: 5000,
  LOG_LEVEL: "INFO",
  MAX_RETRY_ATTEMPTS: 3,
  RETRY_DELAY: 1,
  CIRCUIT_BREAKER_THRESHOLD: 5,
  CIRCUIT_BREAKER_TIMEOUT: 300,
  MAINTENANCE_INTERVAL: 3600,
  SCAN_INTERVAL: 5,
  STATS_WINDOW_HOURS: 24,
  MAX_LOG_SIZE_MB: 10,
  MAX_LOG_FILES: 5,
  HEALTH_CHECK_INTERVAL: 60,
  HEALTH_MAX_FAILURES: 3,
  HEALTH_STALE_AFTER: 600,
  TEMP_FILE_MAX_AGE_HOURS: 24,
};

export const SETTING_KEYS = Object.keys(DEFAULT_SETTINGS);

export function isSettingKey(value: string): value is SettingKey {
  return SETTING_KEYS.includes(value);
}

function integerSetting(key: SettingKey, minimum: number, maximum: number) {
  const range = `${key} must be an integer between ${minimum}-${maximum}`;
  return {
    type: "integer",
    minimum,
    maximum,
    default: DEFAULT_SETTINGS[key],
    errorMessage: {
      type: range,
      minimum: range,
      maximum: range,
    },
  } as const;
}

export const settingsSchema = {
  $id: "sitewarden/settings.json",
  type: "object",
  additionalProperties: false,
  properties: {
    DEFAULT_INTERVAL: integerSetting("DEFAULT_INTERVAL", 10, 86_400),
    DEFAULT_TIMEOUT: integerSetting("DEFAULT_TIMEOUT", 1, 300),
    MAX_CONCURRENT_CHECKS: integerSetting("MAX_CONCURRENT_CHECKS", 1, 50),
    LOG_RETENTION_DAYS: integerSetting("LOG_RETENTION_DAYS", 1, 365),
    CONTENT_CHECK_ENABLED: {
      type: "boolean",
      default: DEFAULT_SETTINGS.CONTENT_CHECK_ENABLED,
      errorMessage: {
        type: "CONTENT_CHECK_ENABLED must be true/false/1/0/yes/no",
      },
    },
    SLOW_RESPONSE_THRESHOLD: integerSetting("SLOW_RESPONSE_THRESHOLD", 100, 60_000),
    CRITICAL_RESPONSE_THRESHOLD: integerSetting("CRITICAL_RESPONSE_THRESHOLD", 100, 300_000),
    LOG_LEVEL: {
      type: "string",
      transform: ["trim", "toUpperCase"],
      enum: [...LOG_LEVELS],
      default: DEFAULT_SETTINGS.LOG_LEVEL,
      errorMessage: {
        enum: "LOG_LEVEL must be ERROR/WARN/INFO/DEBUG",
      },
    },
    MAX_RETRY_ATTEMPTS: integerSetting("MAX_RETRY_ATTEMPTS", 1, 10),
    RETRY_DELAY: integerSetting("RETRY_DELAY", 1, 300),
    CIRCUIT_BREAKER_THRESHOLD: integerSetting("CIRCUIT_BREAKER_THRESHOLD", 1, 100),
    CIRCUIT_BREAKER_TIMEOUT: integerSetting("CIRCUIT_BREAKER_TIMEOUT", 1, 86_400),
    MAINTENANCE_INTERVAL: integerSetting("MAINTENANCE_INTERVAL", 60, 86_400),
    SCAN_INTERVAL: integerSetting("SCAN_INTERVAL", 1, 60),
    STATS_WINDOW_HOURS: integerSetting("STATS_WINDOW_HOURS", 1, 720),
    MAX_LOG_SIZE_MB: integerSetting("MAX_LOG_SIZE_MB", 1, 1_024),
    MAX_LOG_FILES: integerSetting("MAX_LOG_FILES", 1, 100),
    HEALTH_CHECK_INTERVAL: integerSetting("HEALTH_CHECK_INTERVAL", 10, 3_600),
    HEALTH_MAX_FAILURES: integerSetting("HEALTH_MAX_FAILURES", 1, 100),
    HEALTH_STALE_AFTER: integerSetting("HEALTH_STALE_AFTER", 30, 86_400),
    TEMP_FILE_MAX_AGE_HOURS: integerSetting("TEMP_FILE_MAX_AGE_HOURS", 1, 720),
  },
} as const satisfies Schema & { errorMessage?: unknown };

export const targetEntrySchema = {
  $id: "sitewarden/target-entry.json",
  type: "object",
  additionalProperties: false,
  required: ["url"],
  properties: {
    url: {
      type: "string",
      pattern: URL_PATTERN,
      errorMessage: {
        pattern: "Invalid URL format",
      },
    },
    name: {
      type: "string",
      minLength: 1,
    },
    interval: {
      type: "integer",
      minimum: 10,
      maximum: 86_400,
      errorMessage: {
        type: "Interval must be a number between 10-86400",
        minimum: "Interval must be a number between 10-86400",
        maximum: "Interval must be a number between 10-86400",
      },
    },
    timeout: {
      type: "integer",
      minimum: 1,
      maximum: 300,
      errorMessage: {
        type: "Timeout must be a number between 1-300",
        minimum: "Timeout must be a number between 1-300",
        maximum: "Timeout must be a number between 1-300",
      },
    },
    content_check: {
      type: "boolean",
      errorMessage: {
        type: "Content check must be true/false/1/0/yes/no",
      },
    },
  },
  errorMessage: {
    required: {
      url: "URL cannot be empty",
    },
  },
} as const satisfies Schema & { errorMessage?: unknown };
