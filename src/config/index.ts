export { ConfigError, ConfigValidationError } from "./errors";
export type { LoadConfigOptions, LoadedConfiguration } from "./loader";
export { SETTINGS_FILE_NAME, TARGETS_FILE_NAME, loadConfiguration } from "./loader";
export { TargetRegistry } from "./registry";
export { DEFAULT_SETTINGS, URL_PATTERN } from "./schema";
export { defaultSettings, parseSettings, toMonitorSettings } from "./settings";
export {
  MIN_INTERVAL_SECONDS,
  MIN_TIMEOUT_SECONDS,
  isValidTargetUrl,
  parseTargets,
  targetKey,
  validateTarget,
} from "./targets";
export type { ConfigWarning, MonitorSettings, RawSettingsFile, RawTargetEntry } from "./types";
export { normalizeBooleanToken } from "./validator";
