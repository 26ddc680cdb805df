import { promises as fs } from "node:fs";
import { join } from "node:path";

import type { Target } from "../domain";
import { ConfigError } from "./errors";
import { parseSettings } from "./settings";
import { parseTargets } from "./targets";
import type { ConfigWarning, MonitorSettings } from "./types";

export const SETTINGS_FILE_NAME = "monitor.conf";
export const TARGETS_FILE_NAME = "websites.conf";

export interface LoadedConfiguration {
  settings: MonitorSettings;
  targets: Target[];
  /** Warnings prefixed with the file they came from. */
  warnings: string[];
  settingsPath: string;
  targetsPath: string;
}

export interface LoadConfigOptions {
  configDir: string;
  /**
   * Reject a targets file that yields no valid entry. Off by default; the
   * registry itself accepts an empty set.
   */
  requireTargets?: boolean;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT"
  );
}

function formatWarnings(fileName: string, warnings: ConfigWarning[]): string[] {
  return warnings.map((warning) =>
    warning.line === undefined
      ? `${fileName}: ${warning.message}`
      : `${fileName}:${warning.line}: ${warning.message}`,
  );
}

async function readSettingsFile(path: string): Promise<string> {
  try {
    return await fs.readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return "";
    }
    const message = error instanceof Error ? error.message : "Unknown read error";
    throw new ConfigError(`Unable to read settings at ${path}: ${message}`, {
      cause: error,
      path,
    });
  }
}

async function readTargetsFile(path: string): Promise<string> {
  try {
    return await fs.readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown read error";
    throw new ConfigError(`Unable to read targets configuration at ${path}: ${message}`, {
      cause: error,
      path,
    });
  }
}

export async function loadConfiguration(options: LoadConfigOptions): Promise<LoadedConfiguration> {
  const settingsPath = join(options.configDir, SETTINGS_FILE_NAME);
  const targetsPath = join(options.configDir, TARGETS_FILE_NAME);

  const parsedSettings = parseSettings(await readSettingsFile(settingsPath));
  const parsedTargets = parseTargets(await readTargetsFile(targetsPath), parsedSettings.settings);

  if (options.requireTargets && parsedTargets.targets.length === 0) {
    throw new ConfigError(`No valid targets found in ${targetsPath}`, { path: targetsPath });
  }

  return {
    settings: parsedSettings.settings,
    targets: parsedTargets.targets,
    warnings: [
      ...formatWarnings(SETTINGS_FILE_NAME, parsedSettings.warnings),
      ...formatWarnings(TARGETS_FILE_NAME, parsedTargets.warnings),
    ],
    settingsPath,
    targetsPath,
  };
}
