import type { Target } from "../domain";
import { URL_PATTERN } from "./schema";
import type { ConfigWarning, MonitorSettings } from "./types";
import { validateTargetEntry } from "./validator";

const URL_REGEX = new RegExp(URL_PATTERN);
const TARGET_FIELDS = ["url", "name", "interval", "timeout", "content_check"] as const;

export const MIN_INTERVAL_SECONDS = 10;
export const MIN_TIMEOUT_SECONDS = 1;

/**
 * Normalized identity of a target. Two spellings of the same URL (host case,
 * default port, empty path) share one key.
 */
export function targetKey(url: string): string {
  try {
    return new URL(url).toString();
  } catch {
    return url.trim();
  }
}

export function isValidTargetUrl(url: string): boolean {
  if (!URL_REGEX.test(url)) {
    return false;
  }

  try {
    const parsed = new URL(url);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

export function validateTarget(target: Target): boolean {
  return (
    isValidTargetUrl(target.url) &&
    Number.isInteger(target.intervalSeconds) &&
    target.intervalSeconds >= MIN_INTERVAL_SECONDS &&
    Number.isInteger(target.timeoutSeconds) &&
    target.timeoutSeconds >= MIN_TIMEOUT_SECONDS
  );
}

export interface ParsedTargets {
  targets: Target[];
  warnings: ConfigWarning[];
}

function splitFields(line: string): Record<string, string> | null {
  const parts = line.split("|");
  if (parts.length > TARGET_FIELDS.length) {
    return null;
  }

  const fields: Record<string, string> = {};
  TARGET_FIELDS.forEach((field, index) => {
    const value = parts[index]?.trim() ?? "";
    if (value.length > 0) {
      fields[field] = value;
    }
  });

  return fields;
}

/**
 * Parses `url|name|interval|timeout|content_check` lines. Each bad line is
 * skipped with a warning; the result may be empty and callers decide whether
 * that is fatal.
 */
export function parseTargets(content: string, settings: MonitorSettings): ParsedTargets {
  const targets: Target[] = [];
  const warnings: ConfigWarning[] = [];
  const seen = new Set<string>();

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    const lineNumber = index + 1;

    if (line.length === 0 || line.startsWith("#")) {
      return;
    }

    const fields = splitFields(line);
    if (!fields) {
      warnings.push({
        line: lineNumber,
        message: `Expected at most ${TARGET_FIELDS.length} pipe-separated fields: ${line}`,
      });
      return;
    }

    const validation = validateTargetEntry(fields);
    if (!validation.valid) {
      warnings.push({
        line: lineNumber,
        message: `Skipping ${fields.url ?? "entry"}: ${validation.problems.join("; ")}`,
      });
      return;
    }

    const { entry } = validation;
    const target: Target = {
      url: entry.url,
      key: targetKey(entry.url),
      name: entry.name ?? entry.url,
      intervalSeconds: entry.interval ?? settings.defaultIntervalSeconds,
      timeoutSeconds: entry.timeout ?? settings.defaultTimeoutSeconds,
      contentCheck: entry.content_check ?? settings.contentCheckEnabled,
    };

    if (!validateTarget(target)) {
      warnings.push({ line: lineNumber, message: `Skipping ${entry.url}: Invalid URL format` });
      return;
    }

    if (seen.has(target.key)) {
      warnings.push({ line: lineNumber, message: `Skipping duplicate URL: ${entry.url}` });
      return;
    }

    if (target.timeoutSeconds > target.intervalSeconds) {
      warnings.push({
        line: lineNumber,
        message: `Timeout ${target.timeoutSeconds}s exceeds interval ${target.intervalSeconds}s for ${entry.url}`,
      });
    }

    seen.add(target.key);
    targets.push(Object.freeze(target));
  });

  return { targets, warnings };
}
