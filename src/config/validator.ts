import Ajv, { type ErrorObject } from "ajv";
import ajvErrors from "ajv-errors";
import addFormats from "ajv-formats";
import addKeywords from "ajv-keywords";

import { ConfigValidationError } from "./errors";
import { DEFAULT_SETTINGS, isSettingKey, settingsSchema, targetEntrySchema } from "./schema";
import type { ConfigWarning, RawSettingsFile, RawTargetEntry } from "./types";

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  messages: true,
  coerceTypes: true,
  useDefaults: true,
});

addFormats(ajv);
addKeywords(ajv, ["transform"]);
ajvErrors(ajv, { singleError: false });

const validateSettingsFn = ajv.compile<RawSettingsFile>(settingsSchema);
const validateTargetFn = ajv.compile<RawTargetEntry>(targetEntrySchema);

const BOOLEAN_TOKENS: Readonly<Record<string, string>> = {
  true: "true",
  yes: "true",
  "1": "true",
  false: "false",
  no: "false",
  "0": "false",
};

/**
 * Folds the accepted boolean spellings into the two ajv coerces.
 * Anything else is left alone for the schema to reject.
 */
export function normalizeBooleanToken(value: string): string {
  return BOOLEAN_TOKENS[value.trim().toLowerCase()] ?? value;
}

function propertyOf(error: ErrorObject): string {
  const [first = ""] = error.instancePath.split("/").filter(Boolean);
  return first;
}

function describe(errors: readonly ErrorObject[]): string[] {
  return errors.map((error) => error.message ?? "is invalid");
}

export interface ValidatedSettings {
  settings: RawSettingsFile;
  warnings: ConfigWarning[];
}

/**
 * Coerces and validates settings. An invalid value never fails the load: the
 * key is dropped with a warning and the schema default takes its place.
 */
export function validateSettings(
  values: Readonly<Record<string, string>>,
  lineNumbers: Readonly<Record<string, number>> = {},
): ValidatedSettings {
  const data: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    data[key] = key === "CONTENT_CHECK_ENABLED" ? normalizeBooleanToken(value) : value;
  }

  const warnings: ConfigWarning[] = [];

  if (!validateSettingsFn(data)) {
    const invalidKeys = new Set<string>();
    for (const error of validateSettingsFn.errors ?? []) {
      const key = propertyOf(error);
      if (invalidKeys.has(key)) {
        continue;
      }
      invalidKeys.add(key);

      const fallback = isSettingKey(key) ? ` (using default ${String(DEFAULT_SETTINGS[key])})` : "";
      warnings.push({
        line: lineNumbers[key],
        message: `${error.message ?? `${key} is invalid`}, got: ${values[key] ?? ""}${fallback}`,
      });
    }

    for (const key of invalidKeys) {
      delete data[key];
    }

    if (!validateSettingsFn(data)) {
      throw new ConfigValidationError(describe(validateSettingsFn.errors ?? []));
    }
  }

  return { settings: data, warnings };
}

export type TargetEntryValidation =
  | { valid: true; entry: RawTargetEntry }
  | { valid: false; problems: string[] };

export function validateTargetEntry(fields: Readonly<Record<string, string>>): TargetEntryValidation {
  const data: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    data[key] = key === "content_check" ? normalizeBooleanToken(value) : value;
  }

  if (validateTargetFn(data)) {
    return { valid: true, entry: data };
  }

  return { valid: false, problems: describe(validateTargetFn.errors ?? []) };
}
