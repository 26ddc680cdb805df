import Ajv, { type Schema, type ValidateFunction } from "ajv";
import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import { dirname, join } from "node:path";

import type { CircuitBreakerSnapshot, ContentHashRecord } from "./domain";
import { InternalError } from "./errors";

const ajv = new Ajv({ allErrors: true, strict: false });

export const STATE_FILE_VERSION = 1;

export interface StateFile<T> {
  version: number;
  savedAt: string;
  entries: T[];
}

const circuitBreakerStateSchema = {
  type: "object",
  required: ["version", "savedAt", "entries"],
  properties: {
    version: { type: "integer", const: STATE_FILE_VERSION },
    savedAt: { type: "string" },
    entries: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "state", "failures", "lastFailureAt"],
        properties: {
          name: { type: "string", minLength: 1 },
          state: { type: "string", enum: ["CLOSED", "OPEN", "HALF_OPEN"] },
          failures: { type: "integer", minimum: 0 },
          lastFailureAt: { type: "number", minimum: 0 },
        },
      },
    },
  },
} as const satisfies Schema;

const contentHashStateSchema = {
  type: "object",
  required: ["version", "savedAt", "entries"],
  properties: {
    version: { type: "integer", const: STATE_FILE_VERSION },
    savedAt: { type: "string" },
    entries: {
      type: "array",
      items: {
        type: "object",
        required: ["key", "digest", "recordedAt"],
        properties: {
          key: { type: "string", minLength: 1 },
          digest: { type: "string", pattern: "^[0-9a-f]{64}$" },
          recordedAt: { type: "number", minimum: 0 },
        },
      },
    },
  },
} as const satisfies Schema;

export const validateCircuitBreakerState =
  ajv.compile<StateFile<CircuitBreakerSnapshot>>(circuitBreakerStateSchema);
export const validateContentHashState =
  ajv.compile<StateFile<ContentHashRecord>>(contentHashStateSchema);

/**
 * Writes through a sibling temp file and renames it into place, so readers
 * see either the old or the new content.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const directory = dirname(path);
  await fs.mkdir(directory, { recursive: true });
  const tempPath = join(directory, `.${randomUUID()}.tmp`);

  try {
    await fs.writeFile(tempPath, content, "utf8");
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function saveStateFile<T>(path: string, entries: readonly T[], now: Date): Promise<void> {
  const payload: StateFile<T> = {
    version: STATE_FILE_VERSION,
    savedAt: now.toISOString(),
    entries: [...entries],
  };
  await writeFileAtomic(path, `${JSON.stringify(payload, null, 2)}\n`);
}

/**
 * Reads a state file. Returns an empty list when the file does not exist and
 * throws when it exists but does not match the schema.
 */
export async function loadStateFile<T>(
  path: string,
  validate: ValidateFunction<StateFile<T>>,
): Promise<T[]> {
  let raw: string;
  try {
    raw = await fs.readFile(path, "utf8");
  } catch (error) {
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new InternalError("State file is not valid JSON", { context: { path }, cause: error });
  }

  if (!validate(parsed)) {
    const details = ajv.errorsText(validate.errors);
    throw new InternalError(`State file does not match its schema: ${details}`, { context: { path } });
  }

  return parsed.entries;
}
