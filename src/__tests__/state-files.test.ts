import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { CircuitBreakerSnapshot } from "../domain";
import {
  loadStateFile,
  saveStateFile,
  validateCircuitBreakerState,
  validateContentHashState,
  writeFileAtomic,
} from "../state-files";

const NOW = new Date("2024-05-01T12:00:00.000Z");

describe("state files", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "sitewarden-state-"));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("saves and loads circuit breaker snapshots", async () => {
    const path = join(dataDir, "circuit-breakers.json");
    const entries: CircuitBreakerSnapshot[] = [
      { name: "https://example.com/", state: "OPEN", failures: 5, lastFailureAt: 1_714_564_800_000 },
    ];

    await saveStateFile(path, entries, NOW);

    const saved: unknown = JSON.parse(await readFile(path, "utf8"));
    expect(saved).toEqual({ version: 1, savedAt: "2024-05-01T12:00:00.000Z", entries });
    await expect(loadStateFile(path, validateCircuitBreakerState)).resolves.toEqual(entries);
  });

  it("returns no entries when the file is missing", async () => {
    await expect(loadStateFile(join(dataDir, "absent.json"), validateContentHashState)).resolves.toEqual([]);
  });

  it("rejects files that are not JSON", async () => {
    const path = join(dataDir, "content-hashes.json");
    await writeFile(path, "{not json", "utf8");

    await expect(loadStateFile(path, validateContentHashState)).rejects.toThrow(
      `State file is not valid JSON (path=${path})`,
    );
  });

  it("rejects files that do not match the schema", async () => {
    const path = join(dataDir, "content-hashes.json");
    await writeFile(
      path,
      JSON.stringify({ version: 1, savedAt: NOW.toISOString(), entries: [{ key: "a", digest: "xyz", recordedAt: 1 }] }),
      "utf8",
    );

    await expect(loadStateFile(path, validateContentHashState)).rejects.toThrow(
      /^State file does not match its schema: /,
    );
  });

  it("creates missing directories and leaves no temp file behind", async () => {
    const directory = join(dataDir, "nested");

    await writeFileAtomic(join(directory, "monitor.status.json"), "{}\n");

    expect(await readdir(directory)).toEqual(["monitor.status.json"]);
    expect(await readFile(join(directory, "monitor.status.json"), "utf8")).toBe("{}\n");
  });
});
