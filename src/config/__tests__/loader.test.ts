import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError, loadConfiguration } from "../../config";
import { EXIT_CODE_CONFIG_ERROR } from "../../exit-codes";

describe("loadConfiguration", () => {
  let configDir: string;

  beforeEach(async () => {
    configDir = await mkdtemp(join(tmpdir(), "sitewarden-config-"));
  });

  afterEach(async () => {
    await rm(configDir, { recursive: true, force: true });
  });

  it("reads both files and prefixes warnings with their origin", async () => {
    await writeFile(join(configDir, "monitor.conf"), "DEFAULT_INTERVAL=120\nBOGUS=1\n");
    await writeFile(
      join(configDir, "websites.conf"),
      "https://a.example|A||3|\nnot-a-url|Broken|60|5|true\n",
    );

    const loaded = await loadConfiguration({ configDir });

    expect(loaded.settings.defaultIntervalSeconds).toBe(120);
    expect(loaded.targets.map((target) => [target.name, target.intervalSeconds])).toEqual([["A", 120]]);
    expect(loaded.warnings).toEqual([
      "monitor.conf:2: Unknown configuration key: BOGUS",
      "websites.conf:2: Skipping not-a-url: Invalid URL format",
    ]);
  });

  it("uses defaults when the settings file is missing", async () => {
    await writeFile(join(configDir, "websites.conf"), "https://a.example\n");

    const loaded = await loadConfiguration({ configDir });

    expect(loaded.settings.defaultIntervalSeconds).toBe(300);
    expect(loaded.targets).toHaveLength(1);
  });

  it("fails with a configuration exit code when the targets file is missing", async () => {
    const promise = loadConfiguration({ configDir });

    await expect(promise).rejects.toBeInstanceOf(ConfigError);
    await expect(promise).rejects.toMatchObject({ exitCode: EXIT_CODE_CONFIG_ERROR });
  });

  it("optionally rejects an empty target set", async () => {
    await writeFile(join(configDir, "websites.conf"), "# empty\n");

    await expect(loadConfiguration({ configDir, requireTargets: true })).rejects.toThrow(
      /^No valid targets found in .*websites\.conf \(path=.*websites\.conf\)$/,
    );
  });
});
