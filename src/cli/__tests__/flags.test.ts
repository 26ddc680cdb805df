import { describe, expect, it } from "vitest";

import { CliFlagError, parseCliFlags } from "../index";

describe("parseCliFlags", () => {
  const baseOptions: NonNullable<Parameters<typeof parseCliFlags>[1]> = {
    env: {},
  };

  it("returns default values when no flags provided", () => {
    expect(parseCliFlags([], baseOptions)).toEqual({
      configDir: "./config",
      dataDir: "./data",
      daemon: false,
      verbose: false,
      retries: 3,
      retryDelayMs: 2_000,
      contentCheck: false,
      format: "structured",
      positionals: [],
    });
  });

  it("takes directories from the environment", () => {
    expect(
      parseCliFlags([], { env: { SITEWARDEN_CONFIG_DIR: "/etc/sitewarden", SITEWARDEN_DATA_DIR: " " } }),
    ).toMatchObject({ configDir: "/etc/sitewarden", dataDir: "./data" });
  });

  it("prefers directory flags over the environment", () => {
    const params = parseCliFlags(["--config-dir", "/srv/conf", "--data-dir", "/srv/data"], {
      env: { SITEWARDEN_CONFIG_DIR: "/etc/sitewarden" },
    });

    expect(params).toMatchObject({ configDir: "/srv/conf", dataDir: "/srv/data" });
  });

  it("parses check options and keeps the URL as a positional", () => {
    const params = parseCliFlags(
      ["https://example.com", "--retries", "5", "--retry-delay", "500ms", "--timeout", "7", "--content-check", "--format", "json"],
      baseOptions,
    );

    expect(params).toMatchObject({
      positionals: ["https://example.com"],
      retries: 5,
      retryDelayMs: 500,
      timeoutSeconds: 7,
      contentCheck: true,
      format: "json",
    });
  });

  it("reads a bare retry delay as seconds", () => {
    expect(parseCliFlags(["--retry-delay", "3"], baseOptions).retryDelayMs).toBe(3_000);
  });

  it("enables daemon and verbose modes", () => {
    expect(parseCliFlags(["-d", "--verbose"], baseOptions)).toMatchObject({ daemon: true, verbose: true });
  });

  it("throws on unknown flag", () => {
    expect(() => parseCliFlags(["--unknown"], baseOptions)).toThrow(CliFlagError);
  });

  it("throws when required value is missing", () => {
    expect(() => parseCliFlags(["--config-dir"], baseOptions)).toThrow("Flag --config-dir requires a value");
    expect(() => parseCliFlags(["--format", "--verbose"], baseOptions)).toThrow("Flag --format requires a value");
  });

  it("rejects invalid numbers, durations and formats", () => {
    expect(() => parseCliFlags(["--retries", "0"], baseOptions)).toThrow("Flag --retries must be a positive integer");
    expect(() => parseCliFlags(["--timeout", "1.5"], baseOptions)).toThrow("Flag --timeout must be a positive integer");
    expect(() => parseCliFlags(["--retry-delay", "soon"], baseOptions)).toThrow(
      "Flag --retry-delay must be a duration such as 2, 2s or 500ms",
    );
    expect(() => parseCliFlags(["--format", "ndjson"], baseOptions)).toThrow(
      "--format must be one of: structured, json, human",
    );
  });

  it("reports flag errors with the bad-arguments exit code", () => {
    let caught: unknown;
    try {
      parseCliFlags(["--unknown"], baseOptions);
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({ name: "CliFlagError", exitCode: 2, message: "Unknown flag: --unknown", flag: "--unknown" });
  });
});
