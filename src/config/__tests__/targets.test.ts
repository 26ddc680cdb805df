import { describe, expect, it } from "vitest";

import { defaultSettings, parseTargets, targetKey, TargetRegistry, validateTarget } from "../../config";
import type { Target } from "../../domain";

const SAMPLE = [
  "# monitored sites",
  "",
  "https://example.com|Example|60|5|true",
  "https://api.example.com/health||||",
  "https://EXAMPLE.com|Dup|60|5|false",
  "ftp://bad.example|Bad|60|5|true",
  "https://short.example|Short|5|5|true",
  "https://flag.example|Flag|60|5|maybe",
  "https://many.example|a|60|5|true|extra",
  "https://slow.example|Slow|30|45|yes",
].join("\n");

describe("parseTargets", () => {
  it("keeps valid lines, applies defaults and skips bad lines with warnings", () => {
    const { targets, warnings } = parseTargets(SAMPLE, defaultSettings());

    expect(targets).toEqual([
      {
        url: "https://example.com",
        key: "https://example.com/",
        name: "Example",
        intervalSeconds: 60,
        timeoutSeconds: 5,
        contentCheck: true,
      },
      {
        url: "https://api.example.com/health",
        key: "https://api.example.com/health",
        name: "https://api.example.com/health",
        intervalSeconds: 300,
        timeoutSeconds: 10,
        contentCheck: true,
      },
      {
        url: "https://slow.example",
        key: "https://slow.example/",
        name: "Slow",
        intervalSeconds: 30,
        timeoutSeconds: 45,
        contentCheck: true,
      },
    ]);

    expect(warnings).toEqual([
      { line: 5, message: "Skipping duplicate URL: https://EXAMPLE.com" },
      { line: 6, message: "Skipping ftp://bad.example: Invalid URL format" },
      { line: 7, message: "Skipping https://short.example: Interval must be a number between 10-86400" },
      {
        line: 8,
        message: "Skipping https://flag.example: Content check must be true/false/1/0/yes/no",
      },
      {
        line: 9,
        message: "Expected at most 5 pipe-separated fields: https://many.example|a|60|5|true|extra",
      },
      { line: 10, message: "Timeout 45s exceeds interval 30s for https://slow.example" },
    ]);
  });

  it("returns an empty set without failing", () => {
    expect(parseTargets("# nothing here\n", defaultSettings())).toEqual({ targets: [], warnings: [] });
  });
});

describe("validateTarget", () => {
  const base: Target = {
    url: "http://127.0.0.1:8080/status",
    key: "http://127.0.0.1:8080/status",
    name: "local",
    intervalSeconds: 10,
    timeoutSeconds: 1,
    contentCheck: false,
  };

  it("accepts the minimum interval and timeout", () => {
    expect(validateTarget(base)).toBe(true);
  });

  it("rejects short intervals, zero timeouts and malformed URLs", () => {
    expect(validateTarget({ ...base, intervalSeconds: 9 })).toBe(false);
    expect(validateTarget({ ...base, timeoutSeconds: 0 })).toBe(false);
    expect(validateTarget({ ...base, url: "https://" })).toBe(false);
    expect(validateTarget({ ...base, url: "example.com" })).toBe(false);
  });
});

describe("targetKey", () => {
  it("folds host case and the empty path", () => {
    expect(targetKey("https://Example.COM")).toBe("https://example.com/");
    expect(targetKey("http://example.com:80/a")).toBe("http://example.com/a");
  });
});

describe("TargetRegistry", () => {
  it("swaps the whole snapshot on replace", () => {
    const { targets } = parseTargets("https://a.example|A|60|5|false", defaultSettings());
    const registry = new TargetRegistry(targets);
    const before = registry.list();

    registry.replace([]);

    expect(before).toHaveLength(1);
    expect(registry.list()).toEqual([]);
    expect(registry.size).toBe(0);
    expect(registry.keys()).toEqual(new Set());
    expect(Object.isFrozen(before)).toBe(true);
  });

  it("looks targets up by key", () => {
    const { targets } = parseTargets("https://a.example|A|60|5|false", defaultSettings());
    const registry = new TargetRegistry(targets);

    expect(registry.get("https://a.example/")?.name).toBe("A");
    expect(registry.keys()).toEqual(new Set(["https://a.example/"]));
  });
});
