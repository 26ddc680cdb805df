import { describe, expect, it } from "vitest";

import {
  escapeField,
  formatEventLine,
  isLevelEnabled,
  levelForKind,
  parseEventLine,
  unescapeField,
  type EventLogEntry,
} from "../format";

const timestamp = new Date("2024-05-01T12:00:00.000Z");

describe("formatEventLine", () => {
  it("writes the seven pipe-delimited columns", () => {
    const entry: EventLogEntry = {
      timestamp,
      level: "ERROR",
      message: "DOWN: a|b\nc",
      url: "https://shop.example.test/",
      responseTimeMs: 153,
      statusCode: 503,
      finalStatus: "DOWN",
    };

    expect(formatEventLine(entry)).toBe(
      "2024-05-01T12:00:00.000Z|ERROR|DOWN: a\\pb\\nc|https://shop.example.test/|153|503|DOWN",
    );
  });

  it("leaves optional columns empty", () => {
    const line = formatEventLine({
      timestamp,
      level: "INFO",
      message: "Monitor started",
      finalStatus: "MONITOR_STARTED",
    });

    expect(line).toBe("2024-05-01T12:00:00.000Z|INFO|Monitor started||||MONITOR_STARTED");
  });
});

describe("parseEventLine", () => {
  it("restores every field of a written entry", () => {
    const entry: EventLogEntry = {
      timestamp,
      level: "WARN",
      message: "weird \\p value | with\r\nbreaks \\",
      url: "https://a.example.test/?q=1|2",
      responseTimeMs: 2_501,
      statusCode: 200,
      finalStatus: "SLOW",
    };

    expect(parseEventLine(formatEventLine(entry))).toEqual(entry);
  });

  it("omits empty optional columns", () => {
    const parsed = parseEventLine("2024-05-01T12:00:00.000Z|DEBUG|probe ok|||200|HEALTH_CHECK_OK");

    expect(parsed).toEqual({
      timestamp,
      level: "DEBUG",
      message: "probe ok",
      statusCode: 200,
      finalStatus: "HEALTH_CHECK_OK",
    });
  });

  it.each([
    ["too few columns", "2024-05-01T12:00:00.000Z|INFO|msg|||UP"],
    ["unknown level", "2024-05-01T12:00:00.000Z|NOTICE|msg||||UP"],
    ["unknown status", "2024-05-01T12:00:00.000Z|INFO|msg||||SIDEWAYS"],
    ["bad timestamp", "yesterday|INFO|msg||||UP"],
    ["non-numeric status code", "2024-05-01T12:00:00.000Z|INFO|msg|||abc|UP"],
  ])("rejects a line with %s", (_label, line) => {
    expect(parseEventLine(line)).toBeUndefined();
  });
});

describe("field escaping", () => {
  it("escapes backslashes before delimiters", () => {
    expect(escapeField("C:\\logs|x")).toBe("C:\\\\logs\\px");
    expect(unescapeField("C:\\\\logs\\px")).toBe("C:\\logs|x");
  });

  it("keeps unknown escapes and a trailing backslash literally", () => {
    expect(unescapeField("a\\qb\\")).toBe("a\\qb\\");
  });
});

describe("levels", () => {
  it("maps event kinds to log levels", () => {
    expect(levelForKind("DOWN")).toBe("ERROR");
    expect(levelForKind("CIRCUIT_OPENED")).toBe("ERROR");
    expect(levelForKind("RETRY_EXHAUSTED")).toBe("ERROR");
    expect(levelForKind("SLOW")).toBe("WARN");
    expect(levelForKind("CONTENT_UNCHANGED")).toBe("DEBUG");
    expect(levelForKind("HEALTH_CHECK_OK")).toBe("DEBUG");
    expect(levelForKind("UP")).toBe("INFO");
    expect(levelForKind("RECOVERY")).toBe("INFO");
  });

  it("filters by severity threshold", () => {
    expect(isLevelEnabled("ERROR", "WARN")).toBe(true);
    expect(isLevelEnabled("WARN", "WARN")).toBe(true);
    expect(isLevelEnabled("INFO", "WARN")).toBe(false);
    expect(isLevelEnabled("DEBUG", "DEBUG")).toBe(true);
  });
});
