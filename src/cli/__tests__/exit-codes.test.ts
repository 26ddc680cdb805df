import { describe, expect, it } from "vitest";

import {
  EXIT_CODE_ALREADY_RUNNING,
  EXIT_CODE_CONFIG_ERROR,
  EXIT_CODE_GENERAL_ERROR,
  EXIT_CODE_NOT_RUNNING,
  EXIT_CODE_OK,
  EXIT_CODE_USAGE_ERROR,
  exitCodeFromProbeStatus,
} from "../exit-codes";

describe("exitCodeFromProbeStatus", () => {
  it("returns the ok exit code for an available site", () => {
    expect(exitCodeFromProbeStatus("UP")).toBe(EXIT_CODE_OK);
  });

  it.each(["DOWN", "TIMEOUT", "ERROR"] as const)("returns the general error code for %s", (status) => {
    expect(exitCodeFromProbeStatus(status)).toBe(EXIT_CODE_GENERAL_ERROR);
  });
});

describe("static exit code contracts", () => {
  it("numbers the lifecycle exit codes", () => {
    expect([
      EXIT_CODE_OK,
      EXIT_CODE_GENERAL_ERROR,
      EXIT_CODE_USAGE_ERROR,
      EXIT_CODE_ALREADY_RUNNING,
      EXIT_CODE_NOT_RUNNING,
      EXIT_CODE_CONFIG_ERROR,
    ]).toEqual([0, 1, 2, 3, 4, 5]);
  });
});
