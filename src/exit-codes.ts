import type { ProbeStatus } from "./domain";

export const EXIT_CODE_OK = 0 as const;
export const EXIT_CODE_GENERAL_ERROR = 1 as const;
export const EXIT_CODE_USAGE_ERROR = 2 as const;
export const EXIT_CODE_ALREADY_RUNNING = 3 as const;
export const EXIT_CODE_NOT_RUNNING = 4 as const;
export const EXIT_CODE_CONFIG_ERROR = 5 as const;

export type ExitCode =
  | typeof EXIT_CODE_OK
  | typeof EXIT_CODE_GENERAL_ERROR
  | typeof EXIT_CODE_USAGE_ERROR
  | typeof EXIT_CODE_ALREADY_RUNNING
  | typeof EXIT_CODE_NOT_RUNNING
  | typeof EXIT_CODE_CONFIG_ERROR;

/**
 * Exit code of the one-off `check` command: 0 when the site answered with a
 * 2xx/3xx status, 1 for everything else.
 */
export function exitCodeFromProbeStatus(status: ProbeStatus): ExitCode {
  switch (status) {
    case "UP":
      return EXIT_CODE_OK;
    case "DOWN":
    case "TIMEOUT":
    case "ERROR":
      return EXIT_CODE_GENERAL_ERROR;
    default: {
      const exhaustiveCheck: never = status;
      return exhaustiveCheck;
    }
  }
}
