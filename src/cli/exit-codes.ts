export {
  EXIT_CODE_OK,
  EXIT_CODE_GENERAL_ERROR,
  EXIT_CODE_USAGE_ERROR,
  EXIT_CODE_ALREADY_RUNNING,
  EXIT_CODE_NOT_RUNNING,
  EXIT_CODE_CONFIG_ERROR,
  exitCodeFromProbeStatus,
} from "../exit-codes";

export type { ExitCode } from "../exit-codes";
