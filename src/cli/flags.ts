import { CHECK_OUTPUT_FORMATS, isCheckOutputFormat, type CheckOutputFormat } from "../check-output";
import { DurationParseError, parseDurationToMilliseconds } from "../duration";
import { CliFlagError } from "./errors";

export interface CliParameters {
  configDir: string;
  dataDir: string;
  /** `start`/`restart`: detach into the background. */
  daemon: boolean;
  verbose: boolean;
  /** `check`: total attempts, first one included. */
  retries: number;
  /** `check`: fixed delay between attempts. */
  retryDelayMs: number;
  /** `check`: overrides DEFAULT_TIMEOUT. */
  timeoutSeconds?: number;
  contentCheck: boolean;
  format: CheckOutputFormat;
  /** Non-flag arguments, such as the URL of `check`. */
  positionals: string[];
}

export const DEFAULT_CONFIG_DIR = "./config";
export const DEFAULT_DATA_DIR = "./data";

export const DEFAULT_CLI_PARAMETERS: Pick<
  CliParameters,
  "retries" | "retryDelayMs" | "contentCheck" | "format"
> = {
  retries: 3,
  retryDelayMs: parseDurationToMilliseconds("2s"),
  contentCheck: false,
  format: "structured",
};

function expectValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index + 1];

  if (value === undefined || value.startsWith("--")) {
    throw new CliFlagError(`Flag ${flag} requires a value`, flag);
  }

  return value;
}

function parsePositiveInteger(value: string, flag: string): number {
  const numeric = Number(value);

  if (!Number.isInteger(numeric) || numeric < 1) {
    throw new CliFlagError(`Flag ${flag} must be a positive integer`, flag);
  }

  return numeric;
}

function parseDuration(value: string, flag: string): number {
  try {
    return parseDurationToMilliseconds(value);
  } catch (error) {
    if (error instanceof DurationParseError) {
      throw new CliFlagError(`Flag ${flag} must be a duration such as 2, 2s or 500ms`, flag);
    }
    throw error;
  }
}

function parseFormat(value: string): CheckOutputFormat {
  if (isCheckOutputFormat(value)) {
    return value;
  }

  throw new CliFlagError(`--format must be one of: ${CHECK_OUTPUT_FORMATS.join(", ")}`, "--format");
}

function pickFromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

export interface ParseCliFlagsOptions {
  env?: NodeJS.ProcessEnv;
}

/**
 * Flags shared by every command. Directories default to
 * `SITEWARDEN_CONFIG_DIR`/`SITEWARDEN_DATA_DIR`, then `./config` and `./data`.
 */
export function parseCliFlags(
  argv: readonly string[],
  options: ParseCliFlagsOptions = {},
): CliParameters {
  const env = options.env ?? process.env;

  const result: CliParameters = {
    ...DEFAULT_CLI_PARAMETERS,
    configDir: pickFromEnv(env, "SITEWARDEN_CONFIG_DIR") ?? DEFAULT_CONFIG_DIR,
    dataDir: pickFromEnv(env, "SITEWARDEN_DATA_DIR") ?? DEFAULT_DATA_DIR,
    daemon: false,
    verbose: false,
    positionals: [],
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (!token.startsWith("-")) {
      result.positionals.push(token);
      continue;
    }

    switch (token) {
      case "--config-dir": {
        result.configDir = expectValue(argv, index, token);
        index += 1;
        break;
      }

      case "--data-dir": {
        result.dataDir = expectValue(argv, index, token);
        index += 1;
        break;
      }

      case "--daemon":
      case "-d": {
        result.daemon = true;
        break;
      }

      case "--verbose": {
        result.verbose = true;
        break;
      }

      case "--retries": {
        result.retries = parsePositiveInteger(expectValue(argv, index, token), token);
        index += 1;
        break;
      }

      case "--retry-delay": {
        result.retryDelayMs = parseDuration(expectValue(argv, index, token), token);
        index += 1;
        break;
      }

      case "--timeout": {
        result.timeoutSeconds = parsePositiveInteger(expectValue(argv, index, token), token);
        index += 1;
        break;
      }

      case "--content-check": {
        result.contentCheck = true;
        break;
      }

      case "--format": {
        result.format = parseFormat(expectValue(argv, index, token));
        index += 1;
        break;
      }

      default: {
        throw new CliFlagError(`Unknown flag: ${token}`, token);
      }
    }
  }

  return result;
}
