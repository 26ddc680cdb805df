import { UsageError } from "../errors";
import { EXIT_CODE_CONFIG_ERROR } from "../exit-codes";

export class ConfigError extends UsageError {
  constructor(message: string, options: { cause?: unknown; path?: string } = {}) {
    super(message, {
      exitCode: EXIT_CODE_CONFIG_ERROR,
      cause: options.cause,
      context: options.path ? { path: options.path } : undefined,
    });
    this.name = "ConfigError";
  }
}

export class ConfigValidationError extends ConfigError {
  readonly problems: readonly string[];

  constructor(problems: readonly string[], path?: string) {
    super(problems.join("\n"), { path });
    this.name = "ConfigValidationError";
    this.problems = problems;
  }
}
