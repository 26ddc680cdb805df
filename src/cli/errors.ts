import { UsageError } from "../errors";

/** Bad flag or flag value. `flag` is the offending token when there is one. */
export class CliFlagError extends UsageError {
  readonly flag?: string;

  constructor(message: string, flag?: string) {
    super(message);
    this.name = "CliFlagError";
    this.flag = flag;
  }
}

export class CliCommandError extends UsageError {
  readonly command?: string;

  constructor(message: string, command?: string) {
    super(message);
    this.name = "CliCommandError";
    this.command = command;
  }
}
