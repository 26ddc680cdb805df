import {
  EXIT_CODE_ALREADY_RUNNING,
  EXIT_CODE_GENERAL_ERROR,
  EXIT_CODE_NOT_RUNNING,
  EXIT_CODE_USAGE_ERROR,
  type ExitCode,
} from "../exit-codes";

export interface ErrorContext {
  targetName?: string;
  attempt?: number;
  url?: string;
  path?: string;
}

export interface SitewardenErrorOptions {
  exitCode: ExitCode;
  context?: ErrorContext;
  cause?: unknown;
  name?: string;
}

function isFiniteInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

export function formatErrorMessageWithContext(message: string, context?: ErrorContext): string {
  if (!context) {
    return message;
  }

  const details: string[] = [];

  if (isNonEmptyString(context.targetName)) {
    details.push(`target=${context.targetName}`);
  }

  if (isFiniteInteger(context.attempt)) {
    details.push(`attempt=${context.attempt}`);
  }

  if (isNonEmptyString(context.url)) {
    details.push(`url=${context.url}`);
  }

  if (isNonEmptyString(context.path)) {
    details.push(`path=${context.path}`);
  }

  if (details.length === 0) {
    return message;
  }

  return `${message} (${details.join(", ")})`;
}

export class SitewardenError extends Error {
  readonly exitCode: ExitCode;
  readonly context?: ErrorContext;

  constructor(message: string, options: SitewardenErrorOptions) {
    const formatted = formatErrorMessageWithContext(message, options.context);
    super(formatted, options.cause !== undefined ? { cause: options.cause } : undefined);

    this.exitCode = options.exitCode;
    this.context = options.context;
    this.name = options.name ?? new.target.name;
  }
}

export interface ErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

export interface UsageErrorOptions extends ErrorOptions {
  exitCode?: ExitCode;
}

export class UsageError extends SitewardenError {
  constructor(message: string, options: UsageErrorOptions = {}) {
    super(message, {
      exitCode: options.exitCode ?? EXIT_CODE_USAGE_ERROR,
      context: options.context,
      cause: options.cause,
      name: "UsageError",
    });
  }
}

export class InternalError extends SitewardenError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      exitCode: EXIT_CODE_GENERAL_ERROR,
      context: options.context,
      cause: options.cause,
      name: "InternalError",
    });
  }
}

export class AlreadyRunningError extends SitewardenError {
  readonly pid: number;

  constructor(pid: number, lockPath: string) {
    super(`Another monitor instance is already running (PID: ${pid})`, {
      exitCode: EXIT_CODE_ALREADY_RUNNING,
      context: { path: lockPath },
      name: "AlreadyRunningError",
    });
    this.pid = pid;
  }
}

export class NotRunningError extends SitewardenError {
  constructor(message = "Monitor is not running") {
    super(message, {
      exitCode: EXIT_CODE_NOT_RUNNING,
      name: "NotRunningError",
    });
  }
}
