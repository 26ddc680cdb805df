import { CliCommandError } from "./errors";

export const SUPPORTED_CLI_COMMANDS = [
  "start",
  "stop",
  "restart",
  "status",
  "reload",
  "test",
  "check",
  "help",
] as const;

export type CliCommand = (typeof SUPPORTED_CLI_COMMANDS)[number];

export interface CliCommandDefinition {
  summary: string;
  /** Positional arguments as shown in help, e.g. `<url>`. */
  arguments: readonly string[];
}

export const CLI_COMMANDS: Readonly<Record<CliCommand, CliCommandDefinition>> = {
  start: {
    summary: "Start monitoring in the foreground, or in the background with --daemon.",
    arguments: [],
  },
  stop: { summary: "Stop the running monitor (SIGTERM, then SIGKILL after 30 seconds).", arguments: [] },
  restart: { summary: "Stop the running monitor and start it again in the background.", arguments: [] },
  status: {
    summary: "Show per-target state, circuit breakers and recovery events of the last 24 hours.",
    arguments: [],
  },
  reload: { summary: "Ask the running monitor to re-read its configuration.", arguments: [] },
  test: { summary: "Validate the configuration files without starting the monitor.", arguments: [] },
  check: { summary: "Check a single URL once and print the result.", arguments: ["<url>"] },
  help: { summary: "Show this help message and exit.", arguments: [] },
};

export interface ParsedCliCommand {
  command: CliCommand;
  argv: string[];
}

const HELP_ALIASES = new Set(["help", "--help", "-h"]);
const MAX_SUGGESTION_DISTANCE = 2;

function isSupportedCommand(value: string): value is CliCommand {
  return (SUPPORTED_CLI_COMMANDS as readonly string[]).includes(value);
}

function editDistance(left: string, right: string): number {
  let previous = Array.from({ length: right.length + 1 }, (_, index) => index);

  for (let i = 1; i <= left.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= right.length; j += 1) {
      const substitution = previous[j - 1] + (left[i - 1] === right[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }

  return previous[right.length];
}

/** Closest command name to a mistyped token, if any is close enough. */
export function suggestCommand(token: string): CliCommand | undefined {
  let best: { command: CliCommand; distance: number } | undefined;

  for (const command of SUPPORTED_CLI_COMMANDS) {
    const distance = editDistance(token.toLowerCase(), command);
    if (distance <= MAX_SUGGESTION_DISTANCE && (!best || distance < best.distance)) {
      best = { command, distance };
    }
  }

  return best?.command;
}

export function parseCliCommand(argv: readonly string[]): ParsedCliCommand {
  const expected = `Expected one of: ${SUPPORTED_CLI_COMMANDS.join(", ")}`;
  const [commandToken, ...rest] = argv;

  if (commandToken === undefined) {
    throw new CliCommandError(`A command is required. ${expected}`);
  }

  if (HELP_ALIASES.has(commandToken)) {
    return { command: "help", argv: rest };
  }

  if (!isSupportedCommand(commandToken)) {
    const suggestion = suggestCommand(commandToken);
    const hint = suggestion ? ` Did you mean ${suggestion}?` : "";
    throw new CliCommandError(`Unknown command: ${commandToken}. ${expected}.${hint}`, commandToken);
  }

  return { command: commandToken, argv: rest };
}

/**
 * Rejects positional arguments beyond what the command declares. Missing
 * arguments are left to the command, which can say what it needs.
 */
export function assertArgumentCount(command: CliCommand, positionals: readonly string[]): void {
  const accepted = CLI_COMMANDS[command].arguments.length;
  if (positionals.length > accepted) {
    throw new CliCommandError(`Unexpected argument for ${command}: ${positionals[accepted]}`, command);
  }
}
