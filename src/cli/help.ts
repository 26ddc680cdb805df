import { CLI_COMMANDS, SUPPORTED_CLI_COMMANDS } from "./commands";

const GLOBAL_OPTIONS = [
  {
    flag: "--config-dir <dir>",
    description: "Directory holding monitor.conf and websites.conf (default: $SITEWARDEN_CONFIG_DIR or ./config).",
  },
  {
    flag: "--data-dir <dir>",
    description: "Directory for the event log, lock, status and state files (default: $SITEWARDEN_DATA_DIR or ./data).",
  },
  { flag: "--daemon, -d", description: "start/restart: run the monitor in the background." },
  { flag: "--verbose", description: "Write debug diagnostics to stderr." },
  { flag: "--retries <number>", description: "check: total attempts on transport errors (default: 3)." },
  { flag: "--retry-delay <duration>", description: "check: fixed delay between attempts, e.g. 2, 2s, 500ms (default: 2s)." },
  { flag: "--timeout <seconds>", description: "check: request timeout (default: DEFAULT_TIMEOUT)." },
  { flag: "--content-check", description: "check: fetch the body and report its SHA-256 digest." },
  { flag: "--format <structured|json|human>", description: "check: output format (default: structured)." },
  { flag: "--version, -v", description: "Print the version and exit." },
  { flag: "--help, -h", description: "Show this help message and exit." },
] as const;

const EXAMPLES = [
  "sitewarden test --config-dir /etc/sitewarden",
  "sitewarden start --daemon --config-dir /etc/sitewarden --data-dir /var/lib/sitewarden",
  "sitewarden status --data-dir /var/lib/sitewarden",
  "sitewarden check https://example.com --content-check --format human",
] as const;

export function formatColumns(rows: readonly { left: string; right: string }[], padding = 2): string {
  const leftWidth = rows.reduce((max, row) => Math.max(max, row.left.length), 0);

  return rows
    .map((row) => {
      const left = row.left.padEnd(leftWidth + padding, " ");
      return `${left}${row.right}`.trimEnd();
    })
    .join("\n");
}

function joinLines(lines: readonly string[]): string {
  return `${lines.join("\n")}\n`;
}

export function renderCliHelp(): string {
  const sections: string[] = [];

  sections.push("sitewarden - website availability and content monitor");
  sections.push("");
  sections.push("Usage:");
  sections.push("  sitewarden <command> [options]");
  sections.push("");
  sections.push("Commands:");
  sections.push(
    formatColumns(
      SUPPORTED_CLI_COMMANDS.map((command) => ({
        left: `  ${[command, ...CLI_COMMANDS[command].arguments].join(" ")}`,
        right: CLI_COMMANDS[command].summary,
      })),
    ),
  );
  sections.push("");
  sections.push("Options:");
  sections.push(
    formatColumns(
      GLOBAL_OPTIONS.map(({ flag, description }) => ({
        left: `  ${flag}`,
        right: description,
      })),
    ),
  );
  sections.push("");
  sections.push("Exit codes:");
  sections.push("  0 success, 1 general error or site unavailable, 2 bad arguments,");
  sections.push("  3 already running, 4 not running, 5 configuration error");
  sections.push("");
  sections.push("Examples:");

  for (const example of EXAMPLES) {
    sections.push(`  $ ${example}`);
  }

  return joinLines(sections);
}
