import { rm } from "node:fs/promises";
import { resolve } from "node:path";

import { formatCheckResult } from "../check-output";
import { defaultSettings, isValidTargetUrl, loadConfiguration, targetKey } from "../config";
import { ContentHashStore } from "../content-hash-store";
import { AlreadyRunningError, InternalError, NotRunningError, SitewardenError, UsageError } from "../errors";
import { EventLog } from "../event-log";
import {
  EXIT_CODE_GENERAL_ERROR,
  EXIT_CODE_NOT_RUNNING,
  EXIT_CODE_OK,
  exitCodeFromProbeStatus,
  type ExitCode,
} from "../exit-codes";
import { createKeepAliveAgents } from "../http";
import { resolveDataPaths } from "../maintenance";
import { startMonitor } from "../monitor";
import { Probe, probeWithRetry } from "../probe";
import { findRunningMonitor, readLockPid } from "../process-lock";
import { readStatusSnapshot } from "../status";
import { VERSION } from "../version";
import { assertArgumentCount, parseCliCommand, type CliCommand } from "./commands";
import { CliCommandError } from "./errors";
import { parseCliFlags, type CliParameters } from "./flags";
import { renderCliHelp } from "./help";
import type { CliRuntime } from "./runtime";
import { renderStatusReport } from "./status-report";

export const STOP_TIMEOUT_MS = 30_000;
export const STOP_POLL_INTERVAL_MS = 500;
export const DAEMON_START_TIMEOUT_MS = 10_000;
export const DAEMON_POLL_INTERVAL_MS = 200;
const RECOVERY_WINDOW_MS = 24 * 3_600_000;

const VERSION_FLAGS = new Set(["--version", "-v"]);
const HELP_FLAGS = new Set(["--help", "-h"]);

type CommandHandler = (parameters: CliParameters, runtime: CliRuntime) => Promise<ExitCode>;

async function runningPid(parameters: CliParameters, runtime: CliRuntime): Promise<number | undefined> {
  return findRunningMonitor(resolveDataPaths(parameters.dataDir).lockPath, runtime.isAlive);
}

async function requireRunningPid(parameters: CliParameters, runtime: CliRuntime): Promise<number> {
  const pid = await runningPid(parameters, runtime);
  if (pid === undefined) {
    throw new NotRunningError();
  }
  return pid;
}

async function startDaemon(parameters: CliParameters, runtime: CliRuntime): Promise<ExitCode> {
  const { lockPath, logPath } = resolveDataPaths(parameters.dataDir);
  const existing = await findRunningMonitor(lockPath, runtime.isAlive);
  if (existing !== undefined) {
    throw new AlreadyRunningError(existing, lockPath);
  }

  // Fail here, in the foreground, on a configuration the daemon would reject.
  await loadConfiguration({ configDir: parameters.configDir, requireTargets: true });

  const args = [
    "start",
    "--config-dir",
    resolve(parameters.configDir),
    "--data-dir",
    resolve(parameters.dataDir),
    ...(parameters.verbose ? ["--verbose"] : []),
  ];
  const childPid = runtime.spawnDetached(args);
  if (childPid === undefined) {
    throw new InternalError("Failed to spawn the monitor process");
  }

  const deadline = runtime.now() + DAEMON_START_TIMEOUT_MS;
  while (runtime.now() < deadline) {
    if ((await readLockPid(lockPath)) === childPid) {
      runtime.stdout(`Monitor started in background (PID ${childPid})\n`);
      return EXIT_CODE_OK;
    }
    if (!runtime.isAlive(childPid)) {
      break;
    }
    await runtime.sleep(DAEMON_POLL_INTERVAL_MS);
  }

  throw new InternalError(`Monitor did not start; see ${logPath}`);
}

const startCommand: CommandHandler = async (parameters, runtime) => {
  if (parameters.daemon) {
    return startDaemon(parameters, runtime);
  }

  const { settings } = await loadConfiguration({ configDir: parameters.configDir, requireTargets: true });
  const logger = runtime.createLogger({ level: settings.logLevel, verbose: parameters.verbose });
  const monitor = await startMonitor({
    configDir: parameters.configDir,
    dataDir: parameters.dataDir,
    logger,
    signals: runtime.signals,
  });
  runtime.stdout(`Monitor running in the foreground (PID ${process.pid}); send SIGTERM or press Ctrl+C to stop\n`);
  await monitor.done;
  return EXIT_CODE_OK;
};

/** Sends SIGTERM, waits, then SIGKILL. A killed monitor's lock is removed here. */
async function stopMonitor(pid: number, parameters: CliParameters, runtime: CliRuntime): Promise<void> {
  runtime.stdout(`Stopping monitor (PID ${pid})...\n`);
  runtime.kill(pid, "SIGTERM");

  const deadline = runtime.now() + STOP_TIMEOUT_MS;
  while (runtime.isAlive(pid) && runtime.now() < deadline) {
    await runtime.sleep(STOP_POLL_INTERVAL_MS);
  }

  if (runtime.isAlive(pid)) {
    runtime.stdout(`Monitor did not stop within ${STOP_TIMEOUT_MS / 1_000} seconds, sending SIGKILL\n`);
    runtime.kill(pid, "SIGKILL");
    const { lockPath } = resolveDataPaths(parameters.dataDir);
    if ((await readLockPid(lockPath)) === pid) {
      await rm(lockPath, { force: true });
    }
  }

  runtime.stdout("Monitor stopped\n");
}

const stopCommand: CommandHandler = async (parameters, runtime) => {
  const pid = await requireRunningPid(parameters, runtime);
  await stopMonitor(pid, parameters, runtime);
  return EXIT_CODE_OK;
};

const restartCommand: CommandHandler = async (parameters, runtime) => {
  const pid = await runningPid(parameters, runtime);
  if (pid === undefined) {
    runtime.stdout("Monitor is not running, starting it\n");
  } else {
    await stopMonitor(pid, parameters, runtime);
  }
  return startDaemon(parameters, runtime);
};

const statusCommand: CommandHandler = async (parameters, runtime) => {
  const paths = resolveDataPaths(parameters.dataDir);
  const pid = await findRunningMonitor(paths.lockPath, runtime.isAlive);
  const snapshot = await readStatusSnapshot(paths.statusPath);
  const eventLog = new EventLog({ path: paths.logPath });
  const recovery = await eventLog.recoveryStatistics(new Date(runtime.now() - RECOVERY_WINDOW_MS));

  runtime.stdout(renderStatusReport({ runningPid: pid, statusPath: paths.statusPath, snapshot, recovery }));
  return pid === undefined ? EXIT_CODE_NOT_RUNNING : EXIT_CODE_OK;
};

const reloadCommand: CommandHandler = async (parameters, runtime) => {
  const pid = await requireRunningPid(parameters, runtime);
  runtime.kill(pid, "SIGHUP");
  runtime.stdout(`Reload signal sent to monitor (PID ${pid})\n`);
  return EXIT_CODE_OK;
};

const testCommand: CommandHandler = async (parameters, runtime) => {
  const loaded = await loadConfiguration({ configDir: parameters.configDir, requireTargets: true });

  for (const warning of loaded.warnings) {
    runtime.stderr(`Warning: ${warning}\n`);
  }

  runtime.stdout(`Configuration OK: ${loaded.targets.length} targets\n`);
  for (const target of loaded.targets) {
    const content = target.contentCheck ? "content check on" : "content check off";
    runtime.stdout(
      `  ${target.name} (${target.url}): every ${target.intervalSeconds}s, timeout ${target.timeoutSeconds}s, ${content}\n`,
    );
  }
  return EXIT_CODE_OK;
};

const checkCommand: CommandHandler = async (parameters, runtime) => {
  const [url] = parameters.positionals;
  if (url === undefined) {
    throw new CliCommandError("check requires a URL, e.g. sitewarden check https://example.com", "check");
  }
  if (!isValidTargetUrl(url)) {
    throw new UsageError(`Invalid URL: ${url}`);
  }

  const settings = defaultSettings();
  const agents = createKeepAliveAgents({ connectionsPerOrigin: 1 });
  const probe = new Probe(
    {
      slowResponseThresholdMs: settings.slowResponseThresholdMs,
      criticalResponseThresholdMs: settings.criticalResponseThresholdMs,
    },
    { keepAliveAgents: agents, contentStore: new ContentHashStore(), env: runtime.env },
    { retries: 0, initialDelayMs: 1 },
  );

  try {
    const result = await probeWithRetry(
      probe,
      {
        url,
        key: targetKey(url),
        name: url,
        timeoutSeconds: parameters.timeoutSeconds ?? settings.defaultTimeoutSeconds,
        contentCheck: parameters.contentCheck,
      },
      {
        maxAttempts: parameters.retries,
        initialDelayMs: Math.max(1, parameters.retryDelayMs),
        factor: 1,
        jitterRatio: 0,
        wait: (delayMs) => runtime.sleep(delayMs),
        onRetry: (error, attempt, delayMs) => {
          const message = error instanceof Error ? error.message : String(error);
          runtime.stderr(`Attempt ${attempt} failed, retrying in ${delayMs}ms: ${message}\n`);
        },
      },
    );
    runtime.stdout(formatCheckResult(result, parameters.format));
    return exitCodeFromProbeStatus(result.status);
  } finally {
    await agents.close();
  }
};

const HANDLERS: Record<Exclude<CliCommand, "help">, CommandHandler> = {
  start: startCommand,
  stop: stopCommand,
  restart: restartCommand,
  status: statusCommand,
  reload: reloadCommand,
  test: testCommand,
  check: checkCommand,
};

/** Parses `argv` (without the node and script entries), runs the command and maps errors to exit codes. */
export async function runCli(argv: readonly string[], runtime: CliRuntime): Promise<ExitCode> {
  if (argv.some((token) => VERSION_FLAGS.has(token))) {
    runtime.stdout(`sitewarden ${VERSION}\n`);
    return EXIT_CODE_OK;
  }

  if (argv.length === 0 || argv.some((token) => HELP_FLAGS.has(token))) {
    runtime.stdout(renderCliHelp());
    return EXIT_CODE_OK;
  }

  try {
    const { command, argv: rest } = parseCliCommand(argv);

    if (command === "help") {
      runtime.stdout(renderCliHelp());
      return EXIT_CODE_OK;
    }

    const parameters = parseCliFlags(rest, { env: runtime.env });
    assertArgumentCount(command, parameters.positionals);
    return await HANDLERS[command](parameters, runtime);
  } catch (error) {
    if (error instanceof SitewardenError) {
      runtime.stderr(`${error.message}\n`);
      return error.exitCode;
    }

    if (error instanceof Error) {
      runtime.stderr(`${error.message}\n`);
      return EXIT_CODE_GENERAL_ERROR;
    }

    runtime.stderr(`Unexpected error: ${String(error)}\n`);
    return EXIT_CODE_GENERAL_ERROR;
  }
}
