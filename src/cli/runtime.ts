import { spawn } from "node:child_process";
import { setTimeout as delay } from "node:timers/promises";

import { createLogger, type Logger, type LoggerOptions } from "../logger";
import type { SignalSource } from "../monitor";
import { isProcessAlive, type ProcessProbe } from "../process-lock";

/**
 * Everything a command touches outside its own files. Tests swap in
 * recording fakes.
 */
export interface CliRuntime {
  stdout(text: string): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
  createLogger(options: LoggerOptions): Logger;
  isAlive: ProcessProbe;
  kill(pid: number, signal: NodeJS.Signals): void;
  sleep(ms: number): Promise<void>;
  now(): number;
  /** Starts `sitewarden <args>` detached. Returns the child PID. */
  spawnDetached(args: readonly string[]): number | undefined;
  signals: SignalSource;
}

export function createNodeRuntime(): CliRuntime {
  return {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    env: process.env,
    createLogger,
    isAlive: isProcessAlive,
    kill: (pid, signal) => {
      process.kill(pid, signal);
    },
    sleep: (ms) => delay(ms),
    now: Date.now,
    spawnDetached: (args) => {
      // execArgv carries the loader flags the current process was started with.
      const entry = process.argv[1];
      const child = spawn(process.execPath, [...process.execArgv, entry, ...args], {
        detached: true,
        stdio: "ignore",
        env: process.env,
      });
      child.unref();
      return child.pid;
    },
    signals: process,
  };
}
