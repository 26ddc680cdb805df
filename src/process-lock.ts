import { promises as fs } from "node:fs";
import { dirname } from "node:path";

import { AlreadyRunningError } from "./errors";

export type ProcessProbe = (pid: number) => boolean;

function errorCode(error: unknown): unknown {
  return typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
}

/**
 * Signal 0 checks for existence without delivering anything. EPERM means the
 * process exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === "EPERM";
  }
}

/** PID stored in a lock file, or undefined when there is no usable lock. */
export async function readLockPid(path: string): Promise<number | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(path, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return undefined;
    }
    throw error;
  }

  const pid = Number.parseInt(raw.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : undefined;
}

/** PID of the live monitor owning the lock, if any. */
export async function findRunningMonitor(
  path: string,
  isAlive: ProcessProbe = isProcessAlive,
): Promise<number | undefined> {
  const pid = await readLockPid(path);
  return pid !== undefined && isAlive(pid) ? pid : undefined;
}

export interface ProcessLock {
  readonly path: string;
  readonly pid: number;
  release(): Promise<void>;
}

export interface AcquireLockOptions {
  pid?: number;
  isAlive?: ProcessProbe;
}

/**
 * Creates the lock file exclusively. A lock left behind by a dead process, or
 * one holding garbage, is reclaimed once.
 */
export async function acquireProcessLock(
  path: string,
  options: AcquireLockOptions = {},
): Promise<ProcessLock> {
  const pid = options.pid ?? process.pid;
  const isAlive = options.isAlive ?? isProcessAlive;

  await fs.mkdir(dirname(path), { recursive: true });

  for (let attempt = 0; attempt < 2; attempt += 1) {
    try {
      await fs.writeFile(path, `${pid}\n`, { flag: "wx" });
      return createLock(path, pid);
    } catch (error) {
      if (errorCode(error) !== "EEXIST") {
        throw error;
      }
    }

    const owner = await readLockPid(path);
    if (owner !== undefined && owner !== pid && isAlive(owner)) {
      throw new AlreadyRunningError(owner, path);
    }
    await fs.rm(path, { force: true });
  }

  const owner = (await readLockPid(path)) ?? 0;
  throw new AlreadyRunningError(owner, path);
}

function createLock(path: string, pid: number): ProcessLock {
  let released = false;
  return {
    path,
    pid,
    async release() {
      if (released) {
        return;
      }
      released = true;
      // Only the owner removes the file.
      if ((await readLockPid(path)) === pid) {
        await fs.rm(path, { force: true });
      }
    },
  };
}
