import { randomUUID } from "node:crypto";
import { createReadStream, promises as fs } from "node:fs";
import { basename, dirname, join } from "node:path";
import { createInterface } from "node:readline";
import pLimit from "p-limit";

import type { LogLevel } from "../domain";
import {
  RECOVERY_EVENT_TYPES,
  formatEventLine,
  isLevelEnabled,
  isRecoveryEventType,
  levelForKind,
  parseEventLine,
  type EventKind,
  type EventLogEntry,
  type RecoveryEventType,
} from "./format";

const BYTES_PER_MB = 1024 * 1024;
const MS_PER_DAY = 86_400_000;

export interface EventLogOptions {
  path: string;
  /** Entries less severe than this are not written. Defaults to INFO. */
  level?: LogLevel;
  now?: () => Date;
}

export interface EventInput {
  message: string;
  finalStatus: EventKind;
  url?: string;
  responseTimeMs?: number;
  statusCode?: number;
  /** Overrides the level derived from `finalStatus`. */
  level?: LogLevel;
}

export interface EventFilter {
  since?: Date;
  until?: Date;
  url?: string;
  statuses?: readonly EventKind[];
  levels?: readonly LogLevel[];
  /** Case-insensitive substring of the message. */
  search?: string;
}

export interface PruneResult {
  kept: number;
  removed: number;
  removedFiles: number;
}

export type RecoveryStatistics = Record<RecoveryEventType, number>;

export function emptyRecoveryStatistics(): RecoveryStatistics {
  return {
    RETRY_ATTEMPT: 0,
    RETRY_SUCCESS: 0,
    RETRY_EXHAUSTED: 0,
    CIRCUIT_OPENED: 0,
    CIRCUIT_HALF_OPEN: 0,
    CIRCUIT_CLOSED: 0,
    CIRCUIT_BLOCKED: 0,
    CIRCUIT_FAILURE: 0,
    HEALTH_CHECK_OK: 0,
    HEALTH_CHECK_FAILED: 0,
    HEALTH_CHECK_RECOVERED: 0,
    HEALTH_CHECK_THRESHOLD: 0,
    HEALTH_RECOVERY_SUCCESS: 0,
    HEALTH_RECOVERY_FAILED: 0,
    MAINTENANCE_COMPLETED: 0,
    MAINTENANCE_ERROR: 0,
  };
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

function matchesFilter(entry: EventLogEntry, filter: EventFilter): boolean {
  const time = entry.timestamp.getTime();
  if (filter.since && time < filter.since.getTime()) {
    return false;
  }
  if (filter.until && time > filter.until.getTime()) {
    return false;
  }
  if (filter.url !== undefined && entry.url !== filter.url) {
    return false;
  }
  if (filter.statuses && !filter.statuses.includes(entry.finalStatus)) {
    return false;
  }
  if (filter.levels && !filter.levels.includes(entry.level)) {
    return false;
  }
  if (filter.search !== undefined && !entry.message.toLowerCase().includes(filter.search.toLowerCase())) {
    return false;
  }
  return true;
}

/**
 * Append-only pipe-delimited event log. Appends, rotation and pruning share a
 * single writer queue, so an entry is never split and never lost between a
 * prune's read and its swap.
 */
export class EventLog {
  readonly path: string;
  private level: LogLevel;
  private readonly now: () => Date;
  private readonly writer = pLimit(1);

  constructor(options: EventLogOptions) {
    this.path = options.path;
    this.level = options.level ?? "INFO";
    this.now = options.now ?? (() => new Date());
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /** Resolves to false when the entry was filtered out by the level. */
  async append(input: EventInput): Promise<boolean> {
    const entry: EventLogEntry = {
      timestamp: this.now(),
      level: input.level ?? levelForKind(input.finalStatus),
      message: input.message,
      url: input.url,
      responseTimeMs: input.responseTimeMs,
      statusCode: input.statusCode,
      finalStatus: input.finalStatus,
    };

    if (!isLevelEnabled(entry.level, this.level)) {
      return false;
    }

    const line = `${formatEventLine(entry)}\n`;
    await this.writer(async () => {
      await fs.mkdir(dirname(this.path), { recursive: true });
      await fs.appendFile(this.path, line, "utf8");
    });
    return true;
  }

  /** Resolves once every queued write has settled. */
  async flush(): Promise<void> {
    await this.writer(() => Promise.resolve());
  }

  /**
   * Moves the log to `<path>.1` when it is larger than `maxSizeMb`, shifting
   * older files up and dropping anything beyond `maxFiles`.
   */
  async rotate(maxSizeMb: number, maxFiles: number): Promise<boolean> {
    const rotatedSize = await this.writer(async () => {
      let size: number;
      try {
        size = (await fs.stat(this.path)).size;
      } catch (error) {
        if (isMissingFileError(error)) {
          return undefined;
        }
        throw error;
      }

      if (size <= maxSizeMb * BYTES_PER_MB) {
        return undefined;
      }

      await fs.rm(`${this.path}.${maxFiles}`, { force: true });
      for (let index = maxFiles - 1; index >= 1; index -= 1) {
        try {
          await fs.rename(`${this.path}.${index}`, `${this.path}.${index + 1}`);
        } catch (error) {
          if (!isMissingFileError(error)) {
            throw error;
          }
        }
      }

      await fs.rename(this.path, `${this.path}.1`);
      await fs.writeFile(this.path, "", "utf8");
      return size;
    });

    if (rotatedSize === undefined) {
      return false;
    }

    await this.append({
      message: `Log file rotated (size: ${(rotatedSize / BYTES_PER_MB).toFixed(2)}MB)`,
      finalStatus: "LOG_ROTATED",
    });
    return true;
  }

  /**
   * Drops entries older than the retention window by writing the kept lines
   * to a temp file and renaming it over the log. Lines that do not parse are
   * kept. Rotated files last modified before the cutoff are deleted.
   */
  async prune(retentionDays: number, now: Date = this.now()): Promise<PruneResult> {
    const cutoff = now.getTime() - retentionDays * MS_PER_DAY;

    return await this.writer(async () => {
      const result: PruneResult = { kept: 0, removed: 0, removedFiles: 0 };
      const tempPath = join(dirname(this.path), `.${basename(this.path)}.${randomUUID()}.tmp`);

      try {
        const kept: string[] = [];
        for await (const line of this.readLines(this.path)) {
          const entry = parseEventLine(line);
          if (entry && entry.timestamp.getTime() < cutoff) {
            result.removed += 1;
            continue;
          }
          kept.push(line);
        }

        result.kept = kept.length;
        if (result.removed > 0) {
          await fs.writeFile(tempPath, kept.map((line) => `${line}\n`).join(""), "utf8");
          await fs.rename(tempPath, this.path);
        }
      } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
      }

      result.removedFiles = await this.removeRotatedFilesBefore(cutoff);
      return result;
    });
  }

  async *scan(filter: EventFilter = {}): AsyncGenerator<EventLogEntry> {
    for await (const line of this.readLines(this.path)) {
      const entry = parseEventLine(line);
      if (entry && matchesFilter(entry, filter)) {
        yield entry;
      }
    }
  }

  async collect(filter: EventFilter = {}): Promise<EventLogEntry[]> {
    const entries: EventLogEntry[] = [];
    for await (const entry of this.scan(filter)) {
      entries.push(entry);
    }
    return entries;
  }

  /** Counts each recovery event type logged at or after `since`. */
  async recoveryStatistics(since: Date): Promise<RecoveryStatistics> {
    const statistics = emptyRecoveryStatistics();

    for await (const entry of this.scan({ since, statuses: RECOVERY_EVENT_TYPES })) {
      if (isRecoveryEventType(entry.finalStatus)) {
        statistics[entry.finalStatus] += 1;
      }
    }

    return statistics;
  }

  private async *readLines(path: string): AsyncGenerator<string> {
    try {
      await fs.access(path);
    } catch (error) {
      if (isMissingFileError(error)) {
        return;
      }
      throw error;
    }

    const lines = createInterface({ input: createReadStream(path, "utf8"), crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        if (line.length > 0) {
          yield line;
        }
      }
    } finally {
      lines.close();
    }
  }

  private async removeRotatedFilesBefore(cutoff: number): Promise<number> {
    const directory = dirname(this.path);
    const rotatedPattern = new RegExp(`^${basename(this.path).replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}\\.\\d+$`);
    let names: string[];
    try {
      names = await fs.readdir(directory);
    } catch (error) {
      if (isMissingFileError(error)) {
        return 0;
      }
      throw error;
    }

    let removed = 0;
    for (const name of names) {
      if (!rotatedPattern.test(name)) {
        continue;
      }
      const filePath = join(directory, name);
      const stats = await fs.stat(filePath);
      if (stats.mtimeMs < cutoff) {
        await fs.rm(filePath, { force: true });
        removed += 1;
      }
    }

    return removed;
  }
}
