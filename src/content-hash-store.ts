import { createHash } from "node:crypto";

import type { ContentCheckOutcome, ContentHashRecord } from "./domain";
import { formatTimeDifference } from "./duration";
import { KeyedLock } from "./http/concurrency";
import { loadStateFile, saveStateFile, validateContentHashState } from "./state-files";

export function computeContentDigest(body: string | Uint8Array): string {
  return createHash("sha256").update(body).digest("hex");
}

function shortDigest(digest: string): string {
  return `${digest.slice(0, 8)}...`;
}

/**
 * Last known body digest per target. Comparisons for one key are serialized;
 * different keys never wait on each other.
 */
export class ContentHashStore {
  private readonly records = new Map<string, ContentHashRecord>();
  private readonly lock = new KeyedLock();

  get(key: string): ContentHashRecord | undefined {
    return this.records.get(key);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Compares `digest` with the stored one and stores it when it is new or
   * different. The recorded time only moves on a change, so it marks the
   * last change rather than the last check.
   */
  async compareAndStore(key: string, digest: string, now: number): Promise<ContentCheckOutcome> {
    return await this.lock.run(key, () => {
      const previous = this.records.get(key);

      if (!previous) {
        this.records.set(key, { key, digest, recordedAt: now });
        return { status: "CONTENT_INITIAL", hash: digest, summary: "Initial content hash stored" };
      }

      if (previous.digest === digest) {
        return {
          status: "CONTENT_UNCHANGED",
          hash: digest,
          previousHash: previous.digest,
          sinceLastChangeMs: now - previous.recordedAt,
          summary: "No content change detected",
        };
      }

      this.records.set(key, { key, digest, recordedAt: now });
      const elapsed = now - previous.recordedAt;
      return {
        status: "CONTENT_CHANGED",
        hash: digest,
        previousHash: previous.digest,
        sinceLastChangeMs: elapsed,
        summary: `Content changed (previous: ${shortDigest(previous.digest)}, current: ${shortDigest(digest)}), last change: ${formatTimeDifference(elapsed)} ago`,
      };
    });
  }

  snapshot(): ContentHashRecord[] {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  restore(records: readonly ContentHashRecord[]): void {
    this.records.clear();
    for (const record of records) {
      this.records.set(record.key, { ...record });
    }
  }

  /** Drops records whose key is not in `keep`. Returns how many were removed. */
  prune(keep: ReadonlySet<string>): number {
    let removed = 0;
    for (const key of [...this.records.keys()]) {
      if (!keep.has(key)) {
        this.records.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  async persist(path: string, now: Date): Promise<void> {
    await saveStateFile(path, this.snapshot(), now);
  }

  async load(path: string): Promise<number> {
    const records = await loadStateFile(path, validateContentHashState);
    this.restore(records);
    return records.length;
  }
}
