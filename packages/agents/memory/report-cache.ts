// Report cache — subject key → last usable report
// Falls back to an in-memory implementation for tests and ephemeral runs

import type { Subject } from '../types/stages.js';
import type { CacheEntry, CacheEntrySummary, Report } from '../types/report.js';
import { deepFreeze } from '../utils/deep-freeze.js';

export interface ReportCache {
  /** Read from memory only; never touches disk or network */
  lookup(subjectKey: string): Promise<Report | undefined>;
  /** Replace any entry for the subject (last write wins) */
  insert(subject: Subject, report: Report): Promise<void>;
  /** Remove an entry; returns false when there was nothing to remove */
  invalidate(subjectKey: string): Promise<boolean>;
  list(): Promise<CacheEntrySummary[]>;
  clear(): Promise<void>;
}

export interface CacheOptions {
  /** Entries older than this are invisible to lookup. Unset = keep forever. */
  ttlMs?: number;
  /** Injectable clock for expiry checks */
  now?: () => Date;
}

export function isExpired(entry: CacheEntry, ttlMs: number | undefined, now: Date): boolean {
  if (ttlMs === undefined) return false;
  return now.getTime() - new Date(entry.createdAt).getTime() > ttlMs;
}

export function summarize(entry: CacheEntry): CacheEntrySummary {
  return {
    key: entry.subject.key,
    company: entry.subject.displayName,
    status: entry.report.status,
    createdAt: entry.createdAt,
  };
}

/**
 * Copy-on-write entry table shared by both backends.
 * Readers get whatever snapshot is current; writers build a new map and
 * swap it in one assignment, so a reader never sees a half-applied change.
 * Writes run one at a time through `enqueue`.
 */
export abstract class SnapshotCache implements ReportCache {
  protected snapshot: ReadonlyMap<string, CacheEntry> = new Map();
  private writeChain: Promise<unknown> = Promise.resolve();
  protected readonly ttlMs?: number;
  protected readonly now: () => Date;

  constructor(options: CacheOptions = {}) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
  }

  /** Make `next` durable before it becomes visible. Throw to abort the write. */
  protected abstract persist(next: ReadonlyMap<string, CacheEntry>): Promise<void>;

  async lookup(subjectKey: string): Promise<Report | undefined> {
    const entry = this.snapshot.get(subjectKey);
    if (!entry || isExpired(entry, this.ttlMs, this.now())) return undefined;
    return entry.report;
  }

  insert(subject: Subject, report: Report): Promise<void> {
    return this.enqueue(async () => {
      const entry: CacheEntry = deepFreeze({
        subject: { key: subject.key, displayName: subject.displayName },
        report,
        createdAt: this.now().toISOString(),
      });
      const next = new Map(this.snapshot);
      next.set(subject.key, entry);
      await this.commit(next);
    });
  }

  invalidate(subjectKey: string): Promise<boolean> {
    return this.enqueue(async () => {
      if (!this.snapshot.has(subjectKey)) return false;
      const next = new Map(this.snapshot);
      next.delete(subjectKey);
      await this.commit(next);
      return true;
    });
  }

  async list(): Promise<CacheEntrySummary[]> {
    const now = this.now();
    return [...this.snapshot.values()]
      .filter(entry => !isExpired(entry, this.ttlMs, now))
      .map(summarize);
  }

  clear(): Promise<void> {
    return this.enqueue(async () => {
      await this.commit(new Map());
    });
  }

  get size(): number {
    return this.snapshot.size;
  }

  private async commit(next: Map<string, CacheEntry>): Promise<void> {
    await this.persist(next);
    this.snapshot = next;
  }

  /** Serialise writers: each write starts after the previous one settles */
  protected enqueue<T>(write: () => Promise<T>): Promise<T> {
    const result = this.writeChain.then(write, write);
    this.writeChain = result.catch(() => undefined);
    return result;
  }
}

// In-memory backend (no durability)
export class InMemoryReportCache extends SnapshotCache {
  protected async persist(): Promise<void> {
    // nothing to make durable
  }
}
