// File-backed report cache
// Loaded once at open and kept in memory; every write replaces the file atomically
// (whole snapshot → temp file in the same directory → rename over the cache file).

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join, basename } from 'node:path';
import type { CacheEntry } from '../types/report.js';
import { CacheIOError, errorMessage } from '../types/errors.js';
import { createLogger } from '../utils/logger.js';
import { deepFreeze } from '../utils/deep-freeze.js';
import { CACHE_FILE_VERSION, CacheFileSchema, type CacheFile } from './cache-schema.js';
import { SnapshotCache, type CacheOptions } from './report-cache.js';

const log = createLogger('ReportCache');

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileReportCache extends SnapshotCache {
  readonly filePath: string;

  private constructor(filePath: string, options: CacheOptions) {
    super(options);
    this.filePath = filePath;
  }

  /**
   * Open the cache at `filePath`. A missing file opens empty; an unreadable or
   * corrupt file also opens empty and is logged.
   */
  static async open(filePath: string, options: CacheOptions = {}): Promise<FileReportCache> {
    const cache = new FileReportCache(filePath, options);
    try {
      cache.snapshot = await cache.load();
    } catch (err) {
      const ioError = err instanceof CacheIOError
        ? err
        : new CacheIOError(`Failed to read cache file: ${errorMessage(err)}`, filePath, err);
      log.warn('Cache unavailable at startup, continuing empty', {
        path: filePath,
        error: ioError.message,
      });
    }
    return cache;
  }

  private async load(): Promise<Map<string, CacheEntry>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        log.info('No cache file yet, starting empty', { path: this.filePath });
        return new Map();
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CacheIOError(`Cache file is not valid JSON: ${errorMessage(err)}`, this.filePath, err);
    }

    const parsed = CacheFileSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 3)
        .map(i => `${i.path.join('.')}: ${i.message}`)
        .join('; ');
      throw new CacheIOError(`Cache file failed validation: ${issues}`, this.filePath, parsed.error);
    }

    const entries = new Map<string, CacheEntry>();
    for (const [key, entry] of Object.entries(parsed.data.entries)) {
      entries.set(key, deepFreeze(entry));
    }
    log.info('Cache loaded', { path: this.filePath, entries: entries.size });
    return entries;
  }

  protected async persist(next: ReadonlyMap<string, CacheEntry>): Promise<void> {
    const file: CacheFile = {
      version: CACHE_FILE_VERSION,
      entries: Object.fromEntries(next),
    };
    const dir = dirname(this.filePath);
    const tempPath = join(dir, `.${basename(this.filePath)}.${process.pid}.${randomUUID()}.tmp`);

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tempPath, JSON.stringify(file, null, 2), 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (err) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        log.debug('Temp file cleanup failed', { path: tempPath, error: errorMessage(cleanupErr) });
      });
      throw new CacheIOError(`Failed to write cache file: ${errorMessage(err)}`, this.filePath, err);
    }
  }
}
