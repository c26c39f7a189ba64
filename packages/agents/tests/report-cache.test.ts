import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InMemoryReportCache } from '../memory/report-cache.js';
import { FileReportCache } from '../memory/file-report-cache.js';
import { CacheIOError } from '../types/errors.js';
import { setLogLevel } from '../utils/logger.js';
import { makeReport, subjectOf } from './fixtures/reports.js';

describe('InMemoryReportCache', () => {
  let cache: InMemoryReportCache;

  beforeEach(() => {
    cache = new InMemoryReportCache();
  });

  it('returns undefined on a miss', async () => {
    expect(await cache.lookup('nobody')).toBeUndefined();
  });

  it('returns the inserted report by key', async () => {
    const report = makeReport('TestCo');
    await cache.insert(subjectOf('TestCo'), report);
    expect(await cache.lookup('testco')).toBe(report);
  });

  it('keeps the last write for a subject', async () => {
    await cache.insert(subjectOf('TestCo'), makeReport('TestCo', { runId: 'first' }));
    await cache.insert(subjectOf('TestCo'), makeReport('TestCo', { runId: 'second' }));
    expect((await cache.lookup('testco'))?.runId).toBe('second');
    expect(cache.size).toBe(1);
  });

  it('invalidates a single entry', async () => {
    await cache.insert(subjectOf('TestCo'), makeReport('TestCo'));
    expect(await cache.invalidate('testco')).toBe(true);
    expect(await cache.invalidate('testco')).toBe(false);
    expect(await cache.lookup('testco')).toBeUndefined();
  });

  it('lists and clears entries', async () => {
    await cache.insert(subjectOf('Alpha'), makeReport('Alpha'));
    await cache.insert(subjectOf('Beta'), makeReport('Beta', { status: 'partial_failure' }));

    expect((await cache.list()).map(e => [e.key, e.status])).toEqual([
      ['alpha', 'completed'],
      ['beta', 'partial_failure'],
    ]);

    await cache.clear();
    expect(await cache.list()).toEqual([]);
  });

  it('hides entries older than the TTL', async () => {
    let now = new Date('2025-01-01T00:00:00Z');
    const ttlCache = new InMemoryReportCache({ ttlMs: 60_000, now: () => now });
    await ttlCache.insert(subjectOf('TestCo'), makeReport('TestCo'));

    now = new Date('2025-01-01T00:00:59Z');
    expect(await ttlCache.lookup('testco')).toBeDefined();

    now = new Date('2025-01-01T00:01:01Z');
    expect(await ttlCache.lookup('testco')).toBeUndefined();
    expect(await ttlCache.list()).toEqual([]);
  });

  it('applies concurrent inserts one at a time without losing any', async () => {
    const names = ['A1', 'B2', 'C3', 'D4', 'E5'];
    await Promise.all(names.map(n => cache.insert(subjectOf(n), makeReport(n))));
    expect((await cache.list()).map(e => e.key).sort()).toEqual(['a1', 'b2', 'c3', 'd4', 'e5']);
  });
});

describe('FileReportCache', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    setLogLevel('silent');
    dir = await mkdtemp(join(tmpdir(), 'prospect-cache-'));
    filePath = join(dir, 'cache.json');
  });

  afterEach(async () => {
    setLogLevel('info');
    await rm(dir, { recursive: true, force: true });
  });

  it('opens empty when the file does not exist', async () => {
    const cache = await FileReportCache.open(filePath);
    expect(cache.size).toBe(0);
  });

  it('persists inserts and reloads them in a new instance', async () => {
    const cache = await FileReportCache.open(filePath);
    await cache.insert(subjectOf('TestCo'), makeReport('TestCo'));

    const reopened = await FileReportCache.open(filePath);
    const report = await reopened.lookup('testco');
    expect(report?.runId).toBe('run-testco');
    expect(report?.outputs.analysis?.keyChallenges).toEqual(['Scaling infrastructure']);
    expect(Object.isFrozen(report)).toBe(true);
  });

  it('writes a versioned JSON document', async () => {
    const cache = await FileReportCache.open(filePath);
    await cache.insert(subjectOf('TestCo'), makeReport('TestCo'));

    const file: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    expect(file).toMatchObject({ version: 1, entries: { testco: { subject: { key: 'testco' } } } });
  });

  it('opens empty when the file is not valid JSON', async () => {
    await writeFile(filePath, '{ not json', 'utf-8');
    const cache = await FileReportCache.open(filePath);
    expect(cache.size).toBe(0);
  });

  it('opens empty when the file fails validation', async () => {
    await writeFile(filePath, JSON.stringify({ version: 1, entries: { x: { subject: 'x' } } }), 'utf-8');
    const cache = await FileReportCache.open(filePath);
    expect(cache.size).toBe(0);
  });

  it('opens empty when an entry carries an unparseable creation time', async () => {
    const cache = await FileReportCache.open(filePath);
    await cache.insert(subjectOf('TestCo'), makeReport('TestCo'));
    const file: { entries: Record<string, { createdAt: string }> } = JSON.parse(await readFile(filePath, 'utf-8'));
    file.entries.testco.createdAt = 'yesterday';
    await writeFile(filePath, JSON.stringify(file), 'utf-8');

    const reopened = await FileReportCache.open(filePath, { ttlMs: 60_000 });
    expect(reopened.size).toBe(0);
    expect(await reopened.lookup('testco')).toBeUndefined();
  });

  it('overwrites a corrupt file on the next insert', async () => {
    await writeFile(filePath, 'garbage', 'utf-8');
    const cache = await FileReportCache.open(filePath);
    await cache.insert(subjectOf('TestCo'), makeReport('TestCo'));

    const reopened = await FileReportCache.open(filePath);
    expect(reopened.size).toBe(1);
  });

  it('persists every one of several concurrent inserts', async () => {
    const cache = await FileReportCache.open(filePath);
    const names = ['Alpha', 'Beta', 'Gamma', 'Delta'];
    await Promise.all(names.map(n => cache.insert(subjectOf(n), makeReport(n))));

    const reopened = await FileReportCache.open(filePath);
    expect((await reopened.list()).map(e => e.key).sort()).toEqual(['alpha', 'beta', 'delta', 'gamma']);
  });

  it('persists invalidation', async () => {
    const cache = await FileReportCache.open(filePath);
    await cache.insert(subjectOf('TestCo'), makeReport('TestCo'));
    await cache.invalidate('testco');

    const reopened = await FileReportCache.open(filePath);
    expect(await reopened.lookup('testco')).toBeUndefined();
  });

  it('leaves memory unchanged when the write fails', async () => {
    const blocker = join(dir, 'not-a-directory');
    await writeFile(blocker, 'x', 'utf-8');
    const cache = await FileReportCache.open(join(blocker, 'cache.json'));

    await expect(cache.insert(subjectOf('TestCo'), makeReport('TestCo'))).rejects.toBeInstanceOf(CacheIOError);
    expect(await cache.lookup('testco')).toBeUndefined();

    // the queue keeps accepting writes after a failure
    await expect(cache.clear()).rejects.toBeInstanceOf(CacheIOError);
  });
});
