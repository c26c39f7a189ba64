// Durable report sink — archives every finalized report independently of the cache

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Report } from '../types/report.js';
import { subjectSlug } from '../utils/subject.js';

export interface ReportSink {
  /** Persist the report; resolves to where it was written */
  archive(report: Report): Promise<string>;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** 2025-03-09T14:05:07Z → "20250309_140507" (UTC) */
export function archiveTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

export class FileReportArchive implements ReportSink {
  constructor(private readonly directory: string) {}

  async archive(report: Report): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const fileName = `${subjectSlug(report.company)}_${archiveTimestamp(new Date(report.completedAt))}.json`;
    const filePath = join(this.directory, fileName);
    await writeFile(filePath, JSON.stringify(report, null, 2), 'utf-8');
    return filePath;
  }
}

/** Keeps archived reports in memory; used when archiving is disabled and in tests */
export class InMemoryReportArchive implements ReportSink {
  readonly reports: Report[] = [];

  async archive(report: Report): Promise<string> {
    this.reports.push(report);
    return `memory://${report.runId}`;
  }
}
