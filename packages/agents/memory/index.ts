export { InMemoryReportCache, SnapshotCache } from './report-cache.js';
export type { ReportCache, CacheOptions } from './report-cache.js';
export { FileReportCache } from './file-report-cache.js';
export { FileReportArchive, InMemoryReportArchive } from './report-archive.js';
export type { ReportSink } from './report-archive.js';
export { ReportSchema, CacheFileSchema } from './cache-schema.js';
