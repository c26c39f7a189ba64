// Cache backend factory — selects the report cache from PROSPECT_CACHE_BACKEND
// Supported values: 'file' (default), 'memory'

import type { ReportCache } from '../memory/report-cache.js';
import type { AppConfig } from './env.js';

/**
 * Create the report cache for the configured backend.
 * - `file`: FileReportCache (JSON snapshot, atomic replace)
 * - `memory`: InMemoryReportCache (lost on exit)
 */
export async function createReportCache(
  config: AppConfig['cache'],
  now?: () => Date,
): Promise<ReportCache> {
  const options = { ttlMs: config.ttlMs, now };

  switch (config.backend) {
    case 'memory': {
      const { InMemoryReportCache } = await import('../memory/report-cache.js');
      return new InMemoryReportCache(options);
    }
    case 'file': {
      const { FileReportCache } = await import('../memory/file-report-cache.js');
      return FileReportCache.open(config.filePath, options);
    }
  }
}
