// Batch prospecting
// Runs N companies with concurrency control against one shared cache and
// produces individual reports + a comparative summary.

import type { Report } from '../types/report.js';
import { errorMessage } from '../types/errors.js';
import type { Orchestrator, RunOptions } from './coordinator.js';

export interface BatchOptions extends Pick<RunOptions, 'signal' | 'bypassCache'> {
  /** Max concurrent runs (default: 3) */
  concurrency?: number;
  /** Progress callback */
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface CompanyResult {
  company: string;
  report?: Report;
  /** Set when the run itself threw (invalid name, cancellation) */
  error?: string;
  durationMs: number;
}

export interface BatchResult {
  companies: CompanyResult[];
  comparative: string;
  totalDurationMs: number;
}

export class BatchProspector {
  constructor(private readonly orchestrator: Orchestrator) {}

  /**
   * Prospect multiple companies in parallel with concurrency control.
   * A company that fails never stops the batch.
   */
  async run(companies: string[], options: BatchOptions = {}): Promise<BatchResult> {
    const { concurrency = 3, onProgress, signal, bypassCache } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer (got ${concurrency})`);
    }
    const totalStart = Date.now();
    const results: CompanyResult[] = [];
    let completed = 0;

    // Process in batches respecting concurrency limit
    for (let i = 0; i < companies.length; i += concurrency) {
      const batch = companies.slice(i, i + concurrency);

      const batchResults = await Promise.all(batch.map(async (company): Promise<CompanyResult> => {
        const companyStart = Date.now();
        onProgress?.({ completed, total: companies.length, current: company, status: 'running' });

        try {
          const report = await this.orchestrator.run(company, { signal, bypassCache });
          completed++;
          onProgress?.({
            completed,
            total: companies.length,
            current: company,
            status: report.status === 'failed' ? 'failed' : 'completed',
          });
          return { company, report, durationMs: Date.now() - companyStart };
        } catch (err) {
          completed++;
          const error = errorMessage(err);
          onProgress?.({ completed, total: companies.length, current: company, status: 'failed', error });
          return { company, error, durationMs: Date.now() - companyStart };
        }
      }));

      results.push(...batchResults);
    }

    return {
      companies: results,
      comparative: buildComparative(results),
      totalDurationMs: Date.now() - totalStart,
    };
  }
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

/** Markdown comparison of every company in the batch */
export function buildComparative(results: CompanyResult[]): string {
  const reported = results.filter((r): r is CompanyResult & { report: Report } => r.report !== undefined);
  const usable = reported.filter(r => r.report.status !== 'failed');
  const failed = results.filter(r => !r.report || r.report.status === 'failed');

  if (usable.length === 0) {
    return '## Comparative Prospecting Summary\n\nNo companies were successfully prospected.';
  }

  const lines: string[] = [
    '## Comparative Prospecting Summary',
    '',
    `**Companies prospected:** ${usable.length}/${results.length}`,
    '',
    '### Results Summary',
    '',
    '| Company | Status | Challenges | Contacts | Emails | Cached | Duration |',
    '|---------|--------|------------|----------|--------|--------|----------|',
  ];

  for (const { company, report, durationMs } of usable) {
    const { outputs } = report;
    lines.push(`| ${cell(company)} | ${report.status} | ${outputs.analysis?.keyChallenges.length ?? 0}` +
      ` | ${outputs['contact-discovery']?.totalContactsFound ?? 0}` +
      ` | ${outputs['outreach-generation']?.emails.length ?? 0}` +
      ` | ${report.servedFromCache ? 'yes' : 'no'} | ${(durationMs / 1000).toFixed(1)}s |`);
  }
  lines.push('');

  lines.push('### Top Challenge and Contact');
  lines.push('');
  for (const { company, report } of usable) {
    const challenge = report.outputs.analysis?.keyChallenges[0] ?? 'n/a';
    const contact = report.outputs['contact-discovery']?.prioritizedContacts[0];
    lines.push(`- **${company}**: ${challenge}` + (contact ? ` (contact: ${contact.name}, ${contact.title})` : ''));
  }
  lines.push('');

  if (failed.length > 0) {
    lines.push('### Failed');
    lines.push('');
    for (const r of failed) {
      const reason = r.error ?? r.report?.errors.map(e => `${e.stage}: ${e.message}`).join('; ') ?? 'unknown error';
      lines.push(`- **${r.company}**: ${reason}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
