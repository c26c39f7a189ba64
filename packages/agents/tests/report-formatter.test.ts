import { describe, it, expect } from 'vitest';
import { formatReportSummary } from '../utils/report-formatter.js';
import { makeReport } from './fixtures/reports.js';

const RULE = '='.repeat(60);

describe('formatReportSummary', () => {
  it('summarises a completed report', () => {
    expect(formatReportSummary(makeReport('Acme'))).toEqual([
      RULE,
      'SALES INTELLIGENCE REPORT: Acme',
      RULE,
      'Status: completed',
      '',
      'Company Overview:',
      '   Acme builds developer tools.',
      '   Website: https://testco.example',
      '',
      'Key Challenges (1):',
      '   1. Scaling infrastructure',
      '',
      'Priority Contacts (1):',
      '   • Jennifer Martinez - Chief Technology Officer (score 15)',
      '',
      'Outreach Emails Generated: 1',
      RULE,
    ]);
  });

  it('lists skipped stages and errors for a partial failure', () => {
    const report = makeReport('Acme', {
      status: 'partial_failure',
      servedFromCache: true,
      outputs: { research: makeReport('Acme').outputs.research },
      skippedStages: ['outreach-generation'],
      errors: [{ stage: 'contact-discovery', kind: 'terminal', message: 'No contacts found', attempts: 1, occurredAt: 't' }],
    });

    const lines = formatReportSummary(report);

    expect(lines[3]).toBe('Status: partial_failure (served from cache)');
    expect(lines).toContain('Key Challenges (0):');
    expect(lines).toContain('Priority Contacts (0):');
    expect(lines.slice(-6)).toEqual([
      '',
      'Skipped: outreach-generation',
      '',
      'Errors:',
      '   contact-discovery (terminal, 1 attempt(s)): No contacts found',
      RULE,
    ]);
  });
});
