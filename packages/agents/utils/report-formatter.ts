// Plain-text report summary for the CLI
// Colour is applied by the caller; this module only decides what to show

import type { Report } from '../types/report.js';

const RULE = '='.repeat(60);

export function formatReportSummary(report: Report): string[] {
  const { outputs } = report;
  const research = outputs.research;
  const analysis = outputs.analysis;
  const contacts = outputs['contact-discovery']?.prioritizedContacts ?? [];
  const emails = outputs['outreach-generation']?.emails ?? [];

  const lines: string[] = [
    RULE,
    `SALES INTELLIGENCE REPORT: ${report.company}`,
    RULE,
    `Status: ${report.status}${report.servedFromCache ? ' (served from cache)' : ''}`,
    '',
    'Company Overview:',
    `   ${research?.overview.summary || 'N/A'}`,
    `   Website: ${research?.overview.website ?? 'N/A'}`,
    '',
    `Key Challenges (${analysis?.keyChallenges.length ?? 0}):`,
  ];

  analysis?.keyChallenges.slice(0, 3).forEach((challenge, i) => {
    lines.push(`   ${i + 1}. ${challenge}`);
  });

  lines.push('', `Priority Contacts (${contacts.length}):`);
  for (const contact of contacts) {
    lines.push(`   • ${contact.name} - ${contact.title} (score ${contact.priorityScore})`);
  }

  lines.push('', `Outreach Emails Generated: ${emails.length}`);

  if (report.skippedStages.length > 0) {
    lines.push('', `Skipped: ${report.skippedStages.join(', ')}`);
  }
  if (report.errors.length > 0) {
    lines.push('', 'Errors:');
    for (const error of report.errors) {
      lines.push(`   ${error.stage} (${error.kind}, ${error.attempts} attempt(s)): ${error.message}`);
    }
  }

  lines.push(RULE);
  return lines;
}
