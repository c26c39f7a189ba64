// Prompt builders for the analysis and outreach stages
// The section headings double as the parse anchors in analysis-parser.ts

import type { AnalysisOutput, Contact, ResearchOutput } from '../types/stages.js';

export const ANALYSIS_SECTIONS = {
  challenges: 'KEY BUSINESS CHALLENGES',
  opportunities: 'OPPORTUNITIES',
  approach: 'RECOMMENDED SALES APPROACH',
} as const;

/** Marks a prompt as an outreach-email request */
export const EMAIL_CONTACT_HEADING = 'TARGET CONTACT:';
export const EMAIL_CHALLENGES_HEADING = 'COMPANY CHALLENGES IDENTIFIED:';

function bullets(items: readonly string[], fallback = '- N/A'): string {
  return items.length > 0 ? items.map(item => `- ${item}`).join('\n') : fallback;
}

export function buildAnalysisPrompt(research: ResearchOutput): string {
  const news = research.recentNews.map(n => `${n.title}: ${n.snippet}`);
  return `You are a business intelligence analyst helping a sales team understand a potential client.

Based on the following company information, provide a detailed analysis:

Company: ${research.company}
Website: ${research.overview.website ?? 'N/A'}
Overview: ${research.overview.summary || 'N/A'}

Key Facts:
${bullets(research.overview.keyFacts)}

Recent News:
${bullets(news)}

Please provide:

1. ${ANALYSIS_SECTIONS.challenges} (3-5 main challenges this company likely faces)
2. ${ANALYSIS_SECTIONS.opportunities} (How our solutions could help address these challenges)
3. ${ANALYSIS_SECTIONS.approach} (What angles to emphasize in outreach)

Format your response clearly with these three sections, one numbered item per line.
Be specific and actionable. Focus on insights that would help a sales team engage effectively.`;
}

export function buildEmailPrompt(contact: Contact, analysis: AnalysisOutput, company: string): string {
  return `You are writing a personalized sales outreach email.

${EMAIL_CONTACT_HEADING}
- Name: ${contact.name}
- Title: ${contact.title}
- Company: ${company}

${EMAIL_CHALLENGES_HEADING}
${bullets(analysis.keyChallenges.slice(0, 3))}

OPPORTUNITIES FOR OUR SOLUTION:
${bullets(analysis.opportunities.slice(0, 2))}

RECOMMENDED APPROACH:
${analysis.recommendedApproach}

Write a professional, personalized sales email that:
1. Opens with a relevant insight or observation about their company
2. Mentions 1-2 specific challenges they likely face
3. Briefly explains how our solution addresses these challenges
4. Includes a clear, low-pressure call-to-action
5. Is concise (150-200 words)
6. Sounds natural and human, not robotic

Do not include [placeholders]. Write the complete email body only (no subject line, no signature).
Make it specific to ${company} and ${contact.title}.`;
}

/** "Helping Acme with Scaling infrastructure while maintaining..." */
export function emailSubject(company: string, analysis: AnalysisOutput): string {
  const first = analysis.keyChallenges[0];
  if (!first) return `Helping ${company} with Your Technology Needs`;
  const words = first.split(/\s+/).filter(Boolean);
  const topic = words.slice(0, 4).join(' ') + (words.length > 4 ? '...' : '');
  return `Helping ${company} with ${topic}`;
}
