// Template language model — canned, deterministic responses for demo mode
// Recognises the analysis and outreach prompts by their headings; no network

import type { LanguageModel } from './language-model.js';
import {
  ANALYSIS_SECTIONS, EMAIL_CHALLENGES_HEADING, EMAIL_CONTACT_HEADING,
} from '../utils/prompts.js';

function field(prompt: string, label: string): string | undefined {
  const pattern = new RegExp(`^-?\\s*${label}: (.+)$`, 'm');
  return pattern.exec(prompt)?.[1]?.trim();
}

function firstBulletAfter(prompt: string, heading: string): string | undefined {
  const at = prompt.indexOf(heading);
  if (at < 0) return undefined;
  const line = prompt
    .slice(at + heading.length)
    .split('\n')
    .map(l => l.trim())
    .find(l => l.startsWith('- '));
  const text = line?.slice(2).trim();
  return text && text !== 'N/A' ? text : undefined;
}

function lowerFirst(text: string): string {
  return text.charAt(0).toLowerCase() + text.slice(1);
}

export function cannedAnalysis(company: string): string {
  return `Analysis of ${company}

${ANALYSIS_SECTIONS.challenges}
1. Scaling infrastructure while maintaining performance and reliability
2. Managing technical debt accumulated during rapid growth phases
3. Integrating AI and machine learning into existing product offerings
4. Attracting and retaining top engineering talent in a competitive market
5. Ensuring data security and compliance across global operations

${ANALYSIS_SECTIONS.opportunities}
1. Automation tools can reduce operational overhead
2. AI-powered analytics can improve decision-making speed
3. Cloud-native solutions enable faster time-to-market
4. Modern DevOps practices can improve deployment frequency

${ANALYSIS_SECTIONS.approach}
Emphasize proven ROI in similar enterprise environments.
Focus on quick wins and scalability.
Lead with technical credibility and case studies from comparable companies.`;
}

export function cannedEmail(firstName: string, company: string, challenge: string): string {
  return `Hi ${firstName},

I hope this message finds you well. I've been following ${company}'s growth and recent initiatives, particularly your focus on scaling operations and technology innovation.

Many leaders in similar positions tell me their biggest hurdle is ${lowerFirst(challenge)}. As ${company} keeps expanding, challenges like this tend to move to the top of the list.

We've helped companies at a similar stage reduce operational overhead while improving system reliability through automated infrastructure management and intelligent monitoring.

Would you be open to a brief 15-minute conversation to explore whether our approach might be relevant for ${company}? I'd be happy to share case studies from comparable teams.`;
}

export class TemplateLanguageModel implements LanguageModel {
  async complete(prompt: string): Promise<string> {
    const company = field(prompt, 'Company') ?? 'your company';

    if (prompt.includes(EMAIL_CONTACT_HEADING)) {
      const name = field(prompt, 'Name') ?? 'there';
      const challenge = firstBulletAfter(prompt, EMAIL_CHALLENGES_HEADING) ?? 'infrastructure scaling';
      return cannedEmail(name.split(/\s+/)[0], company, challenge);
    }

    if (prompt.includes(ANALYSIS_SECTIONS.challenges)) {
      return cannedAnalysis(company);
    }

    return `Summary for ${company}: no template matches this request.`;
  }
}
