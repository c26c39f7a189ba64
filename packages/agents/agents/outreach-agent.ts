// Outreach agent — stage 4: one personalised email per top-priority contact

import type {
  ExecutionContextReadView, OutreachEmail, OutreachOutput, StagePolicy, Subject,
} from '../types/stages.js';
import type { LanguageModel } from '../bridge/language-model.js';
import { buildEmailPrompt, emailSubject } from '../utils/prompts.js';
import { BaseStage } from './base-stage.js';

export const MAX_EMAILS = 3;

export class OutreachAgent extends BaseStage<OutreachOutput> {
  constructor(private readonly model: LanguageModel, policy: StagePolicy = 'best-effort') {
    super('outreach-generation', policy, ['analysis', 'contact-discovery'], 'OutreachAgent');
  }

  protected async perform(
    subject: Subject,
    view: ExecutionContextReadView,
    signal: AbortSignal,
  ): Promise<OutreachOutput> {
    const analysis = this.requireOutput(view, 'analysis');
    const contacts = this.requireOutput(view, 'contact-discovery').prioritizedContacts.slice(0, MAX_EMAILS);
    const company = subject.displayName;

    // Sequential: a failure part-way through fails the whole stage, and a retry starts over
    const emails: OutreachEmail[] = [];
    for (const contact of contacts) {
      this.log.debug(`Generating email for ${contact.name}`, { company });
      const body = await this.model.complete(buildEmailPrompt(contact, analysis, company), {
        temperature: 0.8,
        maxTokens: 800,
        signal,
      });
      emails.push({
        recipient: contact.name,
        title: contact.title,
        ...(contact.email ? { emailAddress: contact.email } : {}),
        subject: emailSubject(company, analysis),
        body,
        priorityScore: contact.priorityScore,
      });
    }

    return { kind: 'outreach-generation', emails };
  }
}
