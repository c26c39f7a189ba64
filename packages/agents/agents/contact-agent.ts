// Contact agent — stage 3: find decision makers and rank them by seniority and relevance

import type { ContactOutput, ExecutionContextReadView, StagePolicy, Subject } from '../types/stages.js';
import { TerminalStageError } from '../types/errors.js';
import type { SearchClient } from '../bridge/search-client.js';
import { contactsQuery } from '../bridge/search-queries.js';
import { extractContacts, prioritizeContacts } from '../utils/contact-parser.js';
import { BaseStage } from './base-stage.js';

export interface ContactAgentOptions {
  /** Results requested from the people search (default: 10) */
  resultLimit?: number;
  policy?: StagePolicy;
}

export class ContactAgent extends BaseStage<ContactOutput> {
  private readonly resultLimit: number;

  constructor(private readonly search: SearchClient, options: ContactAgentOptions = {}) {
    super('contact-discovery', options.policy ?? 'best-effort', ['analysis'], 'ContactAgent');
    this.resultLimit = options.resultLimit ?? 10;
  }

  protected async perform(
    subject: Subject,
    _view: ExecutionContextReadView,
    signal: AbortSignal,
  ): Promise<ContactOutput> {
    const results = await this.search.search(contactsQuery(subject.displayName), {
      limit: this.resultLimit,
      signal,
    });
    const contacts = extractContacts(results);
    if (contacts.length === 0) {
      throw new TerminalStageError(`No contacts found for ${subject.displayName}`);
    }

    return {
      kind: 'contact-discovery',
      totalContactsFound: contacts.length,
      prioritizedContacts: prioritizeContacts(contacts),
    };
  }
}
