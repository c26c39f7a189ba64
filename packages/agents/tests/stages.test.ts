// Tests for the four pipeline agents against fake search and model collaborators

import { describe, it, expect, vi } from 'vitest';
import { ResearchAgent } from '../agents/research-agent.js';
import { AnalysisAgent } from '../agents/analysis-agent.js';
import { ContactAgent } from '../agents/contact-agent.js';
import { OutreachAgent, MAX_EMAILS } from '../agents/outreach-agent.js';
import { classifyFailure } from '../agents/base-stage.js';
import { ExecutionContext } from '../orchestrator/execution-context.js';
import { SimulatedSearchClient } from '../bridge/simulated-search.js';
import { TemplateLanguageModel, cannedAnalysis } from '../bridge/template-model.js';
import type { SearchClient, SearchOptions } from '../bridge/search-client.js';
import type { CompletionOptions, LanguageModel } from '../bridge/language-model.js';
import {
  ProviderError, TerminalStageError, TransientStageError,
} from '../types/errors.js';
import type { SearchResult } from '../types/stages.js';
import { analysisOutput, researchOutput } from './fixtures/stages.js';

const subject = { key: 'acme', displayName: 'Acme' };
const signal = new AbortController().signal;

function fakeSearch(handler: (query: string) => SearchResult[] | Promise<SearchResult[]>) {
  const search = vi.fn(async (query: string, _options?: SearchOptions) => handler(query));
  const client: SearchClient = { search };
  return { client, search };
}

function fakeModel(handler: (prompt: string) => Promise<string>) {
  const complete = vi.fn((prompt: string, _options?: CompletionOptions) => handler(prompt));
  const model: LanguageModel = { complete };
  return { model, complete };
}

function contextWith(...stages: Array<'research' | 'analysis'>): ExecutionContext {
  const context = new ExecutionContext(subject, 'run-1');
  if (stages.includes('research')) context.record('research', researchOutput('Acme'));
  if (stages.includes('analysis')) context.record('analysis', analysisOutput());
  return context;
}

describe('classifyFailure', () => {
  it('maps errors to failure kinds', () => {
    expect(classifyFailure(new TransientStageError('x'))).toBe('transient');
    expect(classifyFailure(new TerminalStageError('x'))).toBe('terminal');
    expect(classifyFailure(new ProviderError('x', 'p', true))).toBe('transient');
    expect(classifyFailure(new ProviderError('x', 'p', false))).toBe('terminal');
    expect(classifyFailure(new Error('x'))).toBe('terminal');
    expect(classifyFailure('string')).toBe('terminal');
  });
});

describe('ResearchAgent', () => {
  it('builds the overview from the first result and the key facts from the rest', async () => {
    const { client, search } = fakeSearch((query) => query.endsWith('overview')
      ? [
        { title: 'Acme', snippet: 'Acme makes anvils.', url: 'https://acme.example' },
        { title: 'About', snippet: 'Founded 1949.', url: 'https://acme.example/about' },
      ]
      : [{ title: 'Acme news', snippet: 'Acme opens plant.', url: 'https://news.example/1' }]);
    const agent = new ResearchAgent(client);

    const outcome = await agent.invoke(subject, contextWith().readView(), signal);

    expect(outcome).toEqual({
      ok: true,
      output: {
        kind: 'research',
        company: 'Acme',
        overview: { summary: 'Acme makes anvils.', website: 'https://acme.example', keyFacts: ['Founded 1949.'] },
        recentNews: [{ title: 'Acme news', snippet: 'Acme opens plant.', url: 'https://news.example/1' }],
        sources: [
          { title: 'Acme', snippet: 'Acme makes anvils.', url: 'https://acme.example' },
          { title: 'About', snippet: 'Founded 1949.', url: 'https://acme.example/about' },
        ],
      },
    });
    expect(search.mock.calls.map(c => c[0])).toEqual(['Acme company overview', 'Acme news recent']);
    expect(search.mock.calls[0][1]).toEqual({ limit: 5, signal });
  });

  it('fails terminally when the company has no search presence', async () => {
    const { client } = fakeSearch(() => []);
    const outcome = await new ResearchAgent(client).invoke(subject, contextWith().readView(), signal);
    expect(outcome).toEqual({ ok: false, kind: 'terminal', message: 'No search results found for "Acme"' });
  });

  it('reports a transient provider error as transient', async () => {
    const { client } = fakeSearch(() => {
      throw new ProviderError('Search: HTTP 503', 'google-search', true, 503);
    });
    const outcome = await new ResearchAgent(client).invoke(subject, contextWith().readView(), signal);
    expect(outcome).toEqual({ ok: false, kind: 'transient', message: 'Search: HTTP 503' });
  });
});

describe('AnalysisAgent', () => {
  it('parses the model response into structured output', async () => {
    const { model, complete } = fakeModel(async () => cannedAnalysis('Acme'));
    const outcome = await new AnalysisAgent(model).invoke(subject, contextWith('research').readView(), signal);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.output.kind).toBe('analysis');
    expect(outcome.output.keyChallenges[0]).toBe('Scaling infrastructure while maintaining performance and reliability');
    expect(complete.mock.calls[0][0]).toContain('Company: Acme');
    expect(complete.mock.calls[0][1]).toEqual({ temperature: 0.7, maxTokens: 2000, signal });
  });

  it('fails terminally on a response with no recognisable sections', async () => {
    const { model } = fakeModel(async () => 'I cannot help with that.');
    const outcome = await new AnalysisAgent(model).invoke(subject, contextWith('research').readView(), signal);
    expect(outcome).toMatchObject({ ok: false, kind: 'terminal' });
  });

  it('fails terminally without research output', async () => {
    const { model, complete } = fakeModel(async () => 'unused');
    const outcome = await new AnalysisAgent(model).invoke(subject, contextWith().readView(), signal);
    expect(outcome).toEqual({
      ok: false,
      kind: 'terminal',
      message: 'analysis needs output from research, which is not available',
    });
    expect(complete).not.toHaveBeenCalled();
  });
});

describe('ContactAgent', () => {
  it('extracts and ranks contacts from the people search', async () => {
    const simulated = new SimulatedSearchClient();
    const { client, search } = fakeSearch((query) => simulated.search(query, { limit: 10 }));
    const outcome = await new ContactAgent(client).invoke(subject, contextWith('research', 'analysis').readView(), signal);

    expect(search.mock.calls[0][0]).toBe('Acme CEO executives leadership team');
    expect(search.mock.calls[0][1]).toEqual({ limit: 10, signal });
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.output.totalContactsFound).toBe(4);
    expect(outcome.output.prioritizedContacts[0]).toEqual({
      name: 'Jennifer Martinez',
      title: 'Chief Technology Officer',
      profileUrl: 'https://www.linkedin.com/in/jennifermartinez',
      priorityScore: 15,
      priorityReason: 'Senior technology decision maker - high influence on tech purchases',
    });
  });

  it('fails terminally when nobody is found', async () => {
    const { client } = fakeSearch(() => [{ title: 'Acme careers', snippet: '', url: 'https://acme.example/jobs' }]);
    const outcome = await new ContactAgent(client).invoke(subject, contextWith('research', 'analysis').readView(), signal);
    expect(outcome).toEqual({ ok: false, kind: 'terminal', message: 'No contacts found for Acme' });
  });

  it('is best-effort and requires analysis by default', () => {
    const agent = new ContactAgent(new SimulatedSearchClient());
    expect(agent.policy).toBe('best-effort');
    expect(agent.requires).toEqual(['analysis']);
  });
});

describe('OutreachAgent', () => {
  function withContacts(count: number): ExecutionContext {
    const context = contextWith('research', 'analysis');
    context.record('contact-discovery', {
      kind: 'contact-discovery',
      totalContactsFound: count,
      prioritizedContacts: Array.from({ length: count }, (_, i) => ({
        name: `Person ${String.fromCharCode(65 + i)}`,
        title: 'Director of IT',
        priorityScore: 10 - i,
        priorityReason: 'Department leader - involved in solution evaluation',
        ...(i === 0 ? { email: 'person.a@acme.example' } : {}),
      })),
    });
    return context;
  }

  it(`writes one email for each of the top ${MAX_EMAILS} contacts`, async () => {
    const { model, complete } = fakeModel(async (prompt) => `Email for ${/- Name: (.+)/.exec(prompt)?.[1] ?? '?'}`);
    const outcome = await new OutreachAgent(model).invoke(subject, withContacts(5).readView(), signal);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.output.emails).toEqual([
      {
        recipient: 'Person A',
        title: 'Director of IT',
        emailAddress: 'person.a@acme.example',
        subject: 'Helping Acme with Scaling infrastructure',
        body: 'Email for Person A',
        priorityScore: 10,
      },
      {
        recipient: 'Person B',
        title: 'Director of IT',
        subject: 'Helping Acme with Scaling infrastructure',
        body: 'Email for Person B',
        priorityScore: 9,
      },
      {
        recipient: 'Person C',
        title: 'Director of IT',
        subject: 'Helping Acme with Scaling infrastructure',
        body: 'Email for Person C',
        priorityScore: 8,
      },
    ]);
    expect(complete).toHaveBeenCalledTimes(3);
    expect(complete.mock.calls[0][1]).toEqual({ temperature: 0.8, maxTokens: 800, signal });
  });

  it('fails the whole stage when one email fails', async () => {
    let call = 0;
    const { model } = fakeModel(async () => {
      call++;
      if (call === 2) throw new ProviderError('overloaded', 'anthropic', true, 529);
      return 'Hi';
    });
    const outcome = await new OutreachAgent(model).invoke(subject, withContacts(3).readView(), signal);
    expect(outcome).toEqual({ ok: false, kind: 'transient', message: 'overloaded' });
  });

  it('writes demo emails with the template model', async () => {
    const outcome = await new OutreachAgent(new TemplateLanguageModel()).invoke(subject, withContacts(1).readView(), signal);
    expect(outcome.ok && outcome.output.emails[0].body.startsWith('Hi Person,')).toBe(true);
  });
});
