// End-to-end: demo collaborators through the real stages, orchestrator and cache

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config/env.js';
import { createCollaborators, createProspector, createStages } from '../orchestrator/pipeline-factory.js';
import { GoogleSearchClient } from '../bridge/search-client.js';
import { AnthropicLanguageModel } from '../bridge/language-model.js';
import { InMemoryReportArchive } from '../memory/report-archive.js';
import { ConfigError } from '../types/errors.js';

const demoConfig = () => loadConfig({ PROSPECT_CACHE_BACKEND: 'memory', PROSPECT_LOG_LEVEL: 'silent' });

describe('demo pipeline', () => {
  it('produces a complete report for a company', async () => {
    const archive = new InMemoryReportArchive();
    const { orchestrator, cache } = await createProspector(demoConfig(), { sink: archive });

    const report = await orchestrator.run('Acme Robotics');

    expect(report.status).toBe('completed');
    expect(report.outputs.research?.overview.website).toBe('https://www.acmerobotics.com');
    expect(report.outputs.analysis?.keyChallenges).toHaveLength(5);
    expect(report.outputs['contact-discovery']?.prioritizedContacts.map(c => c.name)).toEqual([
      'Jennifer Martinez', 'David Thompson', 'Emily Chen', 'Michael Brown',
    ]);

    const emails = report.outputs['outreach-generation']?.emails ?? [];
    expect(emails.map(e => e.recipient)).toEqual(['Jennifer Martinez', 'David Thompson', 'Emily Chen']);
    expect(emails[0].subject).toBe('Helping Acme Robotics with Scaling infrastructure while maintaining...');
    expect(emails[0].body.startsWith('Hi Jennifer,')).toBe(true);

    expect(await cache.lookup('acme robotics')).toBe(report);
    expect(archive.reports).toHaveLength(1);
  });

  it('reports a partial failure when contact discovery finds nobody', async () => {
    const { orchestrator } = await createProspector(demoConfig(), {
      sink: false,
      collaborators: {
        ...createCollaborators(demoConfig()),
        search: { search: async (query) => (query.includes('CEO') ? [] : [{ title: 'Acme', snippet: 'Acme.', url: 'https://acme.example' }]) },
      },
    });

    const report = await orchestrator.run('Acme');

    expect(report.status).toBe('partial_failure');
    expect(report.errors.map(e => [e.stage, e.message])).toEqual([['contact-discovery', 'No contacts found for Acme']]);
    expect(report.skippedStages).toEqual(['outreach-generation']);
  });

  it('applies policy overrides to the stages', () => {
    const stages = createStages(createCollaborators(demoConfig()), { 'contact-discovery': 'required' });
    expect(stages.map(s => [s.name, s.policy])).toEqual([
      ['research', 'required'],
      ['analysis', 'required'],
      ['contact-discovery', 'required'],
      ['outreach-generation', 'best-effort'],
    ]);
  });
});

describe('createCollaborators', () => {
  it('builds live providers when every key is configured', () => {
    const collaborators = createCollaborators(loadConfig({
      ANTHROPIC_API_KEY: 'test-anthropic-key',
      GOOGLE_SEARCH_API_KEY: 'test-search-key',
      GOOGLE_SEARCH_ENGINE_ID: 'test-engine',
    }));
    expect(collaborators.search).toBeInstanceOf(GoogleSearchClient);
    expect(collaborators.model).toBeInstanceOf(AnthropicLanguageModel);
  });

  it('refuses live mode without keys', () => {
    const config = { ...demoConfig(), mode: 'live' as const };
    expect(() => createCollaborators(config)).toThrow(ConfigError);
  });
});
