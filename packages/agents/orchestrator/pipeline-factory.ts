// Pipeline factory — wires collaborators, stages, cache and archive from AppConfig

import type { Stage, StageName, StagePolicy } from '../types/stages.js';
import { ConfigError } from '../types/errors.js';
import type { AppConfig } from '../config/env.js';
import { createReportCache } from '../config/cache-backend.js';
import type { ReportCache } from '../memory/report-cache.js';
import { FileReportArchive, type ReportSink } from '../memory/report-archive.js';
import { GoogleSearchClient, type SearchClient } from '../bridge/search-client.js';
import { SimulatedSearchClient } from '../bridge/simulated-search.js';
import { AnthropicLanguageModel, type LanguageModel } from '../bridge/language-model.js';
import { TemplateLanguageModel } from '../bridge/template-model.js';
import { ResearchAgent } from '../agents/research-agent.js';
import { AnalysisAgent } from '../agents/analysis-agent.js';
import { ContactAgent } from '../agents/contact-agent.js';
import { OutreachAgent } from '../agents/outreach-agent.js';
import { Orchestrator, type OrchestratorConfig } from './coordinator.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('PipelineFactory');

export interface Collaborators {
  search: SearchClient;
  model: LanguageModel;
}

export type PolicyOverrides = Partial<Record<StageName, StagePolicy>>;

/** Live providers, or the deterministic demo stand-ins */
export function createCollaborators(config: AppConfig): Collaborators {
  if (config.mode === 'demo') {
    log.info('Demo mode — simulated search and template responses, no API calls');
    return { search: new SimulatedSearchClient(), model: new TemplateLanguageModel() };
  }

  const { apiKey: searchKey, engineId, timeoutMs: searchTimeoutMs } = config.search;
  const { apiKey: anthropicKey, model, timeoutMs } = config.anthropic;
  if (!searchKey || !engineId || !anthropicKey) {
    throw new ConfigError(['live mode requires ANTHROPIC_API_KEY, GOOGLE_SEARCH_API_KEY and GOOGLE_SEARCH_ENGINE_ID']);
  }
  return {
    search: new GoogleSearchClient({ apiKey: searchKey, engineId, timeoutMs: searchTimeoutMs }),
    model: new AnthropicLanguageModel({ apiKey: anthropicKey, model, timeoutMs }),
  };
}

/** research → analysis → contact-discovery → outreach-generation */
export function createStages(collaborators: Collaborators, policies: PolicyOverrides = {}): Stage[] {
  const { search, model } = collaborators;
  return [
    new ResearchAgent(search, { policy: policies.research }),
    new AnalysisAgent(model, policies.analysis),
    new ContactAgent(search, { policy: policies['contact-discovery'] }),
    new OutreachAgent(model, policies['outreach-generation']),
  ];
}

export interface ProspectorOptions {
  /** Use these instead of building them from config */
  collaborators?: Collaborators;
  cache?: ReportCache;
  /** Archive destination; `false` disables archiving (default: FileReportArchive in reportsDir) */
  sink?: ReportSink | false;
  policies?: PolicyOverrides;
  onEvent?: OrchestratorConfig['onEvent'];
}

export interface Prospector {
  orchestrator: Orchestrator;
  cache: ReportCache;
}

export async function createProspector(config: AppConfig, options: ProspectorOptions = {}): Promise<Prospector> {
  const collaborators = options.collaborators ?? createCollaborators(config);
  const cache = options.cache ?? await createReportCache(config.cache);
  const sink = options.sink === false
    ? undefined
    : options.sink ?? new FileReportArchive(config.reportsDir);

  const orchestrator = new Orchestrator({
    stages: createStages(collaborators, options.policies),
    cache,
    sink,
    retry: config.retry,
    onEvent: options.onEvent,
  });
  return { orchestrator, cache };
}
