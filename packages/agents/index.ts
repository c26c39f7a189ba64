// Prospect Intel — sales-intelligence pipeline
// research → analysis → contact discovery → outreach, with a persisted report cache

export { Orchestrator, validatePipeline, ExecutionContext, BatchProspector } from './orchestrator/index.js';
export type {
  OrchestratorConfig, OrchestratorEvent, OrchestratorPhase, RunOptions, BatchOptions, BatchResult,
} from './orchestrator/index.js';
export {
  DEFAULT_RETRY_POLICY, resolveRetryPolicy, createCollaborators, createStages, createProspector,
} from './orchestrator/index.js';
export type { RetryPolicy, Collaborators, Prospector, ProspectorOptions } from './orchestrator/index.js';

export { BaseStage, classifyFailure } from './agents/base-stage.js';
export { ResearchAgent } from './agents/research-agent.js';
export { AnalysisAgent } from './agents/analysis-agent.js';
export { ContactAgent } from './agents/contact-agent.js';
export { OutreachAgent } from './agents/outreach-agent.js';

export {
  InMemoryReportCache, FileReportCache, FileReportArchive, InMemoryReportArchive,
} from './memory/index.js';
export type { ReportCache, ReportSink, CacheOptions } from './memory/index.js';

// Configuration — validated environment and cache backend factory
export { loadConfig, createReportCache } from './config/index.js';
export type { AppConfig, RunMode, CacheBackend } from './config/index.js';

export * from './types/index.js';

// Bridge — search and language-model providers
export {
  GoogleSearchClient, SimulatedSearchClient, AnthropicLanguageModel, TemplateLanguageModel,
} from './bridge/index.js';
export type { SearchClient, LanguageModel, MessageTransport } from './bridge/index.js';

export { normalizeSubject, subjectKey } from './utils/subject.js';
export { formatReportSummary } from './utils/report-formatter.js';
export { createLogger, setLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
