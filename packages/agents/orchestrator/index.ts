export { Orchestrator, validatePipeline } from './coordinator.js';
export type { OrchestratorConfig, OrchestratorEvent, OrchestratorPhase, RunOptions } from './coordinator.js';
export { ExecutionContext } from './execution-context.js';
export type { SkippedStage } from './execution-context.js';
export {
  DEFAULT_RETRY_POLICY, resolveRetryPolicy, shouldRetry, backoffDelay,
} from './retry-policy.js';
export type { RetryPolicy } from './retry-policy.js';
export { BatchProspector, buildComparative } from './batch-prospector.js';
export type { BatchOptions, BatchProgress, BatchResult, CompanyResult } from './batch-prospector.js';
export { createCollaborators, createStages, createProspector } from './pipeline-factory.js';
export type { Collaborators, PolicyOverrides, Prospector, ProspectorOptions } from './pipeline-factory.js';
