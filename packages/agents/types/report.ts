// Report — the terminal artifact of one orchestrator run

import type { StageName, StageOutputMap, Subject } from './stages.js';

export type RunStatus = 'completed' | 'partial_failure' | 'failed';

/** invariant = ordering/contract violation (duplicate or missing dependency) */
export type StageErrorKind = 'transient' | 'terminal' | 'invariant';

export interface StageErrorRecord {
  stage: StageName;
  kind: StageErrorKind;
  message: string;
  attempts: number;
  occurredAt: string;
}

export type ReportOutputs = Partial<StageOutputMap>;

export interface Report {
  runId: string;
  subject: string;
  company: string;
  status: RunStatus;
  outputs: ReportOutputs;
  errors: StageErrorRecord[];
  skippedStages: StageName[];
  startedAt: string;
  completedAt: string;
  durationMs: number;
  servedFromCache: boolean;
}

export interface CacheEntry {
  subject: Subject;
  report: Report;
  createdAt: string;
}

export interface CacheEntrySummary {
  key: string;
  company: string;
  status: RunStatus;
  createdAt: string;
}
