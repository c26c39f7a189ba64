// Execution Context — per-run state shared between stages
// Owned by exactly one Orchestrator run; discarded once the report is built

import { randomUUID } from 'node:crypto';
import type {
  ExecutionContextReadView, Stage, StageName, StageOutput, StageOutputMap, Subject,
} from '../types/stages.js';
import type { ReportOutputs, StageErrorRecord } from '../types/report.js';
import { DuplicateStageError, MissingDependencyError } from '../types/errors.js';
import { deepFreeze } from '../utils/deep-freeze.js';

export interface SkippedStage {
  stage: StageName;
  missing: StageName[];
}

function isOutputOf<N extends StageName>(stage: N, output: StageOutput): output is StageOutputMap[N] {
  return output.kind === stage;
}

export class ExecutionContext {
  readonly runId: string;
  readonly subject: Subject;
  readonly startedAt: Date;
  private endedAt: Date | null = null;
  private outputs = new Map<StageName, StageOutput>();
  private errors: StageErrorRecord[] = [];
  private skipped: SkippedStage[] = [];

  constructor(subject: Subject, runId: string = randomUUID(), now: Date = new Date()) {
    this.subject = subject;
    this.runId = runId;
    this.startedAt = now;
  }

  /** Append a stage's output. Each stage records at most once per run. */
  record(stage: StageName, output: StageOutput): void {
    if (this.outputs.has(stage)) throw new DuplicateStageError(stage);
    if (output.kind !== stage) {
      throw new TypeError(`Stage "${stage}" returned output of kind "${output.kind}"`);
    }
    this.outputs.set(stage, deepFreeze(output));
  }

  recordError(stage: StageName, error: Omit<StageErrorRecord, 'stage'>): void {
    this.errors.push({ stage, ...error });
  }

  recordSkip(stage: StageName, missing: StageName[]): void {
    this.skipped.push({ stage, missing: [...missing] });
  }

  outputOf<N extends StageName>(stage: N): StageOutputMap[N] | undefined {
    const output = this.outputs.get(stage);
    return output && isOutputOf(stage, output) ? output : undefined;
  }

  hasOutput(stage: StageName): boolean {
    return this.outputs.has(stage);
  }

  hasFailed(stage: StageName): boolean {
    return this.errors.some(e => e.stage === stage);
  }

  wasSkipped(stage: StageName): boolean {
    return this.skipped.some(s => s.stage === stage);
  }

  missingDependencies(stage: Pick<Stage, 'requires'>): StageName[] {
    return stage.requires.filter(dep => !this.outputs.has(dep));
  }

  assertDependencies(stage: Pick<Stage, 'name' | 'requires'>): void {
    const missing = this.missingDependencies(stage);
    if (missing.length > 0) throw new MissingDependencyError(stage.name, missing);
  }

  completedStages(): StageName[] {
    return [...this.outputs.keys()];
  }

  getErrors(): StageErrorRecord[] {
    return this.errors.map(e => ({ ...e }));
  }

  getSkipped(): SkippedStage[] {
    return this.skipped.map(s => ({ stage: s.stage, missing: [...s.missing] }));
  }

  /** Outputs in execution order, keyed by stage name */
  snapshotOutputs(): ReportOutputs {
    const result: ReportOutputs = {};
    for (const output of this.outputs.values()) {
      switch (output.kind) {
        case 'research':
          result.research = output;
          break;
        case 'analysis':
          result.analysis = output;
          break;
        case 'contact-discovery':
          result['contact-discovery'] = output;
          break;
        case 'outreach-generation':
          result['outreach-generation'] = output;
          break;
      }
    }
    return result;
  }

  markEnded(now: Date = new Date()): Date {
    this.endedAt ??= now;
    return this.endedAt;
  }

  /** Read-only view handed to stages. Exposes only outputs already recorded. */
  readView(): ExecutionContextReadView {
    return {
      runId: this.runId,
      subject: this.subject,
      outputOf: <N extends StageName>(stage: N) => this.outputOf(stage),
      completedStages: () => this.completedStages(),
    };
  }
}
