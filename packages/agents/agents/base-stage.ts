// Base stage — every pipeline agent extends this class
// Turns thrown errors into a two-kind outcome so the orchestrator's retry
// decision depends only on the kind, never on the error's class.

import type {
  ExecutionContextReadView, Stage, StageName, StageOutcome, StageOutput, StageOutputMap,
  StagePolicy, Subject,
} from '../types/stages.js';
import {
  ProviderError, StageError, TerminalStageError, errorMessage, type FailureKind,
} from '../types/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

/** Transient when a collaborator or the stage says so; terminal otherwise */
export function classifyFailure(err: unknown): FailureKind {
  if (err instanceof StageError) return err.kind;
  if (err instanceof ProviderError) return err.transient ? 'transient' : 'terminal';
  return 'terminal';
}

export abstract class BaseStage<O extends StageOutput> implements Stage<O> {
  readonly name: O['kind'];
  readonly policy: StagePolicy;
  readonly requires: readonly StageName[];
  protected readonly log: Logger;

  constructor(name: O['kind'], policy: StagePolicy, requires: readonly StageName[], logScope: string) {
    this.name = name;
    this.policy = policy;
    this.requires = requires;
    this.log = createLogger(logScope);
  }

  async invoke(subject: Subject, view: ExecutionContextReadView, signal: AbortSignal): Promise<StageOutcome<O>> {
    const start = Date.now();
    this.log.info(`Started for ${subject.displayName}`, { runId: view.runId });

    try {
      const output = await this.perform(subject, view, signal);
      this.log.info(`Completed for ${subject.displayName}`, {
        runId: view.runId,
        durationMs: Date.now() - start,
      });
      return { ok: true, output };
    } catch (err) {
      const kind = classifyFailure(err);
      const message = errorMessage(err);
      this.log.warn(`Failed (${kind}) for ${subject.displayName}`, {
        runId: view.runId,
        error: message,
        durationMs: Date.now() - start,
      });
      return { ok: false, kind, message };
    }
  }

  /** Stage-specific work. Throw StageError/ProviderError to signal the failure kind. */
  protected abstract perform(
    subject: Subject,
    view: ExecutionContextReadView,
    signal: AbortSignal,
  ): Promise<O>;

  protected requireOutput<N extends StageName>(view: ExecutionContextReadView, stage: N): StageOutputMap[N] {
    const output = view.outputOf(stage);
    if (!output) {
      throw new TerminalStageError(`${this.name} needs output from ${stage}, which is not available`);
    }
    return output;
  }
}
