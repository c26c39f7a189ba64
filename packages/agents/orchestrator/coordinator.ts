// Orchestrator — runs the stage pipeline for one subject at a time
// Cache check → sequential stages with retry → finalize (status, cache insert, archive)

import { randomUUID } from 'node:crypto';
import type {
  ExecutionContextReadView, Stage, StageName, StageOutcome, StageOutput, Subject,
} from '../types/stages.js';
import type { Report, RunStatus } from '../types/report.js';
import {
  DuplicateStageError, MissingDependencyError, RunCancelledError, errorMessage,
} from '../types/errors.js';
import {
  DOMAIN_EVENT_TYPES, SimpleEventBus, type DomainEventType, type EventBus,
} from '../types/events.js';
import type { ReportCache } from '../memory/report-cache.js';
import type { ReportSink } from '../memory/report-archive.js';
import { classifyFailure } from '../agents/base-stage.js';
import { ExecutionContext } from './execution-context.js';
import {
  backoffDelay, resolveRetryPolicy, shouldRetry, type RetryPolicy,
} from './retry-policy.js';
import { normalizeSubject } from '../utils/subject.js';
import { deepFreeze } from '../utils/deep-freeze.js';
import { sleep as abortableSleep } from '../utils/sleep.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Orchestrator');

export type OrchestratorPhase = 'idle' | 'cache-check' | 'running' | 'finalizing' | RunStatus;

export interface OrchestratorEvent {
  type: DomainEventType;
  runId: string;
  payload: unknown;
}

export interface OrchestratorConfig {
  /** Executed in order; validated at construction */
  stages: readonly Stage[];
  cache: ReportCache;
  /** Archive for every finalized report (optional) */
  sink?: ReportSink;
  retry?: Partial<RetryPolicy>;
  eventBus?: EventBus;
  onEvent?: (event: OrchestratorEvent) => void;
  now?: () => Date;
  /** Delay between attempts; replaced in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Skip the cache lookup and run every stage (the result is still cached) */
  bypassCache?: boolean;
}

type AttemptResult =
  | { ok: true; output: StageOutput; attempts: number }
  | { ok: false; kind: 'transient' | 'terminal'; message: string; attempts: number };

/**
 * Reject pipelines the orchestrator could never run correctly:
 * a repeated stage name, or a stage requiring one that does not run before it.
 */
export function validatePipeline(stages: readonly Pick<Stage, 'name' | 'requires'>[]): void {
  const earlier = new Set<StageName>();
  for (const stage of stages) {
    if (earlier.has(stage.name)) throw new DuplicateStageError(stage.name);
    const missing = stage.requires.filter(dep => !earlier.has(dep));
    if (missing.length > 0) throw new MissingDependencyError(stage.name, missing);
    earlier.add(stage.name);
  }
}

export class Orchestrator {
  private readonly stages: readonly Stage[];
  private readonly cache: ReportCache;
  private readonly sink?: ReportSink;
  private readonly policy: RetryPolicy;
  private readonly eventBus: EventBus;
  private readonly now: () => Date;
  private readonly delay: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(config: OrchestratorConfig) {
    validatePipeline(config.stages);
    this.stages = [...config.stages];
    this.cache = config.cache;
    this.sink = config.sink;
    this.policy = resolveRetryPolicy(config.retry);
    this.eventBus = config.eventBus ?? new SimpleEventBus();
    this.now = config.now ?? (() => new Date());
    this.delay = config.sleep ?? abortableSleep;

    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of DOMAIN_EVENT_TYPES) {
        this.eventBus.on(type, (e) => handler({ type: e.type, runId: e.runId, payload: e.payload }));
      }
    }
  }

  get events(): EventBus {
    return this.eventBus;
  }

  get retryPolicy(): RetryPolicy {
    return { ...this.policy };
  }

  get stageNames(): StageName[] {
    return this.stages.map(s => s.name);
  }

  /**
   * Produce a report for one company.
   * Resolves with the report for every status, including `failed`;
   * rejects with RunCancelledError when the signal aborts and with
   * InvalidSubjectError for an empty name.
   */
  async run(company: string, options: RunOptions = {}): Promise<Report> {
    const subject = normalizeSubject(company);
    const runId = randomUUID();
    const { signal, bypassCache = false } = options;

    let phase: OrchestratorPhase = 'idle';
    const transition = (to: OrchestratorPhase, detail: Record<string, unknown> = {}) => {
      this.emit('PhaseChanged', runId, { from: phase, to, ...detail });
      phase = to;
    };

    this.emit('RunRequested', runId, { company: subject.displayName, key: subject.key, bypassCache });
    this.throwIfCancelled(runId, signal);

    // 1. Cache check
    transition('cache-check');
    if (!bypassCache) {
      const cached = await this.lookup(subject.key, runId);
      if (cached) {
        this.emit('CacheHit', runId, { key: subject.key, cachedRunId: cached.runId });
        log.info(`Serving ${subject.displayName} from cache`, { runId, cachedRunId: cached.runId });
        transition(cached.status, { servedFromCache: true });
        this.emit('RunCompleted', runId, { status: cached.status, servedFromCache: true });
        return deepFreeze({ ...cached, servedFromCache: true });
      }
      this.emit('CacheMiss', runId, { key: subject.key });
    }

    // 2. Stages, strictly in order
    const context = new ExecutionContext(subject, runId, this.now());
    let aborted = false;

    for (const [index, stage] of this.stages.entries()) {
      this.throwIfCancelled(runId, signal, stage.name);

      const missing = context.missingDependencies(stage);
      const explained = missing.length > 0
        && missing.every(dep => context.hasFailed(dep) || context.wasSkipped(dep));
      if (explained && stage.policy === 'best-effort') {
        context.recordSkip(stage.name, missing);
        this.emit('StageSkipped', runId, { stage: stage.name, missing });
        log.info(`Skipping ${stage.name}: dependency unavailable`, { runId, missing });
        continue;
      }
      if (explained) {
        const message = `Required stage ${stage.name} cannot run without: ${missing.join(', ')}`;
        context.recordError(stage.name, {
          kind: 'terminal', message, attempts: 0, occurredAt: this.now().toISOString(),
        });
        this.emit('StageFailed', runId, { stage: stage.name, kind: 'terminal', attempts: 0, error: message });
        log.warn(message, { runId, missing });
        aborted = true;
        break;
      }
      try {
        context.assertDependencies(stage);
      } catch (err) {
        context.recordError(stage.name, {
          kind: 'invariant', message: errorMessage(err), attempts: 0, occurredAt: this.now().toISOString(),
        });
        this.emit('StageFailed', runId, { stage: stage.name, kind: 'invariant', error: errorMessage(err) });
        log.error(errorMessage(err), { runId });
        aborted = true;
        break;
      }

      transition('running', { stage: stage.name, index });
      const result = await this.invokeWithRetry(stage, context, signal);

      if (result.ok) {
        try {
          context.record(stage.name, result.output);
        } catch (err) {
          context.recordError(stage.name, {
            kind: 'invariant',
            message: errorMessage(err),
            attempts: result.attempts,
            occurredAt: this.now().toISOString(),
          });
          this.emit('StageFailed', runId, { stage: stage.name, kind: 'invariant', error: errorMessage(err) });
          log.error(`Rejected output from ${stage.name}`, { runId, error: errorMessage(err) });
          aborted = true;
          break;
        }
        this.emit('StageSucceeded', runId, { stage: stage.name, attempts: result.attempts });
        continue;
      }

      context.recordError(stage.name, {
        kind: result.kind,
        message: result.message,
        attempts: result.attempts,
        occurredAt: this.now().toISOString(),
      });
      this.emit('StageFailed', runId, {
        stage: stage.name, kind: result.kind, attempts: result.attempts, error: result.message,
      });
      log.warn(`Stage ${stage.name} failed after ${result.attempts} attempt(s)`, {
        runId, kind: result.kind, policy: stage.policy, error: result.message,
      });
      if (stage.policy === 'required') {
        aborted = true;
        break;
      }
    }

    this.throwIfCancelled(runId, signal);

    // 3. Finalize
    transition('finalizing');
    const report = this.buildReport(context, aborted);

    if (report.status !== 'failed' && this.hasRequiredOutputs(context)) {
      await this.store(subject, report);
    }
    await this.archive(report);

    transition(report.status);
    this.emit('RunCompleted', runId, { status: report.status, durationMs: report.durationMs });
    log.info(`Run finished for ${subject.displayName}: ${report.status}`, {
      runId, durationMs: report.durationMs, errors: report.errors.length,
    });
    return report;
  }

  private async invokeWithRetry(
    stage: Stage,
    context: ExecutionContext,
    signal: AbortSignal | undefined,
  ): Promise<AttemptResult> {
    const view = context.readView();

    for (let attempt = 1; ; attempt++) {
      this.emit('StageStarted', context.runId, { stage: stage.name, attempt });
      const outcome = await this.attempt(stage, context, view, signal);

      // Anything that arrives after cancellation is discarded
      this.throwIfCancelled(context.runId, signal, stage.name);

      if (outcome.ok) return { ...outcome, attempts: attempt };
      if (!shouldRetry(outcome.kind, attempt, this.policy)) return { ...outcome, attempts: attempt };

      const delayMs = backoffDelay(attempt, this.policy);
      this.emit('StageRetrying', context.runId, {
        stage: stage.name, attempt, delayMs, error: outcome.message,
      });
      log.warn(`Retrying ${stage.name} in ${delayMs}ms (attempt ${attempt}/${this.policy.maxAttempts})`, {
        runId: context.runId, error: outcome.message,
      });
      await this.delay(delayMs, signal);
      this.throwIfCancelled(context.runId, signal, stage.name);
    }
  }

  /** One bounded attempt. A timeout aborts the stage's signal and counts as transient. */
  private async attempt(
    stage: Stage,
    context: ExecutionContext,
    view: ExecutionContextReadView,
    runSignal: AbortSignal | undefined,
  ): Promise<StageOutcome> {
    const timeoutMs = this.policy.stageTimeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onRunAbort = () => controller.abort();
    if (runSignal?.aborted) controller.abort();
    else runSignal?.addEventListener('abort', onRunAbort, { once: true });

    const abandoned = new Promise<StageOutcome>((resolve) => {
      const settle = () => resolve({
        ok: false,
        kind: 'transient',
        message: timedOut
          ? `Stage "${stage.name}" timed out after ${timeoutMs}ms`
          : `Stage "${stage.name}" aborted`,
      });
      if (controller.signal.aborted) settle();
      else controller.signal.addEventListener('abort', settle, { once: true });
    });

    try {
      return await Promise.race([this.invokeSafely(stage, context, view, controller.signal), abandoned]);
    } finally {
      clearTimeout(timer);
      runSignal?.removeEventListener('abort', onRunAbort);
    }
  }

  /** Stages built on BaseStage never throw; anything else is classified here */
  private async invokeSafely(
    stage: Stage,
    context: ExecutionContext,
    view: ExecutionContextReadView,
    signal: AbortSignal,
  ): Promise<StageOutcome> {
    try {
      return await stage.invoke(context.subject, view, signal);
    } catch (err) {
      return { ok: false, kind: classifyFailure(err), message: errorMessage(err) };
    }
  }

  private buildReport(context: ExecutionContext, aborted: boolean): Report {
    const completedAt = context.markEnded(this.now());
    const errors = context.getErrors();
    const skippedStages = context.getSkipped().map(s => s.stage);
    const requiredFailed = errors.some(e => e.kind === 'invariant' || this.policyOf(e.stage) === 'required');

    let status: RunStatus;
    if (aborted || requiredFailed) status = 'failed';
    else if (errors.length > 0 || skippedStages.length > 0) status = 'partial_failure';
    else status = 'completed';

    return deepFreeze({
      runId: context.runId,
      subject: context.subject.key,
      company: context.subject.displayName,
      status,
      outputs: context.snapshotOutputs(),
      errors,
      skippedStages,
      startedAt: context.startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - context.startedAt.getTime(),
      servedFromCache: false,
    });
  }

  private policyOf(stage: StageName): Stage['policy'] | undefined {
    return this.stages.find(s => s.name === stage)?.policy;
  }

  private hasRequiredOutputs(context: ExecutionContext): boolean {
    return this.stages
      .filter(s => s.policy === 'required')
      .every(s => context.hasOutput(s.name));
  }

  private async lookup(key: string, runId: string): Promise<Report | undefined> {
    try {
      return await this.cache.lookup(key);
    } catch (err) {
      log.warn('Cache lookup failed — treating as a miss', { runId, key, error: errorMessage(err) });
      return undefined;
    }
  }

  private async store(subject: Subject, report: Report): Promise<void> {
    try {
      await this.cache.insert(subject, report);
    } catch (err) {
      log.warn('Cache write failed — report returned but not cached', {
        runId: report.runId, key: subject.key, error: errorMessage(err),
      });
      this.emit('CacheWriteFailed', report.runId, { key: subject.key, error: errorMessage(err) });
    }
  }

  private async archive(report: Report): Promise<void> {
    if (!this.sink) return;
    try {
      const location = await this.sink.archive(report);
      this.emit('ReportArchived', report.runId, { location });
    } catch (err) {
      log.warn('Report archive failed', { runId: report.runId, error: errorMessage(err) });
    }
  }

  private throwIfCancelled(runId: string, signal: AbortSignal | undefined, beforeStage?: StageName): void {
    if (!signal?.aborted) return;
    this.emit('RunCancelled', runId, { beforeStage });
    log.info('Run cancelled', { runId, beforeStage });
    throw new RunCancelledError(runId, beforeStage);
  }

  private emit(type: DomainEventType, runId: string, payload: unknown): void {
    this.eventBus.emit({
      eventId: randomUUID(),
      type,
      timestamp: this.now(),
      runId,
      payload,
    });
  }
}
