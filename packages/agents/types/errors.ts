// Error taxonomy for the prospecting pipeline
//
// Stage errors carry a kind so the retry decision never depends on which
// class was thrown. Invariant errors (duplicate / missing dependency) are
// fatal to a run and never retried. Cache errors never fail a run.

import type { StageName } from './stages.js';

export type FailureKind = 'transient' | 'terminal';

export class StageError extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'StageError';
  }
}

/** Retryable: network, timeout, rate limit */
export class TransientStageError extends StageError {
  constructor(message: string, cause?: unknown) {
    super(message, 'transient', cause);
    this.name = 'TransientStageError';
  }
}

/** Not retryable: invalid input, unrecoverable provider error, empty result */
export class TerminalStageError extends StageError {
  constructor(message: string, cause?: unknown) {
    super(message, 'terminal', cause);
    this.name = 'TerminalStageError';
  }
}

/** Raised by search and language-model collaborators */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly transient: boolean,
    public readonly status?: number,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export class DuplicateStageError extends Error {
  constructor(public readonly stage: StageName) {
    super(`Stage "${stage}" already recorded output in this run`);
    this.name = 'DuplicateStageError';
  }
}

export class MissingDependencyError extends Error {
  constructor(
    public readonly stage: StageName,
    public readonly missing: StageName[],
  ) {
    super(`Stage "${stage}" requires output from: ${missing.join(', ')}`);
    this.name = 'MissingDependencyError';
  }
}

export class CacheIOError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CacheIOError';
  }
}

export class RunCancelledError extends Error {
  constructor(
    public readonly runId: string,
    public readonly beforeStage?: StageName,
  ) {
    super(beforeStage
      ? `Run ${runId} cancelled before stage "${beforeStage}"`
      : `Run ${runId} cancelled`);
    this.name = 'RunCancelledError';
  }
}

export class InvalidSubjectError extends Error {
  constructor(input: string) {
    super(`Company name must not be empty (got ${JSON.stringify(input)})`);
    this.name = 'InvalidSubjectError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration invalid:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
