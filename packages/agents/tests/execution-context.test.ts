import { describe, it, expect, beforeEach } from 'vitest';
import { ExecutionContext } from '../orchestrator/execution-context.js';
import { DuplicateStageError, MissingDependencyError } from '../types/errors.js';
import { analysisOutput, contactOutput, researchOutput } from './fixtures/stages.js';

describe('ExecutionContext', () => {
  let context: ExecutionContext;

  beforeEach(() => {
    context = new ExecutionContext({ key: 'testco', displayName: 'TestCo' }, 'run-1', new Date('2025-01-01T00:00:00Z'));
  });

  it('records outputs in execution order', () => {
    context.record('research', researchOutput());
    context.record('analysis', analysisOutput());

    expect(context.completedStages()).toEqual(['research', 'analysis']);
    expect(context.outputOf('analysis')?.keyChallenges).toEqual(['Scaling infrastructure']);
    expect(context.outputOf('contact-discovery')).toBeUndefined();
  });

  it('rejects a second output for the same stage', () => {
    context.record('research', researchOutput());
    expect(() => context.record('research', researchOutput())).toThrow(DuplicateStageError);
    expect(context.completedStages()).toEqual(['research']);
  });

  it('rejects an output whose kind does not match the stage', () => {
    expect(() => context.record('analysis', researchOutput())).toThrow(
      'Stage "analysis" returned output of kind "research"',
    );
    expect(context.hasOutput('analysis')).toBe(false);
  });

  it('freezes recorded outputs', () => {
    context.record('research', researchOutput());
    const output = context.outputOf('research');
    expect(Object.isFrozen(output)).toBe(true);
    expect(Object.isFrozen(output?.recentNews)).toBe(true);
  });

  it('reports missing dependencies', () => {
    context.record('research', researchOutput());
    const outreach = { name: 'outreach-generation' as const, requires: ['analysis', 'contact-discovery'] as const };

    expect(context.missingDependencies(outreach)).toEqual(['analysis', 'contact-discovery']);
    expect(() => context.assertDependencies(outreach)).toThrow(MissingDependencyError);
  });

  it('tracks errors and skips separately from outputs', () => {
    context.recordError('contact-discovery', {
      kind: 'terminal', message: 'no contacts', attempts: 1, occurredAt: '2025-01-01T00:00:01Z',
    });
    context.recordSkip('outreach-generation', ['contact-discovery']);

    expect(context.hasFailed('contact-discovery')).toBe(true);
    expect(context.wasSkipped('outreach-generation')).toBe(true);
    expect(context.getErrors()).toEqual([{
      stage: 'contact-discovery', kind: 'terminal', message: 'no contacts', attempts: 1, occurredAt: '2025-01-01T00:00:01Z',
    }]);
    expect(context.getSkipped()).toEqual([{ stage: 'outreach-generation', missing: ['contact-discovery'] }]);
  });

  it('returns copies from getErrors', () => {
    context.recordError('analysis', { kind: 'transient', message: 'x', attempts: 3, occurredAt: 'now' });
    const errors = context.getErrors();
    errors.pop();
    expect(context.getErrors()).toHaveLength(1);
  });

  it('snapshots outputs keyed by stage name', () => {
    context.record('research', researchOutput());
    context.record('analysis', analysisOutput());
    context.record('contact-discovery', contactOutput());

    const outputs = context.snapshotOutputs();
    expect(Object.keys(outputs)).toEqual(['research', 'analysis', 'contact-discovery']);
    expect(outputs['contact-discovery']?.totalContactsFound).toBe(1);
  });

  it('fixes the end time on first markEnded', () => {
    const first = context.markEnded(new Date('2025-01-01T00:00:05Z'));
    const second = context.markEnded(new Date('2025-01-01T00:00:09Z'));
    expect(second).toBe(first);
    expect(second.toISOString()).toBe('2025-01-01T00:00:05.000Z');
  });

  it('read view sees later records but exposes no mutators', () => {
    const view = context.readView();
    expect(view.completedStages()).toEqual([]);

    context.record('research', researchOutput('Later'));

    expect(view.completedStages()).toEqual(['research']);
    expect(view.outputOf('research')?.company).toBe('Later');
    expect(view.runId).toBe('run-1');
    expect(Object.keys(view).sort()).toEqual(['completedStages', 'outputOf', 'runId', 'subject']);
  });
});
