// Domain events emitted during a prospecting run
// Used for progress reporting and observability; never for control flow

export type DomainEventType =
  // Orchestration
  | 'RunRequested'
  | 'PhaseChanged'
  | 'RunCompleted'
  | 'RunCancelled'
  // Stages
  | 'StageStarted'
  | 'StageSucceeded'
  | 'StageRetrying'
  | 'StageFailed'
  | 'StageSkipped'
  // Memory
  | 'CacheHit'
  | 'CacheMiss'
  | 'CacheWriteFailed'
  | 'ReportArchived';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'RunRequested', 'PhaseChanged', 'RunCompleted', 'RunCancelled',
  'StageStarted', 'StageSucceeded', 'StageRetrying', 'StageFailed', 'StageSkipped',
  'CacheHit', 'CacheMiss', 'CacheWriteFailed', 'ReportArchived',
];

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  runId: string;
  payload: T;
}

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: (event: DomainEvent) => void): void;
  off(type: DomainEventType, handler: (event: DomainEvent) => void): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<(event: DomainEvent) => void>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
    }
  }

  on(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    this.handlers.get(type)?.delete(handler);
  }
}
