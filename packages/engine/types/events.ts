// Run lifecycle events published by the orchestrator and the analysis service

export type DomainEventType =
  | 'RunStarted'
  | 'ChunkAnalyzed'
  | 'ChunkRetried'
  | 'ChunkDegraded'
  | 'SummaryGenerated'
  | 'RunCompleted'
  | 'RunFailed'
  | 'RunCancelled';

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  runId: string;
  timestamp: Date;
  payload: T;
}

export type EventHandler = (event: DomainEvent) => void;

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: EventHandler): void;
  off(type: DomainEventType, handler: EventHandler): void;
}

export const ALL_EVENT_TYPES: readonly DomainEventType[] = [
  'RunStarted', 'ChunkAnalyzed', 'ChunkRetried', 'ChunkDegraded',
  'SummaryGenerated', 'RunCompleted', 'RunFailed', 'RunCancelled',
];

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<EventHandler>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (!typeHandlers) return;
    for (const handler of typeHandlers) {
      handler(event);
    }
  }

  on(type: DomainEventType, handler: EventHandler): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: EventHandler): void {
    this.handlers.get(type)?.delete(handler);
  }
}
