// Domain events emitted at each research phase boundary

export type DomainEventType =
  // Orchestration
  | 'ResearchStarted'
  | 'PlanCreated'
  | 'DataCollected'
  | 'DataSourceDegraded'
  // Specialist agents
  | 'AnalysisCompleted'
  // Workflow patterns
  | 'WorkflowCompleted'
  // Learning
  | 'ReflectionCompleted'
  | 'MemoryStored'
  | 'ResearchCompleted';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'ResearchStarted', 'PlanCreated', 'DataCollected', 'DataSourceDegraded',
  'AnalysisCompleted', 'WorkflowCompleted', 'ReflectionCompleted',
  'MemoryStored', 'ResearchCompleted',
];

export interface ResearchEventPayload {
  symbol: string;
  [key: string]: unknown;
}

export interface DomainEvent<T = ResearchEventPayload> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: string;   // emitting component
  payload: T;
}

export type EventHandler = (event: DomainEvent) => void;

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: EventHandler): void;
  off(type: DomainEventType, handler: EventHandler): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<EventHandler>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
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
