/**
 * Outbound engine events and reference publishers
 */
import { v4 as uuidv4 } from 'uuid';
import {
  DecisionEvaluatedEvent,
  EngineEvent,
  EventPublisher,
  PortfolioAllocationProducedEvent,
  SourcePosition,
  StrategyAllocation,
  StrategyEvaluatedEvent,
  TraceEntry,
} from '../spec/types';
import { serializeAllocation } from './allocation';
import { Logger, LoggerFactory } from '../logging/logger';

export interface EventMeta {
  correlationId: string;
  /** Id of the inbound event that caused this one */
  causationId: string;
  timestamp: Date;
}

function baseFields(meta: EventMeta) {
  return {
    eventId: uuidv4(),
    correlationId: meta.correlationId,
    causationId: meta.causationId,
    timestamp: meta.timestamp.toISOString(),
  };
}

// ============================================================================
// Builders
// ============================================================================

export function strategyEvaluatedEvent(
  meta: EventMeta,
  details: { strategy?: string; success: boolean; trace: TraceEntry[] }
): StrategyEvaluatedEvent {
  return {
    ...baseFields(meta),
    eventType: 'StrategyEvaluated',
    strategy: details.strategy,
    success: details.success,
    trace: details.trace,
  };
}

export function allocationProducedEvent(
  meta: EventMeta,
  allocation: StrategyAllocation
): PortfolioAllocationProducedEvent {
  return {
    ...baseFields(meta),
    eventType: 'PortfolioAllocationProduced',
    allocation: serializeAllocation(allocation),
  };
}

export function decisionEvaluatedEvent(
  meta: EventMeta,
  decision: {
    condition: string;
    conditionResult: boolean;
    branch: 'then' | 'else';
    position?: SourcePosition;
  }
): DecisionEvaluatedEvent {
  return {
    ...baseFields(meta),
    eventType: 'DecisionEvaluated',
    ...decision,
  };
}

// ============================================================================
// Publishers
// ============================================================================

/**
 * Collects events in memory. Used by tests and the CLI.
 */
export class InMemoryEventPublisher implements EventPublisher {
  readonly events: EngineEvent[] = [];

  publish(event: EngineEvent): void {
    this.events.push(event);
  }

  ofType<T extends EngineEvent['eventType']>(type: T): Extract<EngineEvent, { eventType: T }>[] {
    return this.events.filter(
      (event): event is Extract<EngineEvent, { eventType: T }> => event.eventType === type
    );
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Writes a one-line summary of each event to the log.
 */
export class LoggingEventPublisher implements EventPublisher {
  constructor(private readonly logger: Logger = LoggerFactory.getLogger('events')) {}

  publish(event: EngineEvent): void {
    const meta = {
      eventId: event.eventId,
      correlationId: event.correlationId,
      causationId: event.causationId,
    };

    switch (event.eventType) {
      case 'StrategyEvaluated':
        this.logger.info(`StrategyEvaluated success=${event.success}`, {
          ...meta,
          strategy: event.strategy,
          traceEntries: event.trace.length,
        });
        break;
      case 'PortfolioAllocationProduced':
        this.logger.info('PortfolioAllocationProduced', {
          ...meta,
          weights: event.allocation.weights,
          isFallback: event.allocation.isFallback,
        });
        break;
      case 'DecisionEvaluated':
        this.logger.debug(`DecisionEvaluated ${event.branch}`, {
          ...meta,
          condition: event.condition,
          conditionResult: event.conditionResult,
        });
        break;
    }
  }
}
