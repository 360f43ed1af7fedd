import { DomainEvent } from '@domain/common';

export interface IDomainEventPublisherPort {
  /**
   * Dispatches events pulled from an aggregate after it has been saved.
   * Events are handed over in the order they were recorded.
   */
  publish(events: readonly DomainEvent[]): Promise<void>;
}
