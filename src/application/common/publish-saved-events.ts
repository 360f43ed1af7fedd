import { Logger } from '@nestjs/common';
import { DomainEvent } from '@domain/common';
import { IDomainEventPublisherPort } from '../ports/outbound/domain-event-publisher.port';

/**
 * Hands the events of an already saved aggregate to the publisher.
 * The write has committed at this point, so a publish failure is logged
 * and the command still succeeds.
 */
export async function publishSavedEvents(
  publisher: IDomainEventPublisherPort,
  events: readonly DomainEvent[],
  logger: Logger,
): Promise<void> {
  if (events.length === 0) {
    return;
  }

  try {
    await publisher.publish(events);
  } catch (error) {
    const types = events.map((event) => event.type).join(', ');
    logger.error(
      `Failed to publish ${types} for ${events[0].aggregateId}`,
      error instanceof Error ? error.stack : String(error),
    );
  }
}
