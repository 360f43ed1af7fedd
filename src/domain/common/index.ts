export { DomainEvent, DomainEventBuffer } from './domain-event';
export { EntityMetadata } from './entity-metadata';
export { requireText, optionalText } from './text-rules';
