export { EventsModule } from './events.module';
export { LoggingDomainEventPublisher } from './logging-domain-event.publisher';
