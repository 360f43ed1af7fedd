import { Module } from '@nestjs/common';
import { MetricsModule } from '../../observability/metrics/metrics.module';
import { LoggingDomainEventPublisher } from './logging-domain-event.publisher';

@Module({
  imports: [MetricsModule],
  providers: [
    {
      provide: 'IDomainEventPublisher',
      useClass: LoggingDomainEventPublisher,
    },
  ],
  exports: ['IDomainEventPublisher'],
})
export class EventsModule {}
