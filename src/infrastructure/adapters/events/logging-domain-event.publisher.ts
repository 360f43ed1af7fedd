import { Injectable } from '@nestjs/common';
import { DomainEvent } from '@domain/common';
import { IDomainEventPublisherPort } from '@application/ports/outbound';
import { AppLoggerService } from '../../observability/logging/app-logger.service';
import {
  MenuMetricEvent,
  MetricsService,
  OrderMetricEvent,
} from '../../observability/metrics/metrics.service';

const ORDER_METRIC_EVENTS: Readonly<Record<string, OrderMetricEvent>> = {
  OrderCreated: 'created',
  OrderStatusChanged: 'status_changed',
  OrderCompleted: 'completed',
  OrderCancelled: 'cancelled',
};

const MENU_METRIC_EVENTS: Readonly<Record<string, MenuMetricEvent>> = {
  CoffeeItemCreated: 'created',
  CoffeeItemPriceChanged: 'price_changed',
  CoffeeItemAvailabilityChanged: 'availability_changed',
};

/**
 * In-process event dispatcher: every event is logged and counted.
 * There is no broker; subscribers read the structured logs or the metrics.
 */
@Injectable()
export class LoggingDomainEventPublisher implements IDomainEventPublisherPort {
  constructor(
    private readonly appLogger: AppLoggerService,
    private readonly metricsService: MetricsService,
  ) {}

  publish(events: readonly DomainEvent[]): Promise<void> {
    for (const event of events) {
      this.appLogger.logDomainEvent(event);

      const orderEvent = ORDER_METRIC_EVENTS[event.type];
      if (orderEvent) {
        this.metricsService.recordOrder(orderEvent);
      }
      const menuEvent = MENU_METRIC_EVENTS[event.type];
      if (menuEvent) {
        this.metricsService.recordMenuEvent(menuEvent);
      }
    }
    return Promise.resolve();
  }
}
