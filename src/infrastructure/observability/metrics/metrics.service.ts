import { Injectable } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Histogram } from 'prom-client';
import { METRICS } from './metrics.constants';

export type OrderMetricEvent = 'created' | 'status_changed' | 'completed' | 'cancelled';
export type MenuMetricEvent = 'created' | 'price_changed' | 'availability_changed';

@Injectable()
export class MetricsService {
  constructor(
    @InjectMetric(METRICS.HTTP_REQUESTS_TOTAL)
    private readonly httpRequestsCounter: Counter<string>,

    @InjectMetric(METRICS.ORDERS_TOTAL)
    private readonly ordersCounter: Counter<string>,

    @InjectMetric(METRICS.MENU_EVENTS_TOTAL)
    private readonly menuEventsCounter: Counter<string>,

    @InjectMetric(METRICS.AUTH_ATTEMPTS_TOTAL)
    private readonly authAttemptsCounter: Counter<string>,

    @InjectMetric(METRICS.HTTP_REQUEST_DURATION)
    private readonly httpDurationHistogram: Histogram<string>,

    @InjectMetric(METRICS.DB_QUERY_DURATION)
    private readonly dbDurationHistogram: Histogram<string>,
  ) {}

  // HTTP Metrics
  recordHttpRequest(method: string, path: string, status: number, durationSec: number): void {
    this.httpRequestsCounter.inc({ method, path, status: status.toString() });
    this.httpDurationHistogram.observe({ method, path, status: status.toString() }, durationSec);
  }

  // Database Metrics
  recordDBQuery(operation: string, collection: string, durationSec: number): void {
    this.dbDurationHistogram.observe({ operation, collection }, durationSec);
  }

  // Domain Metrics
  recordOrder(event: OrderMetricEvent): void {
    this.ordersCounter.inc({ event });
  }

  recordMenuEvent(event: MenuMetricEvent): void {
    this.menuEventsCounter.inc({ event });
  }

  // Auth Metrics
  recordAuthAttempt(action: 'login' | 'register', success: boolean): void {
    this.authAttemptsCounter.inc({ action, outcome: success ? 'success' : 'failure' });
  }
}
