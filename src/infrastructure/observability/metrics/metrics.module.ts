import { Module } from '@nestjs/common';
import {
  makeCounterProvider,
  makeHistogramProvider,
  PrometheusModule,
} from '@willsoto/nestjs-prometheus';
import { METRICS } from './metrics.constants';
import { MetricsService } from './metrics.service';
import { MetricsInterceptor } from './metrics.interceptor';

@Module({
  imports: [
    PrometheusModule.register({
      path: '/metrics',
      defaultMetrics: {
        enabled: true,
      },
    }),
  ],
  providers: [
    // Counters
    makeCounterProvider({
      name: METRICS.HTTP_REQUESTS_TOTAL,
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'path', 'status'],
    }),
    makeCounterProvider({
      name: METRICS.ORDERS_TOTAL,
      help: 'Order lifecycle events',
      labelNames: ['event'],
    }),
    makeCounterProvider({
      name: METRICS.MENU_EVENTS_TOTAL,
      help: 'Menu item events',
      labelNames: ['event'],
    }),
    makeCounterProvider({
      name: METRICS.AUTH_ATTEMPTS_TOTAL,
      help: 'Login and registration attempts',
      labelNames: ['action', 'outcome'],
    }),

    // Latency histograms
    makeHistogramProvider({
      name: METRICS.HTTP_REQUEST_DURATION,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'path', 'status'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
    }),
    makeHistogramProvider({
      name: METRICS.DB_QUERY_DURATION,
      help: 'Database query duration in seconds',
      labelNames: ['operation', 'collection'],
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
    }),
    MetricsService,
    MetricsInterceptor,
  ],
  exports: [PrometheusModule, MetricsService, MetricsInterceptor],
})
export class MetricsModule {}
