export { MetricsModule } from './metrics.module';
export { MetricsService, OrderMetricEvent, MenuMetricEvent } from './metrics.service';
export { MetricsInterceptor } from './metrics.interceptor';
export { METRICS } from './metrics.constants';
