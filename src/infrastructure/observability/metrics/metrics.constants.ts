/**
 * Prometheus metric names used throughout the application.
 */
export const METRICS = {
  // Counters
  HTTP_REQUESTS_TOTAL: 'http_requests_total',
  ORDERS_TOTAL: 'orders_total',
  MENU_EVENTS_TOTAL: 'menu_events_total',
  AUTH_ATTEMPTS_TOTAL: 'auth_attempts_total',

  // Histograms (latency)
  HTTP_REQUEST_DURATION: 'http_request_duration_seconds',
  DB_QUERY_DURATION: 'db_query_duration_seconds',
} as const;
