import { Injectable } from '@nestjs/common';
import { AppLoggerService } from '../../../observability/logging/app-logger.service';
import { MetricsService } from '../../../observability/metrics/metrics.service';

export type DbOperation = 'find' | 'save' | 'update' | 'delete';

/**
 * Times repository calls into db_query_duration_seconds and the database log.
 */
@Injectable()
export class DbOperationTracker {
  constructor(
    private readonly appLogger: AppLoggerService,
    private readonly metricsService: MetricsService,
  ) {}

  async track<T>(operation: DbOperation, collection: string, fn: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await fn();
      this.record(operation, collection, startedAt);
      return result;
    } catch (error) {
      this.record(operation, collection, startedAt, error);
      throw error;
    }
  }

  private record(
    operation: DbOperation,
    collection: string,
    startedAt: number,
    error?: unknown,
  ): void {
    const durationMs = Date.now() - startedAt;
    this.metricsService.recordDBQuery(operation, collection, durationMs / 1000);
    this.appLogger.logDBOperation({
      operation,
      collection,
      durationMs,
      success: error === undefined,
      error: error instanceof Error ? error.message : undefined,
    });
  }
}

// E11000: a unique index rejected the write
export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;

// True when the rejecting unique index covers the given field
export const isDuplicateKeyOn = (error: unknown, field: string): boolean =>
  isDuplicateKeyError(error) &&
  typeof error === 'object' &&
  error !== null &&
  'keyPattern' in error &&
  typeof error.keyPattern === 'object' &&
  error.keyPattern !== null &&
  field in error.keyPattern;
