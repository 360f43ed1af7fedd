import { Injectable } from '@nestjs/common';
import { PinoLogger, InjectPinoLogger } from 'nestjs-pino';
import { DomainEvent } from '@domain/common';

/**
 * Structured log helpers on top of the request-scoped pino logger.
 * Each entry carries a `component` field so logs can be filtered by concern.
 */
@Injectable()
export class AppLoggerService {
  constructor(
    @InjectPinoLogger(AppLoggerService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Logs a dispatched domain event. Money values are flattened to their formatted text.
   */
  logDomainEvent(event: DomainEvent): void {
    this.logger.info(
      {
        component: 'domain',
        eventType: event.type,
        aggregateId: event.aggregateId,
        occurredOn: event.occurredOn.toISOString(),
        payload: AppLoggerService.flatten(event),
      },
      `${event.type} on ${event.aggregateId}`,
    );
  }

  logDBOperation(context: {
    operation: 'find' | 'save' | 'update' | 'delete';
    collection: string;
    durationMs: number;
    success: boolean;
    error?: string;
  }): void {
    const logData = {
      component: 'database',
      ...context,
    };

    if (context.success) {
      this.logger.debug(logData, `DB ${context.operation} on ${context.collection}`);
    } else {
      this.logger.error(logData, `DB ${context.operation} failed on ${context.collection}`);
    }
  }

  logAuthEvent(context: {
    action: 'register' | 'login' | 'token_rejected';
    success: boolean;
    email?: string;
    userId?: string;
    reason?: string;
  }): void {
    const logData = {
      component: 'auth',
      ...context,
    };

    if (context.success) {
      this.logger.info(logData, `Auth ${context.action} succeeded`);
    } else {
      this.logger.warn(logData, `Auth ${context.action} failed`);
    }
  }

  private static flatten(event: DomainEvent): Record<string, unknown> {
    const payload: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(event)) {
      if (key === 'type' || key === 'aggregateId' || key === 'occurredOn') {
        continue;
      }
      payload[key] =
        typeof value === 'object' && value !== null && !Array.isArray(value)
          ? String(value)
          : value;
    }
    return payload;
  }
}
