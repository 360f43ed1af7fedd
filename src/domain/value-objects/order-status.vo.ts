import { ValidationException } from '../exceptions';

export const ORDER_STATUS_VALUES = [
  'pending',
  'in_progress',
  'ready',
  'completed',
  'cancelled',
] as const;

export type OrderStatusValue = (typeof ORDER_STATUS_VALUES)[number];

const ALLOWED_TRANSITIONS: Record<OrderStatusValue, readonly OrderStatusValue[]> = {
  pending: ['in_progress', 'cancelled'],
  in_progress: ['ready', 'cancelled'],
  ready: ['completed', 'cancelled'],
  completed: [],
  cancelled: [],
};

const isOrderStatusValue = (value: string): value is OrderStatusValue =>
  ORDER_STATUS_VALUES.some((status) => status === value);

/**
 * Value Object representing the status of an order.
 * Orders follow a specific lifecycle: pending → in_progress → ready → completed,
 * and may be cancelled before they are completed.
 */
export class OrderStatus {
  private constructor(public readonly value: OrderStatusValue) {}

  // Factory methods for each status
  static pending(): OrderStatus {
    return new OrderStatus('pending');
  }

  static inProgress(): OrderStatus {
    return new OrderStatus('in_progress');
  }

  static ready(): OrderStatus {
    return new OrderStatus('ready');
  }

  static completed(): OrderStatus {
    return new OrderStatus('completed');
  }

  static cancelled(): OrderStatus {
    return new OrderStatus('cancelled');
  }

  static all(): OrderStatus[] {
    return ORDER_STATUS_VALUES.map((value) => new OrderStatus(value));
  }

  static fromString(status: string): OrderStatus {
    const normalized = typeof status === 'string' ? status.toLowerCase().trim() : '';
    if (!isOrderStatusValue(normalized)) {
      throw new ValidationException(
        'OrderStatus',
        `"${String(status)}" is not valid. Valid statuses: ${ORDER_STATUS_VALUES.join(', ')}`,
        'status',
      );
    }
    return new OrderStatus(normalized);
  }

  // Status checks
  isPending(): boolean {
    return this.value === 'pending';
  }

  isInProgress(): boolean {
    return this.value === 'in_progress';
  }

  isReady(): boolean {
    return this.value === 'ready';
  }

  isCompleted(): boolean {
    return this.value === 'completed';
  }

  isCancelled(): boolean {
    return this.value === 'cancelled';
  }

  // No outgoing transitions
  isTerminal(): boolean {
    return ALLOWED_TRANSITIONS[this.value].length === 0;
  }

  canTransitionTo(next: OrderStatus): boolean {
    return ALLOWED_TRANSITIONS[this.value].includes(next.value);
  }

  equals(other: OrderStatus): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
