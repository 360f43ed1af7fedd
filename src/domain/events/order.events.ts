import { DomainEvent } from '../common/domain-event';
import { Money } from '../value-objects/money.vo';
import { OrderStatusValue } from '../value-objects/order-status.vo';

export interface OrderCreatedEvent extends DomainEvent {
  readonly type: 'OrderCreated';
  readonly orderId: string;
  readonly customerId: string;
  readonly totalPrice: Money;
  readonly itemCount: number;
}

export interface OrderStatusChangedEvent extends DomainEvent {
  readonly type: 'OrderStatusChanged';
  readonly orderId: string;
  readonly previousStatus: OrderStatusValue;
  readonly newStatus: OrderStatusValue;
}

export interface OrderCompletedEvent extends DomainEvent {
  readonly type: 'OrderCompleted';
  readonly orderId: string;
  readonly customerId: string;
  readonly totalPrice: Money;
}

export interface OrderCancelledEvent extends DomainEvent {
  readonly type: 'OrderCancelled';
  readonly orderId: string;
  readonly reason: string | null;
}

export type OrderEvent =
  | OrderCreatedEvent
  | OrderStatusChangedEvent
  | OrderCompletedEvent
  | OrderCancelledEvent;
