import { DomainEvent } from '../common/domain-event';
import { Money } from '../value-objects/money.vo';

export interface CoffeeItemCreatedEvent extends DomainEvent {
  readonly type: 'CoffeeItemCreated';
  readonly coffeeItemId: string;
  readonly name: string;
  readonly price: Money;
}

export interface CoffeeItemPriceChangedEvent extends DomainEvent {
  readonly type: 'CoffeeItemPriceChanged';
  readonly coffeeItemId: string;
  readonly oldPrice: Money;
  readonly newPrice: Money;
}

export interface CoffeeItemAvailabilityChangedEvent extends DomainEvent {
  readonly type: 'CoffeeItemAvailabilityChanged';
  readonly coffeeItemId: string;
  readonly isAvailable: boolean;
}

export type CoffeeItemEvent =
  | CoffeeItemCreatedEvent
  | CoffeeItemPriceChangedEvent
  | CoffeeItemAvailabilityChangedEvent;
