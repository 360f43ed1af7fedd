export {
  CoffeeItemCreatedEvent,
  CoffeeItemPriceChangedEvent,
  CoffeeItemAvailabilityChangedEvent,
  CoffeeItemEvent,
} from './coffee-item.events';
export {
  OrderCreatedEvent,
  OrderStatusChangedEvent,
  OrderCompletedEvent,
  OrderCancelledEvent,
  OrderEvent,
} from './order.events';
