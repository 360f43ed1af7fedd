export {
  EntityId,
  EntityKind,
  OrderId,
  CoffeeItemId,
  CategoryId,
  CustomerId,
  BaristaId,
  UserId,
} from './entity-id.vo';
export { Money } from './money.vo';
export { Quantity } from './quantity.vo';
export { OrderStatus, OrderStatusValue, ORDER_STATUS_VALUES } from './order-status.vo';
export { OrderLine } from './order-line.vo';
export { UserRole, USER_ROLES, isUserRole } from './user-role.vo';
export { Email } from './email.vo';
