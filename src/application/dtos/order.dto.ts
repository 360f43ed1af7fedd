import { Order } from '@domain/entities';
import { OrderLine, OrderStatusValue } from '@domain/value-objects';

/**
 * DTOs for order use cases.
 * Prices leave the application layer as dollar amounts plus a currency code.
 */

// ============ Input DTOs ============

export interface OrderItemInputDto {
  readonly coffeeItemId: string;

  /** Units of this item, 1 to 10 */
  readonly quantity: number;

  /** Up to 200 characters, e.g. "extra hot" */
  readonly specialInstructions?: string;
}

export interface CreateOrderInputDto {
  readonly customerId: string;
  readonly items: readonly OrderItemInputDto[];
  readonly notes?: string;
}

export interface ListOrdersInputDto {
  readonly status?: string;
  readonly customerId?: string;
  readonly baristaId?: string;
}

export interface AssignBaristaInputDto {
  readonly orderId: string;
  readonly baristaId: string;
}

export interface ChangeOrderStatusInputDto {
  readonly orderId: string;
  readonly status: string;
}

export interface CancelOrderInputDto {
  readonly orderId: string;
  readonly reason?: string;
}

// ============ Output DTOs ============

export interface OrderLineOutputDto {
  readonly coffeeItemId: string;
  readonly itemName: string;
  readonly quantity: number;
  readonly unitPrice: number;
  readonly subtotal: number;
  readonly specialInstructions: string | null;
}

export interface OrderOutputDto {
  readonly id: string;
  readonly customerId: string;
  readonly baristaId: string | null;
  readonly status: OrderStatusValue;
  readonly orderDate: Date;
  readonly lines: OrderLineOutputDto[];
  readonly totalPrice: number;
  readonly currency: string;
  readonly itemCount: number;
  readonly totalQuantity: number;
  readonly notes: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date | null;
  readonly version: number;
}

const toLineOutput = (line: OrderLine): OrderLineOutputDto => ({
  coffeeItemId: line.coffeeItemId.toString(),
  itemName: line.itemName,
  quantity: line.quantity.value,
  unitPrice: line.unitPrice.dollars,
  subtotal: line.subtotal.dollars,
  specialInstructions: line.specialInstructions,
});

export const toOrderOutput = (order: Order): OrderOutputDto => ({
  id: order.id.toString(),
  customerId: order.customerId.toString(),
  baristaId: order.baristaId?.toString() ?? null,
  status: order.status.value,
  orderDate: order.orderDate,
  lines: order.lines.map(toLineOutput),
  totalPrice: order.totalPrice.dollars,
  currency: order.totalPrice.currency,
  itemCount: order.itemCount,
  totalQuantity: order.totalQuantity,
  notes: order.notes,
  createdAt: order.createdAt,
  updatedAt: order.updatedAt,
  version: order.version,
});
