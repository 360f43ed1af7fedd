import { Order } from '@domain/entities';
import { EntityId, Money, OrderLine, OrderStatus } from '@domain/value-objects';
import { OrderDocument, OrderLineDocument } from '../schemas';

/**
 * Mapper for converting between the Order aggregate and its MongoDB document.
 * Money is stored as integer cents plus currency.
 */
export class OrderMapper {
  /**
   * Converts a MongoDB document to a domain Order.
   * Reconstitution records no events.
   */
  static toDomain(document: OrderDocument): Order {
    return Order.reconstitute({
      id: EntityId.fromString('order', document._id),
      customerId: EntityId.fromString('customer', document.customerId),
      baristaId: document.baristaId ? EntityId.fromString('barista', document.baristaId) : null,
      orderDate: document.orderDate,
      status: OrderStatus.fromString(document.status),
      lines: document.lines.map((line) => this.lineToDomain(line)),
      notes: document.notes ?? null,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt ?? null,
      version: document.version,
    });
  }

  /**
   * Converts a domain Order to a MongoDB document carrying the order's current version.
   */
  static toDocument(order: Order): OrderDocument {
    const document = new OrderDocument();
    document._id = order.id.toString();
    document.customerId = order.customerId.toString();
    document.baristaId = order.baristaId?.toString() ?? null;
    document.orderDate = order.orderDate;
    document.status = order.status.toString();
    document.lines = order.lines.map((line) => this.lineToDocument(line));
    document.notes = order.notes;
    document.version = order.version;
    document.createdAt = order.createdAt;
    document.updatedAt = order.updatedAt;
    return document;
  }

  private static lineToDomain(document: OrderLineDocument): OrderLine {
    return OrderLine.create({
      coffeeItemId: EntityId.fromString('coffeeItem', document.coffeeItemId),
      itemName: document.itemName,
      quantity: document.quantity,
      unitPrice: Money.fromCents(document.unitPriceCents, document.currency),
      specialInstructions: document.specialInstructions,
    });
  }

  private static lineToDocument(line: OrderLine): OrderLineDocument {
    const document = new OrderLineDocument();
    document.coffeeItemId = line.coffeeItemId.toString();
    document.itemName = line.itemName;
    document.quantity = line.quantity.value;
    document.unitPriceCents = line.unitPrice.cents;
    document.currency = line.unitPrice.currency;
    document.specialInstructions = line.specialInstructions;
    return document;
  }
}
