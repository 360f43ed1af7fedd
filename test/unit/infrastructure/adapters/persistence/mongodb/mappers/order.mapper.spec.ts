import { OrderMapper } from '@infrastructure/adapters/persistence/mongodb/mappers';
import {
  OrderDocument,
  OrderLineDocument,
} from '@infrastructure/adapters/persistence/mongodb/schemas';
import { Order } from '@domain/entities';
import { EntityId, Money, OrderLine } from '@domain/value-objects';

describe('OrderMapper', () => {
  const createOrderLineDocument = (
    overrides: Partial<{
      coffeeItemId: string;
      itemName: string;
      quantity: number;
      unitPriceCents: number;
      specialInstructions: string | null;
    }> = {},
  ): OrderLineDocument => {
    const doc = new OrderLineDocument();
    doc.coffeeItemId = overrides.coffeeItemId ?? 'itm_latte';
    doc.itemName = overrides.itemName ?? 'Caffe Latte';
    doc.quantity = overrides.quantity ?? 1;
    doc.unitPriceCents = overrides.unitPriceCents ?? 450;
    doc.currency = 'USD';
    doc.specialInstructions =
      overrides.specialInstructions === undefined ? null : overrides.specialInstructions;
    return doc;
  };

  const createOrderDocument = (
    overrides: Partial<{
      id: string;
      status: string;
      baristaId: string | null;
      lines: OrderLineDocument[];
      version: number;
    }> = {},
  ): OrderDocument => {
    const doc = new OrderDocument();
    doc._id = overrides.id ?? 'ord_test-123';
    doc.customerId = 'cus_test-123';
    doc.baristaId = overrides.baristaId === undefined ? null : overrides.baristaId;
    doc.orderDate = new Date('2024-01-01T08:00:00Z');
    doc.status = overrides.status ?? 'pending';
    doc.lines = overrides.lines ?? [createOrderLineDocument()];
    doc.notes = null;
    doc.version = overrides.version ?? 1;
    doc.createdAt = new Date('2024-01-01T08:00:00Z');
    doc.updatedAt = null;
    return doc;
  };

  describe('toDomain', () => {
    it('should convert document to domain entity', () => {
      // Arrange
      const document = createOrderDocument({
        id: 'ord_abc123',
        status: 'in_progress',
        baristaId: 'bar_1',
        version: 4,
      });

      // Act
      const order = OrderMapper.toDomain(document);

      // Assert
      expect(order.id.toString()).toBe('ord_abc123');
      expect(order.customerId.toString()).toBe('cus_test-123');
      expect(order.baristaId?.toString()).toBe('bar_1');
      expect(order.status.value).toBe('in_progress');
      expect(order.version).toBe(4);
      expect(order.updatedAt).toBeNull();
    });

    it('should rebuild lines and recompute the total', () => {
      // Arrange
      const document = createOrderDocument({
        lines: [
          createOrderLineDocument({ quantity: 2, specialInstructions: 'oat milk' }),
          createOrderLineDocument({
            coffeeItemId: 'itm_mocha',
            itemName: 'Mocha',
            unitPriceCents: 495,
          }),
        ],
      });

      // Act
      const order = OrderMapper.toDomain(document);

      // Assert
      expect(order.lines).toHaveLength(2);
      expect(order.lines[0].specialInstructions).toBe('oat milk');
      expect(order.totalPrice.cents).toBe(1395);
      expect(order.totalQuantity).toBe(3);
    });

    it('should not record events when loading', () => {
      // Act
      const order = OrderMapper.toDomain(createOrderDocument());

      // Assert
      expect(order.domainEvents).toHaveLength(0);
    });

    it('should reject a document with an unknown status', () => {
      // Arrange
      const document = createOrderDocument({ status: 'brewing' });

      // Act & Assert
      expect(() => OrderMapper.toDomain(document)).toThrow(
        'Invalid OrderStatus: "brewing" is not valid. Valid statuses: pending, in_progress, ready, completed, cancelled',
      );
    });
  });

  describe('toDocument', () => {
    it('should convert domain entity to document', () => {
      // Arrange
      const order = Order.create({
        id: EntityId.fromString('order', 'ord_new'),
        customerId: EntityId.fromString('customer', 'cus_1'),
        lines: [
          OrderLine.create({
            coffeeItemId: EntityId.fromString('coffeeItem', 'itm_latte'),
            itemName: 'Caffe Latte',
            quantity: 3,
            unitPrice: Money.fromCents(450),
            specialInstructions: 'extra hot',
          }),
        ],
        notes: 'For here',
      });

      // Act
      const document = OrderMapper.toDocument(order);

      // Assert
      expect(document._id).toBe('ord_new');
      expect(document.customerId).toBe('cus_1');
      expect(document.baristaId).toBeNull();
      expect(document.status).toBe('pending');
      expect(document.notes).toBe('For here');
      expect(document.version).toBe(0);
      expect(document.lines).toEqual([
        expect.objectContaining({
          coffeeItemId: 'itm_latte',
          itemName: 'Caffe Latte',
          quantity: 3,
          unitPriceCents: 450,
          currency: 'USD',
          specialInstructions: 'extra hot',
        }),
      ]);
    });
  });
});
