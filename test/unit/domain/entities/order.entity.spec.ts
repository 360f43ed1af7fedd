import { Order } from '@domain/entities';
import {
  EntityId,
  Money,
  ORDER_STATUS_VALUES,
  OrderLine,
  OrderStatus,
  OrderStatusValue,
} from '@domain/value-objects';
import { InvalidStateTransitionException, ValidationException } from '@domain/exceptions';

describe('Order', () => {
  const customerId = EntityId.fromString('customer', 'cus_1');
  const baristaId = EntityId.fromString('barista', 'bar_1');

  // Helper function to create a priced line
  const createLine = (
    overrides?: Partial<{ itemId: string; itemName: string; quantity: number; cents: number }>,
  ): OrderLine =>
    OrderLine.create({
      coffeeItemId: EntityId.fromString('coffeeItem', overrides?.itemId ?? 'itm_latte'),
      itemName: overrides?.itemName ?? 'Caffe Latte',
      quantity: overrides?.quantity ?? 1,
      unitPrice: Money.fromCents(overrides?.cents ?? 450),
    });

  const createOrder = (): Order =>
    Order.create({
      customerId,
      lines: [createLine({ quantity: 2 }), createLine({ itemId: 'itm_mocha', cents: 495 })],
    });

  const orderIn = (status: OrderStatusValue): Order =>
    Order.reconstitute({
      id: EntityId.fromString('order', 'ord_1'),
      customerId,
      baristaId: status === 'pending' ? null : baristaId,
      orderDate: new Date('2024-03-01T08:00:00Z'),
      status: OrderStatus.fromString(status),
      lines: [createLine()],
      notes: null,
      createdAt: new Date('2024-03-01T08:00:00Z'),
      updatedAt: null,
      version: 3,
    });

  describe('creation', () => {
    it('should create a pending order priced from its lines', () => {
      const order = createOrder();

      expect(order.id.value).toMatch(/^ord_/);
      expect(order.status.isPending()).toBe(true);
      expect(order.baristaId).toBeNull();
      expect(order.totalPrice.cents).toBe(1395);
      expect(order.itemCount).toBe(2);
      expect(order.totalQuantity).toBe(3);
      expect(order.version).toBe(0);
      expect(order.updatedAt).toBeNull();
    });

    it('should record OrderCreated', () => {
      const order = createOrder();

      expect(order.domainEvents).toHaveLength(1);
      expect(order.domainEvents[0]).toMatchObject({
        type: 'OrderCreated',
        orderId: order.id.toString(),
        aggregateId: order.id.toString(),
        customerId: 'cus_1',
        itemCount: 2,
      });
    });

    it('should use the same timestamp for order date and creation', () => {
      const order = createOrder();

      expect(order.orderDate).toBe(order.createdAt);
    });

    it('should reject an order without lines', () => {
      expect(() => Order.create({ customerId, lines: [] })).toThrow(
        'Invalid Order: must have at least one line',
      );
    });

    it('should reject notes over 1000 characters', () => {
      const notes = 'n'.repeat(1001);

      expect(() => Order.create({ customerId, lines: [createLine()], notes })).toThrow(
        ValidationException,
      );
    });

    it('should store blank notes as null', () => {
      const order = Order.create({ customerId, lines: [createLine()], notes: '   ' });

      expect(order.notes).toBeNull();
    });

    it('should not record events when reconstituted', () => {
      const order = orderIn('ready');

      expect(order.domainEvents).toHaveLength(0);
      expect(order.version).toBe(3);
    });
  });

  describe('recalculateTotalPrice', () => {
    it('should keep the total equal to the sum of line subtotals', () => {
      // Arrange
      const order = createOrder();

      // Act
      order.recalculateTotalPrice();
      order.recalculateTotalPrice();

      // Assert
      expect(order.totalPrice.cents).toBe(1395);
      expect(order.domainEvents).toHaveLength(1);
    });
  });

  describe('changeStatus', () => {
    const allowed: Record<OrderStatusValue, OrderStatusValue[]> = {
      pending: ['in_progress', 'cancelled'],
      in_progress: ['ready', 'cancelled'],
      ready: ['completed', 'cancelled'],
      completed: [],
      cancelled: [],
    };
    const pairs = ORDER_STATUS_VALUES.flatMap((from) =>
      ORDER_STATUS_VALUES.map((to): [OrderStatusValue, OrderStatusValue] => [from, to]),
    );

    it.each(pairs)('%s -> %s', (from, to) => {
      const order = orderIn(from);

      if (from === to) {
        order.changeStatus(OrderStatus.fromString(to));
        expect(order.status.value).toBe(from);
        expect(order.domainEvents).toHaveLength(0);
        expect(order.updatedAt).toBeNull();
      } else if (allowed[from].includes(to)) {
        order.changeStatus(OrderStatus.fromString(to));
        expect(order.status.value).toBe(to);
        expect(order.domainEvents[0]).toMatchObject({
          type: 'OrderStatusChanged',
          previousStatus: from,
          newStatus: to,
        });
        expect(order.updatedAt).toBeInstanceOf(Date);
      } else {
        expect(() => order.changeStatus(OrderStatus.fromString(to))).toThrow(
          `Cannot transition from ${from} to ${to}`,
        );
        expect(order.status.value).toBe(from);
        expect(order.domainEvents).toHaveLength(0);
      }
    });

    it('should record OrderCompleted after the status change on completion', () => {
      const order = orderIn('ready');

      order.changeStatus(OrderStatus.completed());

      expect(order.domainEvents.map((event) => event.type)).toEqual([
        'OrderStatusChanged',
        'OrderCompleted',
      ]);
      expect(order.domainEvents[1]).toMatchObject({ customerId: 'cus_1' });
    });
  });

  describe('assignBarista', () => {
    it('should assign the barista and start preparation', () => {
      const order = orderIn('pending');

      order.assignBarista(baristaId);

      expect(order.baristaId?.value).toBe('bar_1');
      expect(order.status.isInProgress()).toBe(true);
      expect(order.domainEvents).toHaveLength(1);
      expect(order.domainEvents[0]).toMatchObject({
        type: 'OrderStatusChanged',
        previousStatus: 'pending',
        newStatus: 'in_progress',
      });
    });

    it.each<OrderStatusValue>(['in_progress', 'ready', 'completed', 'cancelled'])(
      'should refuse an order that is %s',
      (status) => {
        const order = orderIn(status);
        const other = EntityId.fromString('barista', 'bar_2');

        expect(() => order.assignBarista(other)).toThrow(
          `Can only assign a barista to pending orders (current status: ${status})`,
        );
        expect(order.baristaId?.value).toBe('bar_1');
      },
    );
  });

  describe('markAsReady and complete', () => {
    it('should walk an order from in progress to completed', () => {
      const order = orderIn('in_progress');

      order.markAsReady();
      order.complete();

      expect(order.status.isCompleted()).toBe(true);
      expect(order.isTerminal).toBe(true);
      expect(order.domainEvents.map((event) => event.type)).toEqual([
        'OrderStatusChanged',
        'OrderStatusChanged',
        'OrderCompleted',
      ]);
    });

    it('should refuse to mark a pending order as ready', () => {
      expect(() => orderIn('pending').markAsReady()).toThrow(
        'Only in-progress orders can be marked as ready (current status: pending)',
      );
    });

    it('should refuse to complete an order that is not ready', () => {
      expect(() => orderIn('in_progress').complete()).toThrow(
        'Only ready orders can be completed (current status: in_progress)',
      );
    });

    it('should refuse to mark a ready order as ready again', () => {
      expect(() => orderIn('ready').markAsReady()).toThrow(InvalidStateTransitionException);
    });
  });

  describe('cancel', () => {
    it.each<OrderStatusValue>(['pending', 'in_progress', 'ready'])(
      'should cancel an order that is %s',
      (status) => {
        const order = orderIn(status);

        order.cancel('  customer left  ');

        expect(order.status.isCancelled()).toBe(true);
        expect(order.domainEvents).toHaveLength(1);
        expect(order.domainEvents[0]).toMatchObject({
          type: 'OrderCancelled',
          orderId: 'ord_1',
          reason: 'customer left',
        });
      },
    );

    it('should record a null reason when none is given', () => {
      const order = orderIn('pending');

      order.cancel();

      expect(order.domainEvents[0]).toMatchObject({ type: 'OrderCancelled', reason: null });
    });

    it('should do nothing when the order is already cancelled', () => {
      const order = orderIn('cancelled');

      order.cancel('again');

      expect(order.domainEvents).toHaveLength(0);
      expect(order.updatedAt).toBeNull();
    });

    it('should refuse to cancel a completed order', () => {
      const order = orderIn('completed');

      expect(() => order.cancel()).toThrow('Cannot cancel a completed order');
      expect(order.status.isCompleted()).toBe(true);
    });
  });

  describe('domain events', () => {
    it('should hand out copies of the pending events', () => {
      const order = createOrder();
      const snapshot = order.domainEvents;

      order.assignBarista(baristaId);

      expect(snapshot).toHaveLength(1);
      expect(order.domainEvents).toHaveLength(2);
    });

    it('should empty the queue when events are pulled', () => {
      const order = createOrder();

      const pulled = order.pullDomainEvents();

      expect(pulled.map((event) => event.type)).toEqual(['OrderCreated']);
      expect(order.domainEvents).toHaveLength(0);
    });

    it('should freeze recorded events', () => {
      const [event] = createOrder().pullDomainEvents();

      expect(Object.isFrozen(event)).toBe(true);
    });
  });

  describe('persistence version', () => {
    it('should move the version forward only', () => {
      const order = orderIn('pending');

      order.markPersisted(4);

      expect(order.version).toBe(4);
      expect(() => order.markPersisted(4)).toThrow(RangeError);
    });
  });

  it('should summarize its lines and total', () => {
    const order = orderIn('pending');

    expect(order.toSummary()).toBe(
      'Order ord_1 [pending]:\n1x Caffe Latte - $4.50\nTotal: $4.50',
    );
  });
});
