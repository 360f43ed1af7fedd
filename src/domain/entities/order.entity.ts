import { DomainEventBuffer, EntityMetadata, optionalText } from '../common';
import { OrderEvent } from '../events';
import { InvalidStateTransitionException, ValidationException } from '../exceptions';
import {
  BaristaId,
  CustomerId,
  EntityId,
  Money,
  OrderId,
  OrderLine,
  OrderStatus,
} from '../value-objects';

/**
 * Entity representing a customer order.
 * Aggregate root - owns its OrderLines and the status lifecycle.
 *
 * Status changes follow the table in OrderStatus. Cancellation is its own rule:
 * allowed from any status except completed, and a no-op once cancelled.
 */
export class Order {
  static readonly MAX_NOTES_LENGTH = 1000;

  private readonly events = new DomainEventBuffer<OrderEvent>();
  private _totalPrice: Money;

  private constructor(
    private readonly meta: EntityMetadata<'order'>,
    public readonly customerId: CustomerId,
    private _baristaId: BaristaId | null,
    public readonly orderDate: Date,
    private _status: OrderStatus,
    private readonly _lines: readonly OrderLine[],
    public readonly notes: string | null,
  ) {
    this._totalPrice = Order.sumLines(_lines);
  }

  // Factory method: place a new order from already-priced lines
  static create(props: {
    id?: OrderId;
    customerId: CustomerId;
    lines: readonly OrderLine[];
    notes?: string | null;
  }): Order {
    if (!props.customerId || props.customerId.value.trim().length === 0) {
      throw new ValidationException('Order', 'customer id cannot be empty', 'customerId');
    }
    if (!Array.isArray(props.lines) || props.lines.length === 0) {
      throw new ValidationException('Order', 'must have at least one line', 'lines');
    }
    const notes = optionalText('Order', 'notes', props.notes, Order.MAX_NOTES_LENGTH);

    const now = new Date();
    const order = new Order(
      EntityMetadata.create(props.id ?? EntityId.generate('order'), now),
      props.customerId,
      null,
      now,
      OrderStatus.pending(),
      [...props.lines],
      notes,
    );

    order.events.record({
      type: 'OrderCreated',
      aggregateId: order.id.toString(),
      occurredOn: now,
      orderId: order.id.toString(),
      customerId: order.customerId.toString(),
      totalPrice: order.totalPrice,
      itemCount: order._lines.length,
    });

    return order;
  }

  // Factory method: reconstitute from persistence
  static reconstitute(props: {
    id: OrderId;
    customerId: CustomerId;
    baristaId: BaristaId | null;
    orderDate: Date;
    status: OrderStatus;
    lines: readonly OrderLine[];
    notes: string | null;
    createdAt: Date;
    updatedAt: Date | null;
    version: number;
  }): Order {
    return new Order(
      EntityMetadata.reconstitute({
        id: props.id,
        createdAt: props.createdAt,
        updatedAt: props.updatedAt,
        version: props.version,
      }),
      props.customerId,
      props.baristaId,
      props.orderDate,
      props.status,
      [...props.lines],
      props.notes,
    );
  }

  // Getters for encapsulated properties
  get id(): OrderId {
    return this.meta.id;
  }

  get baristaId(): BaristaId | null {
    return this._baristaId;
  }

  get status(): OrderStatus {
    return this._status;
  }

  get lines(): readonly OrderLine[] {
    return [...this._lines];
  }

  get totalPrice(): Money {
    return this._totalPrice;
  }

  get itemCount(): number {
    return this._lines.length;
  }

  get totalQuantity(): number {
    return this._lines.reduce((total, line) => total + line.quantity.value, 0);
  }

  get createdAt(): Date {
    return this.meta.createdAt;
  }

  get updatedAt(): Date | null {
    return this.meta.updatedAt;
  }

  get version(): number {
    return this.meta.version;
  }

  get isTerminal(): boolean {
    return this._status.isTerminal();
  }

  get domainEvents(): readonly OrderEvent[] {
    return this.events.peek();
  }

  clearDomainEvents(): void {
    this.events.clear();
  }

  pullDomainEvents(): OrderEvent[] {
    return this.events.drain();
  }

  markPersisted(version: number): void {
    this.meta.markPersisted(version);
  }

  /**
   * Assigns the barista and starts preparation in one step.
   * Only pending orders accept a barista.
   */
  assignBarista(baristaId: BaristaId): void {
    if (!this._status.isPending()) {
      throw new InvalidStateTransitionException(
        this._status.value,
        'in_progress',
        `Can only assign a barista to pending orders (current status: ${this._status.value})`,
      );
    }

    this._baristaId = baristaId;
    this.changeStatus(OrderStatus.inProgress());
  }

  changeStatus(newStatus: OrderStatus): void {
    if (this._status.equals(newStatus)) {
      return;
    }
    if (!this._status.canTransitionTo(newStatus)) {
      throw new InvalidStateTransitionException(this._status.value, newStatus.value);
    }

    const previousStatus = this._status;
    this._status = newStatus;
    this.meta.touch();

    this.events.record({
      type: 'OrderStatusChanged',
      aggregateId: this.id.toString(),
      occurredOn: new Date(),
      orderId: this.id.toString(),
      previousStatus: previousStatus.value,
      newStatus: newStatus.value,
    });

    if (newStatus.isCompleted()) {
      this.events.record({
        type: 'OrderCompleted',
        aggregateId: this.id.toString(),
        occurredOn: new Date(),
        orderId: this.id.toString(),
        customerId: this.customerId.toString(),
        totalPrice: this._totalPrice,
      });
    }
  }

  markAsReady(): void {
    if (!this._status.isInProgress()) {
      throw new InvalidStateTransitionException(
        this._status.value,
        'ready',
        `Only in-progress orders can be marked as ready (current status: ${this._status.value})`,
      );
    }
    this.changeStatus(OrderStatus.ready());
  }

  complete(): void {
    if (!this._status.isReady()) {
      throw new InvalidStateTransitionException(
        this._status.value,
        'completed',
        `Only ready orders can be completed (current status: ${this._status.value})`,
      );
    }
    this.changeStatus(OrderStatus.completed());
  }

  cancel(reason?: string | null): void {
    if (this._status.isCompleted()) {
      throw new InvalidStateTransitionException(
        this._status.value,
        'cancelled',
        'Cannot cancel a completed order',
      );
    }
    if (this._status.isCancelled()) {
      return;
    }

    this._status = OrderStatus.cancelled();
    this.meta.touch();

    const trimmedReason = reason?.trim();
    this.events.record({
      type: 'OrderCancelled',
      aggregateId: this.id.toString(),
      occurredOn: new Date(),
      orderId: this.id.toString(),
      reason: trimmedReason ? trimmedReason : null,
    });
  }

  // Idempotent, records no event
  recalculateTotalPrice(): void {
    this._totalPrice = Order.sumLines(this._lines);
  }

  // Entity equality
  equals(other: Order): boolean {
    return this.id.equals(other.id);
  }

  toSummary(): string {
    const linesSummary = this._lines.map((line) => line.toSummary()).join('\n');
    const header = `Order ${this.id.toString()} [${this._status.value}]:`;
    return `${header}\n${linesSummary}\nTotal: ${this._totalPrice.format()}`;
  }

  private static sumLines(lines: readonly OrderLine[]): Money {
    if (lines.length === 0) {
      return Money.zero();
    }
    return lines.reduce(
      (total, line) => total.add(line.subtotal),
      Money.zero(lines[0].unitPrice.currency),
    );
  }
}
