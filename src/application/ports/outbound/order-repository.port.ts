import { Order } from '@domain/entities';
import { OrderId, OrderStatusValue } from '@domain/value-objects';

export interface OrderFilters {
  readonly status?: OrderStatusValue;
  readonly customerId?: string;
  readonly baristaId?: string;
}

export interface IOrderRepositoryPort {
  /**
   * Persists an order.
   * A never-saved order (version 0) is inserted. Otherwise the stored document
   * is replaced only if its version still equals `order.version`.
   * On success the order's version is advanced.
   *
   * @throws ConcurrencyConflictError if another writer saved the order first
   */
  save(order: Order): Promise<void>;

  /**
   * Retrieves an order by its unique identifier.
   *
   * @returns the order if found, null otherwise
   */
  findById(id: OrderId): Promise<Order | null>;

  /**
   * Retrieves orders matching every given filter, newest first.
   */
  findAll(filters?: OrderFilters): Promise<Order[]>;
}
