import { CoffeeItem } from '@domain/entities';
import { CoffeeItemId } from '@domain/value-objects';

export interface CoffeeItemFilters {
  /** When true, items switched off are left out */
  readonly availableOnly?: boolean;
  readonly categoryId?: string;
}

export interface ICoffeeItemRepositoryPort {
  /**
   * Persists a menu item with the same optimistic version check as orders.
   *
   * @throws ConcurrencyConflictError if the stored version moved on
   */
  save(item: CoffeeItem): Promise<void>;

  findById(id: CoffeeItemId): Promise<CoffeeItem | null>;

  /**
   * Loads several items at once. Unknown ids are simply absent from the result.
   */
  findByIds(ids: readonly CoffeeItemId[]): Promise<CoffeeItem[]>;

  /**
   * Lists items sorted by name.
   */
  findAll(filters?: CoffeeItemFilters): Promise<CoffeeItem[]>;

  /**
   * Case-insensitive name lookup, used to keep menu names unique.
   */
  existsByName(name: string): Promise<boolean>;

  count(): Promise<number>;

  deleteAll(): Promise<void>;
}
