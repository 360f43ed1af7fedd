import { randomUUID } from 'crypto';
import { ValidationException } from '../exceptions';

const ID_PREFIXES = {
  order: 'ord',
  coffeeItem: 'itm',
  category: 'cat',
  customer: 'cus',
  barista: 'bar',
  user: 'usr',
} as const;

export type EntityKind = keyof typeof ID_PREFIXES;

/**
 * Value Object representing the identity of an entity.
 * The kind parameter keeps an OrderId from being passed where a CustomerId is expected.
 * Immutable - once created, cannot be changed.
 */
export class EntityId<K extends EntityKind> {
  private constructor(public readonly kind: K, public readonly value: string) {
    this.validate();
  }

  // Factory method: create from existing string (e.g., from database or request)
  static fromString<K extends EntityKind>(kind: K, id: string): EntityId<K> {
    return new EntityId(kind, typeof id === 'string' ? id.trim() : '');
  }

  // Factory method: generate new unique ID
  static generate<K extends EntityKind>(kind: K): EntityId<K> {
    return new EntityId(kind, `${ID_PREFIXES[kind]}_${randomUUID()}`);
  }

  private validate(): void {
    if (!this.value || this.value.length === 0) {
      throw new ValidationException(`${this.kind} id`, 'cannot be empty', `${this.kind}Id`);
    }
  }

  equals(other: EntityId<K>): boolean {
    return this.kind === other.kind && this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}

export type OrderId = EntityId<'order'>;
export type CoffeeItemId = EntityId<'coffeeItem'>;
export type CategoryId = EntityId<'category'>;
export type CustomerId = EntityId<'customer'>;
export type BaristaId = EntityId<'barista'>;
export type UserId = EntityId<'user'>;
