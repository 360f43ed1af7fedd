import { CoffeeItem } from '@domain/entities';
import { EntityId, Money } from '@domain/value-objects';
import { CoffeeItemDocument } from '../schemas';

/**
 * Mapper for converting between the CoffeeItem aggregate and its MongoDB document.
 */
export class CoffeeItemMapper {
  static toDomain(document: CoffeeItemDocument): CoffeeItem {
    return CoffeeItem.reconstitute({
      id: EntityId.fromString('coffeeItem', document._id),
      name: document.name,
      description: document.description,
      price: Money.fromCents(document.priceCents, document.currency),
      isAvailable: document.isAvailable,
      categoryId: EntityId.fromString('category', document.categoryId),
      imageUrl: document.imageUrl ?? null,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt ?? null,
      version: document.version,
    });
  }

  static toDocument(item: CoffeeItem): CoffeeItemDocument {
    const document = new CoffeeItemDocument();
    document._id = item.id.toString();
    document.name = item.name;
    document.normalizedName = CoffeeItemMapper.normalizeName(item.name);
    document.description = item.description;
    document.priceCents = item.price.cents;
    document.currency = item.price.currency;
    document.isAvailable = item.isAvailable;
    document.categoryId = item.categoryId.toString();
    document.imageUrl = item.imageUrl;
    document.version = item.version;
    document.createdAt = item.createdAt;
    document.updatedAt = item.updatedAt;
    return document;
  }

  static normalizeName(name: string): string {
    return name.trim().toLowerCase();
  }
}
