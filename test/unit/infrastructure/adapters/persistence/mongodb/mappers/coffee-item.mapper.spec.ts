import { CoffeeItemMapper } from '@infrastructure/adapters/persistence/mongodb/mappers';
import { CoffeeItemDocument } from '@infrastructure/adapters/persistence/mongodb/schemas';
import { CoffeeItem } from '@domain/entities';
import { EntityId } from '@domain/value-objects';

describe('CoffeeItemMapper', () => {
  const createCoffeeItemDocument = (): CoffeeItemDocument => {
    const doc = new CoffeeItemDocument();
    doc._id = 'itm_mocha';
    doc.name = 'Mocha';
    doc.normalizedName = 'mocha';
    doc.description = 'Espresso, chocolate and steamed milk';
    doc.priceCents = 495;
    doc.currency = 'USD';
    doc.isAvailable = false;
    doc.categoryId = 'cat_espresso';
    doc.imageUrl = null;
    doc.version = 7;
    doc.createdAt = new Date('2024-01-01');
    doc.updatedAt = new Date('2024-02-01');
    return doc;
  };

  describe('toDomain', () => {
    it('should convert document to domain entity', () => {
      // Act
      const item = CoffeeItemMapper.toDomain(createCoffeeItemDocument());

      // Assert
      expect(item.id.toString()).toBe('itm_mocha');
      expect(item.price.dollars).toBe(4.95);
      expect(item.isAvailable).toBe(false);
      expect(item.categoryId.toString()).toBe('cat_espresso');
      expect(item.version).toBe(7);
      expect(item.domainEvents).toHaveLength(0);
    });
  });

  describe('toDocument', () => {
    it('should store price in cents and a lower-cased name', () => {
      // Arrange
      const item = CoffeeItem.create({
        id: EntityId.fromString('coffeeItem', 'itm_cold'),
        name: '  Cold Brew ',
        description: 'Steeped for 20 hours',
        price: 4.75,
        categoryId: EntityId.fromString('category', 'cat_cold'),
      });

      // Act
      const document = CoffeeItemMapper.toDocument(item);

      // Assert
      expect(document.priceCents).toBe(475);
      expect(document.currency).toBe('USD');
      expect(document.normalizedName).toBe('cold brew');
      expect(document.imageUrl).toBeNull();
      expect(document.version).toBe(0);
    });
  });
});
