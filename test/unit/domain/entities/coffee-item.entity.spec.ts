import { CoffeeItem } from '@domain/entities';
import { EntityId, Money } from '@domain/value-objects';
import { ValidationException } from '@domain/exceptions';

describe('CoffeeItem', () => {
  const categoryId = EntityId.fromString('category', 'cat_espresso');

  const createItem = (): CoffeeItem => {
    const item = CoffeeItem.create({
      name: 'Flat White',
      description: 'Ristretto with steamed milk',
      price: 4.75,
      categoryId,
    });
    item.clearDomainEvents();
    return item;
  };

  describe('creation', () => {
    it('should create an available item', () => {
      const item = CoffeeItem.create({
        name: 'Flat White',
        description: 'Ristretto with steamed milk',
        price: 4.75,
        categoryId,
      });

      expect(item.id.value).toMatch(/^itm_/);
      expect(item.isAvailable).toBe(true);
      expect(item.price.cents).toBe(475);
      expect(item.imageUrl).toBeNull();
      expect(item.version).toBe(0);
      expect(item.domainEvents[0]).toMatchObject({
        type: 'CoffeeItemCreated',
        coffeeItemId: item.id.toString(),
        name: 'Flat White',
      });
    });

    it('should reject an empty name', () => {
      expect(() =>
        CoffeeItem.create({ name: '  ', description: 'x', price: 1, categoryId }),
      ).toThrow('Invalid CoffeeItem: name cannot be empty');
    });

    it('should reject a description over 500 characters', () => {
      expect(() =>
        CoffeeItem.create({ name: 'Mocha', description: 'd'.repeat(501), price: 1, categoryId }),
      ).toThrow('Invalid CoffeeItem: description must not exceed 500 characters');
    });

    it('should reject an invalid price', () => {
      expect(() =>
        CoffeeItem.create({ name: 'Mocha', description: 'Chocolate', price: 0, categoryId }),
      ).toThrow(ValidationException);
    });
  });

  describe('changePrice', () => {
    it('should record the old and new price', () => {
      const item = createItem();

      item.changePrice(5.25);

      expect(item.price.cents).toBe(525);
      expect(item.domainEvents).toHaveLength(1);
      const [event] = item.domainEvents;
      expect(event.type).toBe('CoffeeItemPriceChanged');
      expect(event).toMatchObject({
        oldPrice: Money.fromCents(475),
        newPrice: Money.fromCents(525),
      });
      expect(item.updatedAt).toBeInstanceOf(Date);
    });

    it('should do nothing when the price is unchanged', () => {
      const item = createItem();

      item.changePrice(4.75);

      expect(item.domainEvents).toHaveLength(0);
      expect(item.updatedAt).toBeNull();
    });

    it('should leave the price untouched when the new one is invalid', () => {
      const item = createItem();

      expect(() => item.changePrice(-2)).toThrow('Invalid price: must be greater than 0');
      expect(item.price.cents).toBe(475);
      expect(item.domainEvents).toHaveLength(0);
    });
  });

  describe('setAvailability', () => {
    it('should record the availability change', () => {
      const item = createItem();

      item.setAvailability(false);

      expect(item.isAvailable).toBe(false);
      expect(item.domainEvents[0]).toMatchObject({
        type: 'CoffeeItemAvailabilityChanged',
        isAvailable: false,
      });
    });

    it('should do nothing when availability is unchanged', () => {
      const item = createItem();

      item.setAvailability(true);

      expect(item.domainEvents).toHaveLength(0);
    });
  });

  describe('updateDetails', () => {
    it('should replace name and description without an event when the price stays', () => {
      const item = createItem();

      item.updateDetails('Flat White XL', 'Three ristretto shots', 4.75);

      expect(item.name).toBe('Flat White XL');
      expect(item.description).toBe('Three ristretto shots');
      expect(item.domainEvents).toHaveLength(0);
      expect(item.updatedAt).toBeInstanceOf(Date);
    });

    it('should record a price change', () => {
      const item = createItem();

      item.updateDetails('Flat White', 'Ristretto with steamed milk', 5);

      expect(item.domainEvents.map((event) => event.type)).toEqual(['CoffeeItemPriceChanged']);
    });

    it('should change nothing when one field is invalid', () => {
      const item = createItem();

      expect(() => item.updateDetails('New name', '', 6)).toThrow(
        'Invalid CoffeeItem: description cannot be empty',
      );
      expect(item.name).toBe('Flat White');
      expect(item.price.cents).toBe(475);
    });
  });

  describe('category and image', () => {
    it('should move the item to another category', () => {
      const item = createItem();
      const other = EntityId.fromString('category', 'cat_cold');

      item.changeCategory(other);

      expect(item.categoryId.equals(other)).toBe(true);
    });

    it('should clear the image with null', () => {
      const item = CoffeeItem.create({
        name: 'Mocha',
        description: 'Chocolate and espresso',
        price: 4.95,
        categoryId,
        imageUrl: 'https://cdn.example.com/mocha.png',
      });

      item.changeImage(null);

      expect(item.imageUrl).toBeNull();
    });
  });

  it('should describe itself, flagging unavailable items', () => {
    const item = createItem();
    item.setAvailability(false);

    expect(item.toSummary()).toBe('Flat White: Ristretto with steamed milk $4.75 (unavailable)');
  });
});
