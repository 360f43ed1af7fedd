import { EntityId } from '@domain/value-objects';

describe('EntityId', () => {
  it('should generate ids with the prefix of their kind', () => {
    expect(EntityId.generate('order').value).toMatch(/^ord_[0-9a-f-]{36}$/);
    expect(EntityId.generate('coffeeItem').value).toMatch(/^itm_/);
    expect(EntityId.generate('user').value).toMatch(/^usr_/);
  });

  it('should trim ids read from strings', () => {
    expect(EntityId.fromString('customer', '  cus_1 ').value).toBe('cus_1');
  });

  it('should reject empty ids', () => {
    expect(() => EntityId.fromString('barista', '   ')).toThrow(
      'Invalid barista id: cannot be empty',
    );
  });

  it('should compare by kind and value', () => {
    const a = EntityId.fromString('order', 'ord_1');

    expect(a.equals(EntityId.fromString('order', 'ord_1'))).toBe(true);
    expect(a.equals(EntityId.fromString('order', 'ord_2'))).toBe(false);
  });
});
