import { ValidationException } from '../exceptions';

/**
 * Value Object for the number of units on an order line.
 */
export class Quantity {
  static readonly MIN = 1;
  static readonly MAX = 10;

  private constructor(public readonly value: number) {
    this.validate();
  }

  static of(value: number): Quantity {
    return new Quantity(value);
  }

  private validate(): void {
    if (typeof this.value !== 'number' || !Number.isInteger(this.value)) {
      throw new ValidationException('quantity', 'must be a whole number', 'quantity');
    }
    if (this.value < Quantity.MIN || this.value > Quantity.MAX) {
      throw new ValidationException(
        'quantity',
        `must be between ${Quantity.MIN} and ${Quantity.MAX}`,
        'quantity',
      );
    }
  }

  equals(other: Quantity): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return String(this.value);
  }
}
