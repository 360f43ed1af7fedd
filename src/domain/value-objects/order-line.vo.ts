import { ValidationException } from '../exceptions';
import { CoffeeItemId } from './entity-id.vo';
import { Money } from './money.vo';
import { Quantity } from './quantity.vo';

/**
 * Value Object representing one line of an order.
 * The unit price is a snapshot taken when the order was placed, so later
 * menu price changes never alter historical orders.
 */
export class OrderLine {
  static readonly MAX_INSTRUCTIONS_LENGTH = 200;

  private constructor(
    public readonly coffeeItemId: CoffeeItemId,
    public readonly itemName: string,
    public readonly quantity: Quantity,
    public readonly unitPrice: Money,
    public readonly specialInstructions: string | null,
  ) {
    this.validate();
  }

  static create(props: {
    coffeeItemId: CoffeeItemId;
    itemName: string;
    quantity: number;
    unitPrice: Money;
    specialInstructions?: string | null;
  }): OrderLine {
    const instructions = props.specialInstructions?.trim();
    return new OrderLine(
      props.coffeeItemId,
      typeof props.itemName === 'string' ? props.itemName.trim() : '',
      Quantity.of(props.quantity),
      props.unitPrice,
      instructions ? instructions : null,
    );
  }

  private validate(): void {
    if (this.itemName.length === 0) {
      throw new ValidationException('OrderLine', 'item name cannot be empty', 'itemName');
    }
    if (this.unitPrice.cents <= 0) {
      throw new ValidationException('OrderLine', 'unit price must be greater than 0', 'unitPrice');
    }
    if (
      this.specialInstructions !== null &&
      this.specialInstructions.length > OrderLine.MAX_INSTRUCTIONS_LENGTH
    ) {
      throw new ValidationException(
        'OrderLine',
        `special instructions must not exceed ${OrderLine.MAX_INSTRUCTIONS_LENGTH} characters`,
        'specialInstructions',
      );
    }
  }

  // unitPrice × quantity
  get subtotal(): Money {
    return this.unitPrice.multiply(this.quantity.value);
  }

  equals(other: OrderLine): boolean {
    return (
      this.coffeeItemId.equals(other.coffeeItemId) &&
      this.quantity.equals(other.quantity) &&
      this.unitPrice.equals(other.unitPrice) &&
      this.specialInstructions === other.specialInstructions
    );
  }

  toSummary(): string {
    const instructions = this.specialInstructions ? ` (${this.specialInstructions})` : '';
    return `${this.quantity.value}x ${this.itemName}${instructions} - ${this.subtotal.format()}`;
  }
}
