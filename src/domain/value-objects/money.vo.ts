import { ValidationException } from '../exceptions';

/**
 * Value Object representing monetary values.
 * Stores amounts in cents to avoid floating-point issues.
 * Immutable - all operations return new Money instances.
 */
export class Money {
  static readonly MAX_PRICE_DOLLARS = 10000;

  private constructor(public readonly cents: number, public readonly currency: string = 'USD') {
    this.validate();
  }

  static fromCents(cents: number, currency = 'USD'): Money {
    return new Money(Math.round(cents), currency);
  }

  static fromDollars(dollars: number, currency = 'USD'): Money {
    if (!Number.isFinite(dollars)) {
      throw new ValidationException('Money', 'amount must be a finite number');
    }
    return new Money(Math.round(dollars * 100), currency);
  }

  static zero(currency = 'USD'): Money {
    return new Money(0, currency);
  }

  /**
   * Builds a menu price: greater than zero, at most 10000 and expressed in whole cents.
   */
  static price(dollars: number, currency = 'USD'): Money {
    if (typeof dollars !== 'number' || !Number.isFinite(dollars)) {
      throw new ValidationException('price', 'must be a number', 'price');
    }
    if (dollars <= 0) {
      throw new ValidationException('price', 'must be greater than 0', 'price');
    }
    if (dollars > Money.MAX_PRICE_DOLLARS) {
      throw new ValidationException(
        'price',
        `must not exceed ${Money.MAX_PRICE_DOLLARS}`,
        'price',
      );
    }
    const cents = dollars * 100;
    if (Math.abs(cents - Math.round(cents)) > 1e-6) {
      throw new ValidationException('price', 'must not have more than two decimal places', 'price');
    }
    return new Money(Math.round(cents), currency);
  }

  private validate(): void {
    if (!Number.isInteger(this.cents) || this.cents < 0) {
      throw new ValidationException('Money', 'amount cannot be negative');
    }
    if (!this.currency || this.currency.trim().length !== 3) {
      throw new ValidationException('Money', 'currency must be a 3-letter code');
    }
  }

  // Computed property using getter syntax
  get dollars(): number {
    return this.cents / 100;
  }

  add(other: Money): Money {
    this.ensureSameCurrency(other);
    return new Money(this.cents + other.cents, this.currency);
  }

  multiply(factor: number): Money {
    return new Money(Math.round(this.cents * factor), this.currency);
  }

  private ensureSameCurrency(other: Money): void {
    if (this.currency !== other.currency) {
      throw new ValidationException(
        'Money',
        `cannot operate on different currencies: ${this.currency} vs ${other.currency}`,
      );
    }
  }

  equals(other: Money): boolean {
    return this.cents === other.cents && this.currency === other.currency;
  }

  format(): string {
    const symbol = this.currency === 'USD' ? '$' : this.currency;
    return `${symbol}${this.dollars.toFixed(2)}`;
  }

  toString(): string {
    return this.format();
  }
}
