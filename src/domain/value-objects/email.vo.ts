import { ValidationException } from '../exceptions';

/**
 * Value Object for an e-mail address, stored lower-cased.
 */
export class Email {
  private static readonly PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  static readonly MAX_LENGTH = 256;

  private constructor(public readonly value: string) {
    this.validate();
  }

  static fromString(email: string): Email {
    return new Email(typeof email === 'string' ? email.trim().toLowerCase() : '');
  }

  private validate(): void {
    if (this.value.length === 0) {
      throw new ValidationException('email', 'cannot be empty', 'email');
    }
    if (this.value.length > Email.MAX_LENGTH || !Email.PATTERN.test(this.value)) {
      throw new ValidationException('email', `"${this.value}" is not a valid address`, 'email');
    }
  }

  equals(other: Email): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
