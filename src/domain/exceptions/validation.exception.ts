import { DomainException } from './domain.exception';

/**
 * Thrown when a factory or mutator receives malformed input.
 * Examples: empty name, price out of range, oversized notes.
 */
export class ValidationException extends DomainException {
  constructor(subject: string, reason: string, public readonly field?: string) {
    super(`Invalid ${subject}: ${reason}`, 'VALIDATION_ERROR');
  }
}
