import {
  CoffeeItemUnavailableException,
  InvalidStateTransitionException,
  ValidationException,
} from '@domain/exceptions';
import {
  ApplicationError,
  CoffeeItemUnavailableError,
  InvalidOrderStateError,
  UnexpectedError,
  ValidationError,
} from './application.errors';

/**
 * Translates anything a use case caught into an ApplicationError.
 * Application errors (including ConcurrencyConflictError raised by repositories) pass through.
 */
export const toApplicationError = (error: unknown, orderId?: string): ApplicationError => {
  if (error instanceof ApplicationError) {
    return error;
  }
  if (error instanceof ValidationException) {
    return new ValidationError(error.message, error.field);
  }
  if (error instanceof InvalidStateTransitionException) {
    return new InvalidOrderStateError(orderId ?? 'unknown', error.from, error.message);
  }
  if (error instanceof CoffeeItemUnavailableException) {
    return new CoffeeItemUnavailableError(error.message);
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  return new UnexpectedError(message);
};
