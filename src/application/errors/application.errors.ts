/**
 * Base class for all application-level errors.
 * These errors represent failures in use case execution; domain rule
 * violations are translated into them at the use case boundary.
 */
export abstract class ApplicationError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): { code: string; message: string; name: string } {
    return {
      code: this.code,
      message: this.message,
      name: this.name,
    };
  }
}

// ============ Order Errors ============

export class OrderNotFoundError extends ApplicationError {
  readonly code = 'ORDER_NOT_FOUND';
  readonly statusCode = 404;

  constructor(orderId: string) {
    super(`Order with ID '${orderId}' not found`);
  }
}

export class InvalidOrderStateError extends ApplicationError {
  readonly code = 'INVALID_STATE_TRANSITION';
  readonly statusCode = 409;

  constructor(orderId: string, public readonly currentState: string, reason: string) {
    super(`Order '${orderId}' (${currentState}): ${reason}`);
  }
}

// ============ Persistence Errors ============

export class ConcurrencyConflictError extends ApplicationError {
  readonly code = 'CONCURRENCY_CONFLICT';
  readonly statusCode = 409;

  constructor(
    public readonly entity: string,
    public readonly entityId: string,
    public readonly expectedVersion: number,
  ) {
    super(
      `${entity} '${entityId}' was modified by another request (expected version ${expectedVersion}). Reload and try again.`,
    );
  }
}

// ============ Menu Errors ============

export class CoffeeItemNotFoundError extends ApplicationError {
  readonly code = 'COFFEE_ITEM_NOT_FOUND';
  readonly statusCode = 404;

  constructor(identifier: string) {
    super(`Coffee item '${identifier}' not found`);
  }
}

export class CoffeeItemUnavailableError extends ApplicationError {
  readonly code = 'COFFEE_ITEM_UNAVAILABLE';
  readonly statusCode = 400;

  constructor(reason: string) {
    super(reason);
  }
}

export class CategoryNotFoundError extends ApplicationError {
  readonly code = 'CATEGORY_NOT_FOUND';
  readonly statusCode = 404;

  constructor(categoryId: string) {
    super(`Category '${categoryId}' not found`);
  }
}

export class DuplicateNameError extends ApplicationError {
  readonly code = 'DUPLICATE_NAME';
  readonly statusCode = 409;

  constructor(entity: string, name: string) {
    super(`${entity} named '${name}' already exists`);
  }
}

// ============ People Errors ============

export class CustomerNotFoundError extends ApplicationError {
  readonly code = 'CUSTOMER_NOT_FOUND';
  readonly statusCode = 404;

  constructor(customerId: string) {
    super(`Customer '${customerId}' not found`);
  }
}

export class BaristaNotFoundError extends ApplicationError {
  readonly code = 'BARISTA_NOT_FOUND';
  readonly statusCode = 404;

  constructor(baristaId: string) {
    super(`Barista '${baristaId}' not found`);
  }
}

export class BaristaInactiveError extends ApplicationError {
  readonly code = 'BARISTA_INACTIVE';
  readonly statusCode = 400;

  constructor(baristaId: string) {
    super(`Barista '${baristaId}' is not active`);
  }
}

// ============ Auth Errors ============

export class EmailAlreadyRegisteredError extends ApplicationError {
  readonly code = 'EMAIL_ALREADY_REGISTERED';
  readonly statusCode = 409;

  constructor(email: string) {
    super(`User with email '${email}' already exists`);
  }
}

export class InvalidCredentialsError extends ApplicationError {
  readonly code = 'INVALID_CREDENTIALS';
  readonly statusCode = 401;

  constructor() {
    super('Invalid email or password');
  }
}

export class AccountDeactivatedError extends ApplicationError {
  readonly code = 'ACCOUNT_DEACTIVATED';
  readonly statusCode = 403;

  constructor() {
    super('Account is deactivated');
  }
}

export class UserNotFoundError extends ApplicationError {
  readonly code = 'USER_NOT_FOUND';
  readonly statusCode = 404;

  constructor(userId: string) {
    super(`User '${userId}' not found`);
  }
}

export class UnauthorizedError extends ApplicationError {
  readonly code = 'UNAUTHORIZED';
  readonly statusCode = 401;

  constructor(reason = 'Authentication required') {
    super(reason);
  }
}

export class ForbiddenError extends ApplicationError {
  readonly code = 'FORBIDDEN';
  readonly statusCode = 403;

  constructor(reason = 'You do not have permission to perform this action') {
    super(reason);
  }
}

// ============ Validation Errors ============

export class ValidationError extends ApplicationError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(message: string, public readonly field?: string) {
    super(message);
  }
}

// ============ Generic Errors ============

export class UnexpectedError extends ApplicationError {
  readonly code = 'UNEXPECTED_ERROR';
  readonly statusCode = 500;

  constructor(reason: string) {
    super(`An unexpected error occurred: ${reason}`);
  }
}

export type OrderError =
  | OrderNotFoundError
  | InvalidOrderStateError
  | ConcurrencyConflictError
  | CoffeeItemNotFoundError
  | CoffeeItemUnavailableError
  | CustomerNotFoundError
  | BaristaNotFoundError
  | BaristaInactiveError
  | ValidationError
  | UnexpectedError;

export type MenuError =
  | CoffeeItemNotFoundError
  | CategoryNotFoundError
  | DuplicateNameError
  | ConcurrencyConflictError
  | ValidationError
  | UnexpectedError;

export type AuthError =
  | EmailAlreadyRegisteredError
  | InvalidCredentialsError
  | AccountDeactivatedError
  | UserNotFoundError
  | ValidationError
  | UnexpectedError;
