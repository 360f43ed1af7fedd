/**
 * Either for explicit error handling in use cases.
 *
 * - Left<L>: the operation failed, `value` is the error
 * - Right<R>: the operation succeeded, `value` is the result
 *
 * @example
 * ```typescript
 * const result = await manageOrder.markAsReady('ord_123');
 * if (result.isLeft()) {
 *   throw result.value; // ApplicationError
 * }
 * return result.value; // OrderOutputDto
 * ```
 */

// Left represents failure
export class Left<L> {
  constructor(public readonly value: L) {}

  isLeft(): this is Left<L> {
    return true;
  }

  isRight(): this is Right<never> {
    return false;
  }
}

// Right represents success
export class Right<R> {
  constructor(public readonly value: R) {}

  isLeft(): this is Left<never> {
    return false;
  }

  isRight(): this is Right<R> {
    return true;
  }
}

export type Either<L, R> = Left<L> | Right<R>;

export const left = <L, R = never>(value: L): Either<L, R> => new Left(value);
export const right = <L = never, R = unknown>(value: R): Either<L, R> => new Right(value);
