import { Either } from '@application/common';
import { ApplicationError } from '@application/errors';

export interface ApiResponse<T> {
  success: true;
  message?: string;
  data: T;
}

export interface ApiErrorResponse {
  success: false;
  code: string;
  message: string;
}

/**
 * Unwraps a use case result for a controller.
 * A Left is thrown and turned into an error response by ApplicationErrorFilter.
 */
export const unwrap = <T>(result: Either<ApplicationError, T>): T => {
  if (result.isLeft()) {
    throw result.value;
  }
  return result.value;
};

export const ok = <T>(data: T, message?: string): ApiResponse<T> =>
  message === undefined ? { success: true, data } : { success: true, message, data };
