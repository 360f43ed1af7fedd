import { ValidationException } from '../exceptions';

/**
 * Rejects blank values and values over the maximum length; returns the value unchanged.
 */
export const requireText = (
  subject: string,
  field: string,
  value: string,
  maxLength: number,
): string => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationException(subject, `${field} cannot be empty`, field);
  }
  if (value.length > maxLength) {
    throw new ValidationException(
      subject,
      `${field} must not exceed ${maxLength} characters`,
      field,
    );
  }
  return value;
};

/**
 * Same as requireText for optional fields; blank values become null.
 */
export const optionalText = (
  subject: string,
  field: string,
  value: string | null | undefined,
  maxLength: number,
): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    return null;
  }
  if (value.length > maxLength) {
    throw new ValidationException(
      subject,
      `${field} must not exceed ${maxLength} characters`,
      field,
    );
  }
  return value;
};
