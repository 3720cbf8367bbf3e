import { ApiError } from '../middlewares/errorHandler';

/**
 * Parse a raw string into one of the members of a string enum.
 * Unknown values are rejected with a validation error naming the field.
 */
export const parseEnumValue = <T extends string>(
  members: Record<string, T>,
  value: string,
  label: string
): T => {
  const match = Object.values(members).find((member) => member === value);
  if (match === undefined) {
    throw ApiError.validationError(`invalid ${label}: ${value}`);
  }
  return match;
};

export const isEnumValue = <T extends string>(
  members: Record<string, T>,
  value: unknown
): value is T => Object.values(members).some((member) => member === value);
