export const USER_ROLES = ['admin', 'barista', 'customer'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export const isUserRole = (value: unknown): value is UserRole =>
  USER_ROLES.some((role) => role === value);
